export { LadderEngine } from "./ladder-engine.js";
export type { LadderEngineDeps, LadderEvents } from "./ladder-engine.js";
export { LadderRunner } from "./runner.js";
export type { LadderRunnerDeps, LadderRunnerOptions } from "./runner.js";
export {
	assertProfitableSpacing,
	isProfitablePair,
	minProfitableSellPrice,
	minProfitableStep,
	relativeStep,
	roundTripProfit,
} from "./profitability.js";
export { StartupRebalancer, rebalanceNeed } from "./rebalance.js";
export type { RebalanceNeed, RebalanceOutcome, RebalanceSettings, StartupRebalancerDeps } from "./rebalance.js";
export { baseQuantity, resolveQuantity } from "./sizing.js";
export type { QuantityDecision } from "./sizing.js";
export { LadderVariant, PlacementErrorKind, RunMode, SizingMode, SkipReason, StepMode } from "./types.js";
export type {
	AmbiguousPlacement,
	LadderConfig,
	OrderUpdate,
	PlacementResult,
	ReconcileSummary,
	TrackedOrder,
	UpdateOutcome,
} from "./types.js";
export type { LadderVenue } from "./venue.js";
