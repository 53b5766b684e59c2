/**
 * Ladder engine types — configuration, tracked orders and placement outcomes.
 */

import type { OrderStatus } from "../client/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { TradingError } from "../shared/errors.js";
import type { ClientReferenceId, OrderId } from "../shared/identifiers.js";
import type { OrderSide } from "../shared/side.js";

// ── Modes ────────────────────────────────────────────────────────────

export const StepMode = {
	/** Levels are `ref × (1 ± step × i)` */
	Pct: "pct",
	/** Levels are `ref ± stepAbs × i` */
	Abs: "abs",
} as const;

export type StepMode = (typeof StepMode)[keyof typeof StepMode];

export const LadderVariant = {
	/** Fixed level counts; a sell fill re-places a buy below and a sell above. */
	Bounded: "bounded",
	/** Sells extend upward without limit; buys never go below the seeded floor. */
	Unbounded: "unbounded",
} as const;

export type LadderVariant = (typeof LadderVariant)[keyof typeof LadderVariant];

export const RunMode = {
	Live: "live",
	/** Orders are recorded locally and never sent. */
	DryRun: "dry-run",
	/** Nothing is placed, not even locally. */
	Monitor: "monitor",
} as const;

export type RunMode = (typeof RunMode)[keyof typeof RunMode];

export const SizingMode = {
	/** `baseOrderSize` in base units */
	Fixed: "fixed",
	/** `targetQuotePerOrder / price` */
	Dynamic: "dynamic",
	/** Dynamic, floored at `minBaseOrderQty` */
	Hybrid: "hybrid",
} as const;

export type SizingMode = (typeof SizingMode)[keyof typeof SizingMode];

// ── Configuration ────────────────────────────────────────────────────

export interface LadderConfig {
	/** `BASE_QUOTE` */
	readonly symbol: string;
	readonly variant: LadderVariant;
	readonly mode: RunMode;
	readonly stepMode: StepMode;
	readonly stepPct: Decimal | undefined;
	readonly stepAbs: Decimal | undefined;
	readonly nBuyLevels: number;
	/** Bounded: sells kept on the book. Unbounded: size of the initial sell window. */
	readonly nSellLevels: number;
	readonly baseOrderSize: Decimal;
	readonly totalFeeRate: Decimal;
	readonly feeBufferPct: Decimal;
	readonly minNotionalQuote: Decimal;
	readonly tickSize: Decimal;
	readonly stepSize: Decimal;
	readonly buySizingMode: SizingMode;
	readonly sellSizingMode: SizingMode;
	readonly targetQuotePerOrder: Decimal | undefined;
	readonly minBaseOrderQty: Decimal | undefined;
	readonly minOrderQty: Decimal | undefined;
	/** Unbounded only: a restart with tracked orders adds buy levels below the floor. */
	readonly extendBuyLevelsOnRestart: boolean;
}

// ── Tracked orders ───────────────────────────────────────────────────

export interface TrackedOrder {
	readonly orderId: OrderId;
	readonly clientReferenceId: ClientReferenceId;
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly quantity: Decimal;
	/** Buy price this sell was placed against, when known. */
	readonly costBasis: Decimal | null;
	readonly createdAtMs: number;
}

/** A placement whose venue outcome is unknown (timeout or transient failure after retries). */
export interface AmbiguousPlacement {
	readonly clientReferenceId: ClientReferenceId;
	readonly side: OrderSide;
	readonly price: Decimal;
	readonly quantity: Decimal;
	readonly costBasis: Decimal | null;
	readonly createdAtMs: number;
}

// ── Placement outcomes ───────────────────────────────────────────────

export const SkipReason = {
	SideHalted: "side-halted",
	DuplicateLevel: "duplicate-level",
	InvalidPrice: "invalid-price",
	InvalidQuantity: "invalid-quantity",
	BelowMinQuantity: "below-min-quantity",
	BelowMinNotional: "below-min-notional",
	Unprofitable: "unprofitable",
	InsufficientBalance: "insufficient-balance",
	BelowLowerLimit: "below-lower-limit",
	MonitorMode: "monitor-mode",
} as const;

export type SkipReason = (typeof SkipReason)[keyof typeof SkipReason];

export const PlacementErrorKind = {
	RateLimit: "rate-limit",
	Validation: "validation",
	InsufficientFunds: "insufficient-funds",
	/** The venue may or may not hold the order; resolved on the next reconcile. */
	UnknownOutcome: "unknown-outcome",
} as const;

export type PlacementErrorKind = (typeof PlacementErrorKind)[keyof typeof PlacementErrorKind];

export type PlacementResult =
	| { readonly kind: "placed"; readonly order: TrackedOrder }
	| {
			readonly kind: "skipped";
			readonly side: OrderSide;
			readonly price: Decimal;
			readonly reason: SkipReason;
			readonly detail: string;
	  }
	| {
			readonly kind: "failed";
			readonly side: OrderSide;
			readonly price: Decimal;
			readonly errorKind: PlacementErrorKind;
			readonly error: TradingError;
	  };

// ── Order updates ────────────────────────────────────────────────────

/** A status change for one order, from a poll or a stream report. */
export interface OrderUpdate {
	readonly orderId: OrderId;
	readonly clientReferenceId?: ClientReferenceId;
	readonly status: OrderStatus;
	readonly filledQuantity?: Decimal;
	readonly avgPrice?: Decimal;
}

export type UpdateOutcome =
	| { readonly kind: "filled"; readonly order: TrackedOrder; readonly counterOrders: readonly PlacementResult[] }
	| { readonly kind: "removed"; readonly order: TrackedOrder; readonly status: OrderStatus }
	/** Still live (open, partially filled, not yet acknowledged). */
	| { readonly kind: "unchanged"; readonly order: TrackedOrder }
	| { readonly kind: "untracked"; readonly orderId: OrderId };

export interface ReconcileSummary {
	readonly fills: number;
	readonly removed: number;
	readonly adopted: number;
	readonly droppedAmbiguous: number;
	/** Tracked orders whose status query failed this cycle. */
	readonly skippedQueries: number;
	readonly placements: readonly PlacementResult[];
}
