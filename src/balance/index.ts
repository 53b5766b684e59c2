export { BalanceTracker } from "./balance-tracker.js";
export type { BalanceTrackerConfig } from "./balance-tracker.js";
export type { BalanceFetcher, PendingAction, ReconcileReport } from "./types.js";
