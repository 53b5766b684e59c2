import type { Balance } from "../client/types.js";
import type { Decimal } from "../shared/decimal.js";

/** Loads the venue's balance snapshot; usually `RestClient.getBalances`. */
export type BalanceFetcher = () => Promise<readonly Balance[]>;

/** What one reconcile pass did with each pending prediction. */
export type PendingAction =
	| { readonly type: "confirmed"; readonly asset: string; readonly delta: Decimal }
	| {
			readonly type: "kept";
			readonly asset: string;
			readonly delta: Decimal;
			readonly expected: Decimal;
			readonly fresh: Decimal;
	  }
	| { readonly type: "dropped"; readonly asset: string; readonly delta: Decimal; readonly fresh: Decimal };

export interface ReconcileReport {
	readonly actions: readonly PendingAction[];
	/** Assets in the new venue snapshot. */
	readonly assets: number;
}
