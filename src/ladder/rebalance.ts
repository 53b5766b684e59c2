/**
 * StartupRebalancer — brings the base/quote split to a target share before
 * a fresh ladder is seeded.
 *
 * Each attempt sends a market order; when the venue refuses it, a limit
 * order priced through the book by `slippagePct` stands in and is cancelled
 * if it has not filled after `settleMs`. Balances are re-read between
 * attempts. Failing every attempt is fatal: the ladder would otherwise start
 * lopsided.
 */

import type { BalanceTracker } from "../balance/balance-tracker.js";
import { OrderStatus } from "../client/types.js";
import type { CreateOrderRequest } from "../client/types.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigurationError, ValidationError, classifyError } from "../shared/errors.js";
import { clientReferenceId } from "../shared/identifiers.js";
import type { ClientReferenceId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { roundDownToStep, roundDownToTick, roundUpToTick, splitSymbol } from "../shared/symbols.js";
import type { SymbolParts } from "../shared/symbols.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, sleep as defaultSleep } from "../shared/time.js";
import { RunMode } from "./types.js";
import type { LadderConfig } from "./types.js";
import type { LadderVenue } from "./venue.js";

export interface RebalanceSettings {
	/** Share of total value to hold in base, strictly between 0 and 1. */
	readonly targetBasePct: Decimal;
	/** How far through the bid/ask the limit fallback is priced. */
	readonly slippagePct: Decimal;
	readonly maxAttempts: number;
	/** Wait before checking a limit fallback. */
	readonly settleMs: number;
}

export interface RebalanceNeed {
	readonly side: OrderSide;
	readonly quantity: Decimal;
}

export type RebalanceOutcome =
	| { readonly kind: "balanced"; readonly attempts: number }
	| { readonly kind: "skipped"; readonly mode: RunMode };

export interface StartupRebalancerDeps {
	readonly venue: LadderVenue;
	readonly balances: BalanceTracker;
	readonly logger?: Logger;
	readonly clock?: Clock;
	readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

type RebalanceLadder = Pick<LadderConfig, "symbol" | "mode" | "tickSize" | "stepSize" | "minNotionalQuote">;

const REFERENCE_PREFIX = "ladder-rebalance";

/**
 * Base quantity to trade so that base holds `targetBasePct` of the combined
 * value at `mid`. Null when the account holds nothing or is already on target.
 * @throws ConfigurationError when the target is not strictly between 0 and 1
 * @throws ValidationError when `mid` is not positive
 */
export function rebalanceNeed(
	base: Decimal,
	quote: Decimal,
	mid: Decimal,
	targetBasePct: Decimal,
): RebalanceNeed | null {
	if (!targetBasePct.isPositive() || targetBasePct.gte(Decimal.one())) {
		throw new ConfigurationError("Rebalance target must be between 0 and 1", {
			targetBasePct: targetBasePct.toString(),
		});
	}
	if (!mid.isPositive()) {
		throw new ValidationError("Rebalance needs a positive mid price", { mid: mid.toString() });
	}
	const baseValue = base.mul(mid);
	const total = baseValue.add(quote);
	if (!total.isPositive()) return null;

	const delta = total.mul(targetBasePct).sub(baseValue).div(mid);
	if (delta.isZero()) return null;
	return { side: delta.isPositive() ? OrderSide.Buy : OrderSide.Sell, quantity: delta.abs() };
}

export class StartupRebalancer {
	private readonly ladder: RebalanceLadder;
	private readonly settings: RebalanceSettings;
	private readonly venue: LadderVenue;
	private readonly balances: BalanceTracker;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;
	private readonly assets: SymbolParts;
	private lastReferenceMicros = 0;

	constructor(ladder: RebalanceLadder, settings: RebalanceSettings, deps: StartupRebalancerDeps) {
		this.ladder = ladder;
		this.settings = settings;
		this.venue = deps.venue;
		this.balances = deps.balances;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "rebalance" });
		this.clock = deps.clock ?? SystemClock;
		this.sleep = deps.sleep ?? defaultSleep;
		this.assets = splitSymbol(ladder.symbol);
	}

	/**
	 * @returns how many orders it took, or `skipped` outside live mode
	 * @throws ConfigurationError when the split is still off target after every attempt
	 */
	async run(): Promise<RebalanceOutcome> {
		if (this.ladder.mode !== RunMode.Live) {
			this.logger.info({ mode: this.ladder.mode }, "start-up rebalance skipped outside live mode");
			return { kind: "skipped", mode: this.ladder.mode };
		}

		const attempts = Math.max(1, this.settings.maxAttempts);
		for (let attempt = 0; ; attempt++) {
			const need = await this.currentNeed();
			if (need === null) {
				if (attempt > 0) this.logger.info({ attempts: attempt }, "start-up rebalance complete");
				return { kind: "balanced", attempts: attempt };
			}
			if (attempt === attempts) throw this.failure(attempts, need);
			await this.execute(need);
		}
	}

	/** Remaining trade at current balances; null once it is too small to place. */
	private async currentNeed(): Promise<RebalanceNeed | null> {
		await this.balances.refresh(true);
		const mid = await this.venue.getMidPrice(this.ladder.symbol);
		const need = rebalanceNeed(
			this.balances.get(this.assets.base),
			this.balances.get(this.assets.quote),
			mid,
			this.settings.targetBasePct,
		);
		if (need === null) return null;

		const quantity = roundDownToStep(need.quantity, this.ladder.stepSize);
		if (!quantity.isPositive() || quantity.mul(mid).lt(this.ladder.minNotionalQuote)) return null;
		return { side: need.side, quantity };
	}

	private async execute(need: RebalanceNeed): Promise<void> {
		const market = await this.attempt("market rebalance order failed", () =>
			this.venue.createOrder(this.request(need, { type: "market" })),
		);
		if (market !== null) {
			this.logger.info(
				{ side: need.side, quantity: need.quantity.toString(), orderId: market.orderId },
				"rebalance market order sent",
			);
			return;
		}

		const price = await this.limitPrice(need.side);
		const limit = await this.attempt("rebalance limit order failed", () =>
			this.venue.createOrder(this.request(need, { type: "limit", price })),
		);
		if (limit === null) return;
		this.logger.info(
			{ side: need.side, quantity: need.quantity.toString(), price: price.toString(), orderId: limit.orderId },
			"rebalance limit order placed",
		);

		await this.sleep(this.settings.settleMs);
		const status = await this.attempt("rebalance order lookup failed", () => this.venue.getOrder(limit.orderId));
		if (status?.status === OrderStatus.Filled) return;
		await this.attempt("rebalance order cancel failed", () => this.venue.cancelOrder({ id: limit.orderId }));
		this.logger.warn({ orderId: limit.orderId }, "rebalance limit order did not fill; cancelled");
	}

	/** Through the book: above the ask for a buy, below the bid for a sell. */
	private async limitPrice(side: OrderSide): Promise<Decimal> {
		const ticker = await this.venue.getTicker(this.ladder.symbol);
		const mid = ticker.lastPrice ?? (await this.venue.getMidPrice(this.ladder.symbol));
		const one = Decimal.one();
		if (side === OrderSide.Buy) {
			return roundUpToTick((ticker.ask ?? mid).mul(one.add(this.settings.slippagePct)), this.ladder.tickSize);
		}
		return roundDownToTick((ticker.bid ?? mid).mul(one.sub(this.settings.slippagePct)), this.ladder.tickSize);
	}

	private request(
		need: RebalanceNeed,
		order: { readonly type: "market" } | { readonly type: "limit"; readonly price: Decimal },
	): CreateOrderRequest {
		return {
			symbol: this.ladder.symbol,
			side: need.side,
			quantity: need.quantity,
			userProvidedId: this.nextReference(),
			...order,
		};
	}

	/** Runs one venue call; non-fatal failures are logged and read as null. */
	private async attempt<T>(message: string, call: () => Promise<T>): Promise<T | null> {
		try {
			return await call();
		} catch (error) {
			const classified = classifyError(error);
			if (classified.isFatal) throw classified;
			this.logger.warn({ err: classified.message, code: classified.code }, message);
			return null;
		}
	}

	private failure(attempts: number, need: RebalanceNeed): ConfigurationError {
		const { base, quote } = this.assets;
		const required = `${need.side} ${need.quantity.toString()} ${base}`;
		const held = `${base} ${this.balances.get(base).toString()}, ${quote} ${this.balances.get(quote).toString()}`;
		return new ConfigurationError(
			`Startup rebalance failed after ${attempts} attempts; required ${required}; balances: ${held}. ` +
				`Manual action: ${required} for ${quote}.`,
			{ side: need.side, quantity: need.quantity.toString(), attempts },
		);
	}

	private nextReference(): ClientReferenceId {
		const micros = Math.max(Math.floor(this.clock.now() * 1000), this.lastReferenceMicros + 1);
		this.lastReferenceMicros = micros;
		return clientReferenceId(`${REFERENCE_PREFIX}-${micros}`);
	}
}
