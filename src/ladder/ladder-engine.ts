/**
 * LadderEngine — owns the ladder: which levels hold an order, what each
 * fill or cancellation means, and the accounting that follows.
 *
 * Every mutation of ladder and balance state goes through this class. The
 * engine does no locking of its own; the runner calls it under one mutex.
 */

import type { BalanceTracker } from "../balance/balance-tracker.js";
import { OrderStatus } from "../client/types.js";
import type { VenueOrder } from "../client/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { EngineState, StoredOrder } from "../persistence/state-schema.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigurationError, RateLimitError, TransientApiError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { clientReferenceId, orderId } from "../shared/identifiers.js";
import type { ClientReferenceId, OrderId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { roundDownToTick, roundUpToTick, splitSymbol } from "../shared/symbols.js";
import type { SymbolParts } from "../shared/symbols.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { assertProfitableSpacing, isProfitablePair, minProfitableSellPrice, roundTripProfit } from "./profitability.js";
import { baseQuantity, resolveQuantity } from "./sizing.js";
import {
	LadderVariant,
	PlacementErrorKind,
	RunMode,
	SkipReason,
	StepMode,
} from "./types.js";
import type {
	AmbiguousPlacement,
	LadderConfig,
	OrderUpdate,
	PlacementResult,
	ReconcileSummary,
	TrackedOrder,
	UpdateOutcome,
} from "./types.js";
import type { LadderVenue } from "./venue.js";

export interface LadderEngineDeps {
	readonly venue: LadderVenue;
	readonly balances: BalanceTracker;
	readonly logger?: Logger;
	readonly clock?: Clock;
}

export type LadderEvents = {
	placed: (order: TrackedOrder) => void;
	filled: (order: TrackedOrder, fill: { readonly price: Decimal; readonly quantity: Decimal }) => void;
	removed: (order: TrackedOrder, status: OrderStatus) => void;
	halted: (side: OrderSide, detail: string) => void;
};

interface PlaceOptions {
	/** Buy price a sell is placed against; enables net profit tracking. */
	readonly costBasis?: Decimal | null;
	/** Starting quantity instead of the side's sizing rule. */
	readonly baseQuantity?: Decimal;
}

type Settlement =
	| { readonly kind: "filled"; readonly quantity: Decimal }
	| Extract<UpdateOutcome, { kind: "removed" | "unchanged" }>;

const DRY_RUN_PREFIX = "dryrun-";

function levelKey(side: OrderSide, price: Decimal): string {
	return `${side}:${price.toString()}`;
}

function optionalDecimal(value: string | null): Decimal | null {
	return value === null ? null : Decimal.from(value);
}

function optionalString(value: Decimal | null): string | null {
	return value === null ? null : value.toString();
}

/**
 * Ladder grid engine for one symbol.
 *
 * @example
 * ```ts
 * const engine = new LadderEngine(config.ladder, { venue: rest, balances });
 * await engine.syncOpenOrders();
 * await engine.seed();
 * const summary = await engine.reconcile();
 * ```
 */
export class LadderEngine {
	readonly events = new TypedEmitter<LadderEvents>();

	private readonly config: LadderConfig;
	private readonly venue: LadderVenue;
	private readonly balances: BalanceTracker;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly assets: SymbolParts;
	private readonly step: Decimal;

	private readonly open = new Map<OrderId, TrackedOrder>();
	private readonly ambiguous = new Map<ClientReferenceId, AmbiguousPlacement>();
	private readonly haltedSides = new Set<OrderSide>();

	private referencePrice: Decimal | null = null;
	private lowestBuyPrice: Decimal | null = null;
	private highestSellPrice: Decimal | null = null;
	private lastMid: Decimal | null = null;
	private grossSellRevenue = Decimal.zero();
	private realizedNetProfit = Decimal.zero();
	private rebalanceNeeded = false;
	private running = false;
	private lastError: string | null = null;

	private lastReferenceMicros = 0;
	private dryRunCounter = 0;

	constructor(config: LadderConfig, deps: LadderEngineDeps) {
		this.config = config;
		this.venue = deps.venue;
		this.balances = deps.balances;
		this.logger = deps.logger ?? silentLogger();
		this.clock = deps.clock ?? SystemClock;
		try {
			this.assets = splitSymbol(config.symbol);
		} catch (error) {
			throw new ConfigurationError(`Invalid ladder symbol "${config.symbol}"`, { cause: error });
		}
		const step = config.stepMode === StepMode.Pct ? config.stepPct : config.stepAbs;
		if (step === undefined || !step.isPositive()) {
			throw new ConfigurationError(`A positive step is required for stepMode ${config.stepMode}`);
		}
		this.step = step;
	}

	// ── Queries ────────────────────────────────────────────────────

	openOrders(): readonly TrackedOrder[] {
		return [...this.open.values()];
	}

	ordersOn(side: OrderSide): readonly TrackedOrder[] {
		return this.openOrders().filter((o) => o.side === side);
	}

	ambiguousPlacements(): readonly AmbiguousPlacement[] {
		return [...this.ambiguous.values()];
	}

	isHalted(side: OrderSide): boolean {
		return this.haltedSides.has(side);
	}

	get needsRebalance(): boolean {
		return this.rebalanceNeeded;
	}

	get highestSell(): Decimal | null {
		return this.highestSellPrice;
	}

	get lowestBuy(): Decimal | null {
		return this.lowestBuyPrice;
	}

	/** Σ sell price × quantity over all sell fills. Gross proceeds, not profit. */
	get grossRevenue(): Decimal {
		return this.grossSellRevenue;
	}

	get netProfit(): Decimal {
		return this.realizedNetProfit;
	}

	get isRunning(): boolean {
		return this.running;
	}

	// ── Run status ─────────────────────────────────────────────────

	markRunning(running: boolean): void {
		this.running = running;
	}

	/** Records a fatal error and marks the engine stopped. */
	recordFatal(error: Error): void {
		this.running = false;
		this.lastError = error.message;
	}

	// ── Start-up ───────────────────────────────────────────────────

	/**
	 * Adopts the venue's open orders for the symbol when nothing is tracked
	 * locally, so a restart without a snapshot does not double the ladder.
	 * @returns number of adopted orders
	 */
	async syncOpenOrders(): Promise<number> {
		if (this.open.size > 0) return 0;
		const venueOrders = await this.venue.listOpenOrders(this.config.symbol);
		let adopted = 0;
		for (const venueOrder of venueOrders) {
			const order = this.fromVenueOrder(venueOrder);
			if (order === null) continue;
			this.track(order);
			adopted++;
		}
		if (adopted === 0) return 0;

		const buys = this.ordersOn(OrderSide.Buy).map((o) => o.price);
		const sells = this.ordersOn(OrderSide.Sell).map((o) => o.price);
		if (buys.length > 0) this.lowestBuyPrice = buys.reduce((a, b) => Decimal.min(a, b));
		if (sells.length > 0) this.highestSellPrice = sells.reduce((a, b) => Decimal.max(a, b));
		const mid = await this.venue.getMidPrice(this.config.symbol);
		this.referencePrice = mid;
		this.lastMid = mid;
		this.logger.info({ adopted }, "synced open orders from venue");
		return adopted;
	}

	/**
	 * Places the initial ladder around `referencePrice` (default: the venue mid).
	 * Does nothing when orders are already tracked.
	 * @throws ConfigurationError when the spacing cannot pay its fees
	 */
	async seed(referencePrice?: Decimal): Promise<PlacementResult[]> {
		if (this.open.size > 0) {
			if (this.config.variant === LadderVariant.Unbounded && this.config.extendBuyLevelsOnRestart) {
				return this.extendBuyLevels();
			}
			this.logger.info({ tracked: this.open.size }, "orders already tracked; skipping seed");
			return [];
		}
		const ref = referencePrice ?? (await this.venue.getMidPrice(this.config.symbol));
		assertProfitableSpacing(this.config, ref);

		this.haltedSides.clear();
		await this.balances.refresh(true);
		this.referencePrice = ref;
		this.lastMid = ref;

		const buyLevels = this.buildLevels(ref, OrderSide.Buy, this.config.nBuyLevels);
		const sellLevels = this.buildLevels(ref, OrderSide.Sell, this.config.nSellLevels);
		if (this.config.variant === LadderVariant.Unbounded) {
			this.lowestBuyPrice = roundDownToTick(this.stepFrom(ref, this.config.nBuyLevels, false), this.config.tickSize);
		}
		this.logger.info(
			{
				referencePrice: ref.toString(),
				buyLevels: buyLevels.length,
				sellLevels: sellLevels.length,
				balances: this.balances.snapshot(),
			},
			"seeding ladder",
		);

		const results: PlacementResult[] = [];
		for (const price of buyLevels) {
			results.push(await this.placeOrder(OrderSide.Buy, price));
		}
		for (const price of sellLevels) {
			results.push(await this.placeOrder(OrderSide.Sell, price));
		}

		const placedSells = results.flatMap((r) =>
			r.kind === "placed" && r.order.side === OrderSide.Sell ? [r.order.price] : [],
		);
		for (const price of placedSells) this.raiseHighestSell(price);

		const placed = results.filter((r) => r.kind === "placed").length;
		if (placed < results.length) {
			this.logger.warn({ placed, levels: results.length }, "ladder only partially seeded");
		}
		return results;
	}

	/**
	 * Restart path of the unbounded ladder: keeps every tracked order and
	 * adds the buy levels below the current floor that a fresh seed at
	 * today's mid would hold.
	 */
	private async extendBuyLevels(): Promise<PlacementResult[]> {
		this.haltedSides.delete(OrderSide.Buy);
		await this.balances.refresh(true);
		const mid = await this.venue.getMidPrice(this.config.symbol);
		assertProfitableSpacing(this.config, mid);
		this.lastMid = mid;

		const floor = this.lowestBuyPrice;
		const targets: Decimal[] = [];
		for (let level = 1; level <= this.config.nBuyLevels; level++) {
			const price = roundDownToTick(this.stepFrom(mid, level, false), this.config.tickSize);
			if (!price.isPositive()) break;
			if (floor !== null && price.gte(floor)) continue;
			if (this.hasLevel(OrderSide.Buy, price)) continue;
			targets.push(price);
		}
		if (targets.length === 0) {
			this.logger.info({ mid: mid.toString(), lowestBuy: optionalString(floor) }, "no buy levels to extend");
			return [];
		}

		const results: PlacementResult[] = [];
		for (const price of targets) {
			if (this.haltedSides.has(OrderSide.Buy)) break;
			results.push(await this.placeOrder(OrderSide.Buy, price));
		}
		for (const result of results) {
			if (result.kind !== "placed") continue;
			const price = result.order.price;
			if (this.lowestBuyPrice === null || price.lt(this.lowestBuyPrice)) this.lowestBuyPrice = price;
		}
		this.logger.info(
			{
				added: results.filter((r) => r.kind === "placed").length,
				targets: targets.length,
				lowestBuy: optionalString(this.lowestBuyPrice),
			},
			"extended buy ladder",
		);
		return results;
	}

	// ── Placement ──────────────────────────────────────────────────

	/**
	 * Runs every placement check and, in live mode, sends the order.
	 * Ordinary refusals come back as `skipped` or `failed`; only fatal
	 * errors (authentication, configuration) are thrown.
	 */
	async placeOrder(side: OrderSide, rawPrice: Decimal, options: PlaceOptions = {}): Promise<PlacementResult> {
		if (this.haltedSides.has(side)) {
			return this.skip(side, rawPrice, SkipReason.SideHalted, `${side} placements halted until funds return`);
		}
		const price = roundDownToTick(rawPrice, this.config.tickSize);
		if (!price.isPositive()) {
			return this.skip(side, price, SkipReason.InvalidPrice, `price ${price.toString()} after tick rounding`);
		}
		if (this.hasLevel(side, price)) {
			return this.skip(side, price, SkipReason.DuplicateLevel, `${side} level ${price.toString()} already held`);
		}

		const start = options.baseQuantity ?? baseQuantity(this.config, side, price, this.referencePrice);
		const sized = resolveQuantity(this.config, price, start);
		if (!sized.ok) {
			return this.skip(side, price, sized.reason, sized.detail);
		}
		const quantity = sized.quantity;

		const costBasis = options.costBasis ?? null;
		const pair = this.pairFor(side, price, costBasis);
		if (!isProfitablePair(pair.buy, pair.sell, this.config.totalFeeRate, this.config.feeBufferPct)) {
			const counter = side === OrderSide.Buy ? pair.sell : pair.buy;
			return this.skip(
				side,
				price,
				SkipReason.Unprofitable,
				`${side} at ${price.toString()} against ${counter.toString()} loses money after fees`,
			);
		}

		if (this.config.mode === RunMode.Monitor) {
			this.logger.info(
				{ side, price: price.toString(), quantity: quantity.toString() },
				"monitor mode: order not placed",
			);
			return this.skip(side, price, SkipReason.MonitorMode, "monitor mode");
		}
		if (this.config.mode === RunMode.DryRun) {
			this.dryRunCounter++;
			const order: TrackedOrder = {
				orderId: orderId(`${DRY_RUN_PREFIX}${this.dryRunCounter}`),
				clientReferenceId: this.nextClientReferenceId(`${DRY_RUN_PREFIX}${side}`),
				side,
				price,
				quantity,
				costBasis,
				createdAtMs: this.clock.now(),
			};
			this.track(order);
			this.logger.info(
				{ side, price: price.toString(), quantity: quantity.toString(), orderId: order.orderId },
				"dry run: order recorded",
			);
			this.events.emit("placed", order);
			return { kind: "placed", order };
		}

		const requirement = this.requirementFor(side, price, quantity);
		if (this.balances.hasSnapshot) {
			const available = this.balances.get(requirement.asset);
			if (available.lt(requirement.amount)) {
				const detail = `required ${requirement.amount.toString()} ${requirement.asset}, available ${available.toString()}`;
				this.halt(side, detail);
				return this.skip(side, price, SkipReason.InsufficientBalance, detail);
			}
		}

		const reference = this.nextClientReferenceId(`ladder-${side}`);
		let venueOrder: VenueOrder;
		try {
			venueOrder = await this.venue.createOrder({
				symbol: this.config.symbol,
				side,
				type: "limit",
				quantity,
				price,
				userProvidedId: reference,
				strictValidate: true,
			});
		} catch (error) {
			return this.placementFailure(error, { clientReferenceId: reference, side, price, quantity, costBasis });
		}

		const order: TrackedOrder = {
			orderId: venueOrder.orderId,
			clientReferenceId: reference,
			side,
			price,
			quantity,
			costBasis,
			createdAtMs: this.clock.now(),
		};
		this.track(order);
		this.balances.applyPending(requirement.asset, requirement.amount.neg());
		this.logger.info(
			{ side, price: price.toString(), quantity: quantity.toString(), orderId: order.orderId },
			"order placed",
		);
		this.events.emit("placed", order);
		return { kind: "placed", order };
	}

	// ── Order updates ──────────────────────────────────────────────

	/**
	 * Applies one status report. Fills place counter orders; cancellations,
	 * rejections and expirations only free the level.
	 */
	async handleOrderUpdate(update: OrderUpdate): Promise<UpdateOutcome> {
		let order = this.open.get(update.orderId);
		if (order === undefined && update.clientReferenceId !== undefined) {
			order = this.adoptAmbiguous(update.clientReferenceId, update.orderId);
		}
		if (order === undefined) {
			return { kind: "untracked", orderId: update.orderId };
		}

		const settled = this.settle(order, update);
		if (settled.kind !== "filled") return settled;
		// The fill moved funds; counter orders are checked against the venue's new balances.
		await this.refreshBalances();
		const counterOrders = await this.placeCounterOrders(order, settled.quantity);
		return { kind: "filled", order, counterOrders };
	}

	/**
	 * One polling pass. Resolves ambiguous placements and settles tracked
	 * orders the venue no longer lists; counter orders and refills are placed
	 * only after balances are refreshed. A failed query for one order skips
	 * that order only.
	 */
	async reconcile(): Promise<ReconcileSummary> {
		const venueOpen = await this.venue.listOpenOrders(this.config.symbol);
		const listed = new Set<string>(venueOpen.map((o) => o.orderId));

		let adopted = 0;
		let droppedAmbiguous = 0;
		for (const placement of [...this.ambiguous.values()]) {
			const match = venueOpen.find((o) => o.clientReferenceId === placement.clientReferenceId);
			if (match !== undefined && this.adoptAmbiguous(placement.clientReferenceId, match.orderId) !== undefined) {
				adopted++;
				continue;
			}
			this.ambiguous.delete(placement.clientReferenceId);
			droppedAmbiguous++;
			this.logger.warn(
				{ clientReferenceId: placement.clientReferenceId, side: placement.side, price: placement.price.toString() },
				"ambiguous placement not found on venue; level freed",
			);
		}

		let removed = 0;
		let skippedQueries = 0;
		const filled: Array<{ order: TrackedOrder; quantity: Decimal }> = [];
		for (const order of [...this.open.values()]) {
			if (listed.has(order.orderId) || order.orderId.startsWith(DRY_RUN_PREFIX)) continue;
			let venueOrder: VenueOrder;
			try {
				venueOrder = await this.venue.getOrder(order.orderId);
			} catch (error) {
				const classified = classifyError(error);
				if (classified.isFatal) throw classified;
				skippedQueries++;
				this.logger.warn({ orderId: order.orderId, err: classified.message }, "order query failed; skipping");
				continue;
			}
			const settled = this.settle(order, {
				orderId: order.orderId,
				status: venueOrder.status,
				filledQuantity: venueOrder.filledQuantity,
				avgPrice: venueOrder.avgPrice,
			});
			if (settled.kind === "filled") {
				filled.push({ order, quantity: settled.quantity });
			} else if (settled.kind === "removed") {
				removed++;
			}
		}

		await this.refreshBalances();
		const placements: PlacementResult[] = [];
		for (const fill of filled) {
			placements.push(...(await this.placeCounterOrders(fill.order, fill.quantity)));
		}
		if (this.config.variant === LadderVariant.Bounded) {
			placements.push(...(await this.refillLevels()));
		}
		return { fills: filled.length, removed, adopted, droppedAmbiguous, skippedQueries, placements };
	}

	// ── Snapshot ───────────────────────────────────────────────────

	toState(): EngineState {
		return {
			version: 1,
			symbol: this.config.symbol,
			variant: this.config.variant,
			referencePrice: optionalString(this.referencePrice),
			lowestBuyPrice: optionalString(this.lowestBuyPrice),
			highestSellPrice: optionalString(this.highestSellPrice),
			lastMid: optionalString(this.lastMid),
			openOrders: this.openOrders().map((o) => ({
				orderId: o.orderId,
				clientReferenceId: o.clientReferenceId,
				side: o.side,
				price: o.price.toString(),
				quantity: o.quantity.toString(),
				costBasis: optionalString(o.costBasis),
				createdAtMs: o.createdAtMs,
			})),
			ambiguousPlacements: this.ambiguousPlacements().map((p) => ({
				clientReferenceId: p.clientReferenceId,
				side: p.side,
				price: p.price.toString(),
				quantity: p.quantity.toString(),
				costBasis: optionalString(p.costBasis),
				createdAtMs: p.createdAtMs,
			})),
			grossSellRevenue: this.grossSellRevenue.toString(),
			realizedNetProfit: this.realizedNetProfit.toString(),
			needsRebalance: this.rebalanceNeeded,
			haltedSides: [...this.haltedSides],
			isRunning: this.running,
			lastError: this.lastError,
			updatedAtMs: this.clock.now(),
		};
	}

	/**
	 * Replaces in-memory state with a stored snapshot.
	 * @throws ConfigurationError when the snapshot belongs to another symbol
	 */
	restore(state: EngineState): void {
		if (state.symbol !== this.config.symbol) {
			throw new ConfigurationError(
				`State snapshot is for ${state.symbol}, not ${this.config.symbol}`,
				{ snapshotSymbol: state.symbol, symbol: this.config.symbol },
			);
		}
		this.open.clear();
		for (const stored of state.openOrders) {
			this.track(this.fromStoredOrder(stored));
		}
		this.ambiguous.clear();
		for (const stored of state.ambiguousPlacements) {
			const reference = clientReferenceId(stored.clientReferenceId);
			this.ambiguous.set(reference, {
				clientReferenceId: reference,
				side: stored.side,
				price: Decimal.from(stored.price),
				quantity: Decimal.from(stored.quantity),
				costBasis: optionalDecimal(stored.costBasis),
				createdAtMs: stored.createdAtMs,
			});
		}
		this.referencePrice = optionalDecimal(state.referencePrice);
		this.lowestBuyPrice = optionalDecimal(state.lowestBuyPrice);
		this.highestSellPrice = optionalDecimal(state.highestSellPrice);
		this.lastMid = optionalDecimal(state.lastMid);
		this.grossSellRevenue = Decimal.from(state.grossSellRevenue);
		this.realizedNetProfit = Decimal.from(state.realizedNetProfit);
		this.rebalanceNeeded = state.needsRebalance;
		this.haltedSides.clear();
		for (const side of state.haltedSides) this.haltedSides.add(side);
		this.lastError = state.lastError;
	}

	// ── Internals ──────────────────────────────────────────────────

	/** Applies a status to a tracked order. Fills are booked here; their counter orders are not. */
	private settle(order: TrackedOrder, update: OrderUpdate): Settlement {
		switch (update.status) {
			case OrderStatus.Filled:
				return { kind: "filled", quantity: this.onFilled(order, update) };
			case OrderStatus.Cancelled:
			case OrderStatus.Rejected:
			case OrderStatus.Expired:
				return this.onRemoved(order, update.status);
			default:
				return { kind: "unchanged", order };
		}
	}

	/** @returns the filled quantity */
	private onFilled(order: TrackedOrder, update: OrderUpdate): Decimal {
		this.untrack(order);
		const quantity =
			update.filledQuantity !== undefined && update.filledQuantity.isPositive()
				? update.filledQuantity
				: order.quantity;
		const fillPrice =
			update.avgPrice !== undefined && update.avgPrice.isPositive() ? update.avgPrice : order.price;

		if (order.side === OrderSide.Sell) {
			this.grossSellRevenue = this.grossSellRevenue.add(fillPrice.mul(quantity));
			if (order.costBasis !== null) {
				const profit = roundTripProfit(order.costBasis, fillPrice, quantity, this.config.totalFeeRate);
				this.realizedNetProfit = this.realizedNetProfit.add(profit);
			}
		}
		this.logger.info(
			{ side: order.side, price: fillPrice.toString(), quantity: quantity.toString(), orderId: order.orderId },
			"order filled",
		);
		this.events.emit("filled", order, { price: fillPrice, quantity });
		return quantity;
	}

	private onRemoved(order: TrackedOrder, status: OrderStatus): Extract<UpdateOutcome, { kind: "removed" }> {
		this.untrack(order);
		if (!order.orderId.startsWith(DRY_RUN_PREFIX)) {
			const requirement = this.requirementFor(order.side, order.price, order.quantity);
			this.balances.resolvePending(requirement.asset, requirement.amount.neg());
		}
		this.logger.info(
			{ side: order.side, price: order.price.toString(), orderId: order.orderId, status },
			"order left the book without trading",
		);
		this.events.emit("removed", order, status);
		return { kind: "removed", order, status };
	}

	private async placeCounterOrders(order: TrackedOrder, filledQuantity: Decimal): Promise<PlacementResult[]> {
		if (order.side === OrderSide.Buy) {
			const options: PlaceOptions =
				this.config.variant === LadderVariant.Bounded
					? { costBasis: order.price, baseQuantity: filledQuantity }
					: { costBasis: order.price };
			return [await this.placeOrder(OrderSide.Sell, this.sellAbove(order.price), options)];
		}

		const above = this.stepFrom(order.price, 1, true);
		const below = this.stepFrom(order.price, 1, false);

		if (this.config.variant === LadderVariant.Bounded) {
			return [await this.placeOrder(OrderSide.Buy, below), await this.placeOrder(OrderSide.Sell, above)];
		}

		const top = this.highestSellPrice ?? order.price;
		const extension = await this.placeOrder(OrderSide.Sell, this.stepFrom(top, 1, true));
		if (extension.kind === "placed") {
			this.raiseHighestSell(extension.order.price);
		}

		const buyBack = roundDownToTick(below, this.config.tickSize);
		if (this.lowestBuyPrice !== null && buyBack.lt(this.lowestBuyPrice)) {
			return [
				extension,
				this.skip(
					OrderSide.Buy,
					buyBack,
					SkipReason.BelowLowerLimit,
					`${buyBack.toString()} below lower limit ${this.lowestBuyPrice.toString()}`,
				),
			];
		}
		return [extension, await this.placeOrder(OrderSide.Buy, buyBack)];
	}

	private async refillLevels(): Promise<PlacementResult[]> {
		const missingBuys = this.config.nBuyLevels - this.countLevels(OrderSide.Buy);
		const missingSells = this.config.nSellLevels - this.countLevels(OrderSide.Sell);
		if (missingBuys <= 0 && missingSells <= 0) return [];

		const mid = await this.venue.getMidPrice(this.config.symbol);
		this.lastMid = mid;
		const results: PlacementResult[] = [];
		for (const price of this.buildLevels(mid, OrderSide.Buy, Math.max(0, missingBuys))) {
			results.push(await this.placeOrder(OrderSide.Buy, price));
		}
		for (const price of this.buildLevels(mid, OrderSide.Sell, Math.max(0, missingSells))) {
			results.push(await this.placeOrder(OrderSide.Sell, price));
		}
		return results;
	}

	/** Fatal errors propagate; any other failure leaves the cached balances in place. */
	private async refreshBalances(): Promise<void> {
		try {
			await this.balances.refresh(true);
		} catch (error) {
			const classified = classifyError(error);
			if (classified.isFatal) throw classified;
			this.logger.warn({ err: classified.message }, "balance refresh failed; using cached balances");
			return;
		}
		if (this.haltedSides.size === 0) return;
		if (this.haltedSides.has(OrderSide.Sell) && this.balances.get(this.assets.base).isPositive()) {
			this.haltedSides.delete(OrderSide.Sell);
		}
		if (this.haltedSides.has(OrderSide.Buy) && this.balances.get(this.assets.quote).isPositive()) {
			this.haltedSides.delete(OrderSide.Buy);
		}
		if (this.haltedSides.size === 0) {
			this.rebalanceNeeded = false;
			this.logger.info("funds returned; placements resumed");
		}
	}

	private placementFailure(
		error: unknown,
		placement: Omit<AmbiguousPlacement, "createdAtMs">,
	): PlacementResult {
		const classified = classifyError(error);
		if (classified.isFatal) throw classified;

		const { side, price } = placement;
		if (isInsufficientFunds(classified)) {
			this.halt(side, classified.message);
			return { kind: "failed", side, price, errorKind: PlacementErrorKind.InsufficientFunds, error: classified };
		}
		if (classified instanceof RateLimitError) {
			this.logger.warn({ side, price: price.toString(), err: classified.message }, "placement rate limited");
			return { kind: "failed", side, price, errorKind: PlacementErrorKind.RateLimit, error: classified };
		}
		if (classified instanceof TransientApiError) {
			this.ambiguous.set(placement.clientReferenceId, { ...placement, createdAtMs: this.clock.now() });
			this.logger.warn(
				{ side, price: price.toString(), clientReferenceId: placement.clientReferenceId, err: classified.message },
				"placement outcome unknown; will resolve against open orders",
			);
			return { kind: "failed", side, price, errorKind: PlacementErrorKind.UnknownOutcome, error: classified };
		}
		this.logger.warn({ side, price: price.toString(), err: classified.message }, "venue rejected placement");
		return { kind: "failed", side, price, errorKind: PlacementErrorKind.Validation, error: classified };
	}

	private adoptAmbiguous(reference: ClientReferenceId, id: OrderId): TrackedOrder | undefined {
		const placement = this.ambiguous.get(reference);
		if (placement === undefined) return undefined;
		this.ambiguous.delete(reference);
		const order: TrackedOrder = { ...placement, orderId: id };
		this.track(order);
		this.balances.applyPending(...this.pendingFor(order));
		this.logger.info({ orderId: id, clientReferenceId: reference }, "ambiguous placement found on venue");
		return order;
	}

	private pendingFor(order: TrackedOrder): [string, Decimal] {
		const requirement = this.requirementFor(order.side, order.price, order.quantity);
		return [requirement.asset, requirement.amount.neg()];
	}

	private requirementFor(side: OrderSide, price: Decimal, quantity: Decimal): { asset: string; amount: Decimal } {
		return side === OrderSide.Buy
			? { asset: this.assets.quote, amount: price.mul(quantity) }
			: { asset: this.assets.base, amount: quantity };
	}

	private halt(side: OrderSide, detail: string): void {
		this.rebalanceNeeded = true;
		if (this.haltedSides.has(side)) return;
		this.haltedSides.add(side);
		this.logger.warn({ side, detail }, "insufficient funds; halting side until funds return");
		this.events.emit("halted", side, detail);
	}

	private skip(side: OrderSide, price: Decimal, reason: SkipReason, detail: string): PlacementResult {
		if (reason !== SkipReason.MonitorMode && reason !== SkipReason.DuplicateLevel) {
			this.logger.warn({ side, price: price.toString(), reason, detail }, "placement skipped");
		}
		return { kind: "skipped", side, price, reason, detail };
	}

	private track(order: TrackedOrder): void {
		this.open.set(order.orderId, order);
	}

	private untrack(order: TrackedOrder): void {
		this.open.delete(order.orderId);
	}

	private hasLevel(side: OrderSide, price: Decimal): boolean {
		const key = levelKey(side, price);
		for (const order of this.open.values()) {
			if (levelKey(order.side, order.price) === key) return true;
		}
		for (const placement of this.ambiguous.values()) {
			if (levelKey(placement.side, placement.price) === key) return true;
		}
		return false;
	}

	private countLevels(side: OrderSide): number {
		let count = 0;
		for (const order of this.open.values()) if (order.side === side) count++;
		for (const placement of this.ambiguous.values()) if (placement.side === side) count++;
		return count;
	}

	/** Up to `count` free level prices on `side`, nearest to `ref` first. */
	private buildLevels(ref: Decimal, side: OrderSide, count: number): Decimal[] {
		const taken = new Set<string>();
		for (const order of this.open.values()) taken.add(levelKey(order.side, order.price));
		for (const placement of this.ambiguous.values()) taken.add(levelKey(placement.side, placement.price));

		const limit = count + taken.size;
		const prices: Decimal[] = [];
		for (let level = 1; prices.length < count && level <= limit; level++) {
			const price = roundDownToTick(this.stepFrom(ref, level, side === OrderSide.Sell), this.config.tickSize);
			if (!price.isPositive()) break;
			const key = levelKey(side, price);
			if (taken.has(key)) continue;
			taken.add(key);
			prices.push(price);
		}
		return prices;
	}

	/**
	 * The round trip an order belongs to. A sell placed against a fill pairs
	 * with that buy; anything else pairs with its tick-rounded neighbour.
	 */
	private pairFor(side: OrderSide, price: Decimal, costBasis: Decimal | null): { buy: Decimal; sell: Decimal } {
		if (side === OrderSide.Sell && costBasis !== null) return { buy: costBasis, sell: price };
		const counter = roundDownToTick(this.stepFrom(price, 1, side === OrderSide.Buy), this.config.tickSize);
		return side === OrderSide.Buy ? { buy: price, sell: counter } : { buy: counter, sell: price };
	}

	/** One step above a filled buy, raised to the first tick that still pays the round trip. */
	private sellAbove(buyPrice: Decimal): Decimal {
		const floor = roundUpToTick(
			minProfitableSellPrice(buyPrice, this.config.totalFeeRate, this.config.feeBufferPct),
			this.config.tickSize,
		);
		return Decimal.max(roundDownToTick(this.stepFrom(buyPrice, 1, true), this.config.tickSize), floor);
	}

	private stepFrom(price: Decimal, levels: number, upward: boolean): Decimal {
		const delta =
			this.config.stepMode === StepMode.Pct ? price.mul(this.step).mul(levels) : this.step.mul(levels);
		return upward ? price.add(delta) : price.sub(delta);
	}

	private raiseHighestSell(price: Decimal): void {
		if (this.highestSellPrice === null || price.gt(this.highestSellPrice)) {
			this.highestSellPrice = price;
		}
	}

	/** `{prefix}-{micros}`, strictly increasing within the process. */
	private nextClientReferenceId(prefix: string): ClientReferenceId {
		const micros = Math.max(Math.floor(this.clock.now() * 1000), this.lastReferenceMicros + 1);
		this.lastReferenceMicros = micros;
		return clientReferenceId(`${prefix}-${micros}`);
	}

	private fromVenueOrder(venueOrder: VenueOrder): TrackedOrder | null {
		const { side, price, quantity } = venueOrder;
		if (side === undefined || price === undefined || quantity === undefined) {
			this.logger.warn({ orderId: venueOrder.orderId }, "venue order missing side, price or quantity; not adopted");
			return null;
		}
		return {
			orderId: venueOrder.orderId,
			clientReferenceId: venueOrder.clientReferenceId ?? clientReferenceId(venueOrder.orderId),
			side,
			price,
			quantity,
			costBasis: null,
			createdAtMs: this.clock.now(),
		};
	}

	private fromStoredOrder(stored: StoredOrder): TrackedOrder {
		return {
			orderId: orderId(stored.orderId),
			clientReferenceId: clientReferenceId(stored.clientReferenceId),
			side: stored.side,
			price: Decimal.from(stored.price),
			quantity: Decimal.from(stored.quantity),
			costBasis: optionalDecimal(stored.costBasis),
			createdAtMs: stored.createdAtMs,
		};
	}
}

/** Set by `classifyHttpFailure`; the one place venue wording is matched. */
function isInsufficientFunds(error: TradingError): boolean {
	return error.context["insufficientFunds"] === true;
}
