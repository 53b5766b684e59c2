/**
 * Venue payload parsing — unwraps envelopes and normalizes loosely typed
 * fields into domain values. Every venue spelling of an order status goes
 * through normalizeStatus().
 */

import { ValidationError, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { clientReferenceId, orderId } from "../shared/identifiers.js";
import { parseSide } from "../shared/side.js";
import { OrderStatus } from "./types.js";
import type { Balance, Ticker, VenueOrder } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Returns `data` or `result` when the venue wrapped its payload, else the payload itself. */
export function unwrapPayload(response: unknown): unknown {
	if (isRecord(response)) {
		if ("data" in response) return response["data"];
		if ("result" in response) return response["result"];
	}
	return response;
}

// ── Status ───────────────────────────────────────────────────────────

const STATUS_SPELLINGS: Readonly<Record<string, OrderStatus>> = {
	active: OrderStatus.Open,
	new: OrderStatus.Open,
	open: OrderStatus.Open,
	pending: OrderStatus.Open,
	placed: OrderStatus.Open,
	partlyfilled: OrderStatus.PartiallyFilled,
	partiallyfilled: OrderStatus.PartiallyFilled,
	partial: OrderStatus.PartiallyFilled,
	filled: OrderStatus.Filled,
	closed: OrderStatus.Filled,
	done: OrderStatus.Filled,
	cancelled: OrderStatus.Cancelled,
	canceled: OrderStatus.Cancelled,
	rejected: OrderStatus.Rejected,
	expired: OrderStatus.Expired,
};

/**
 * Maps a venue status string onto the closed status set.
 * @example normalizeStatus("Partly Filled") // "partially_filled"
 */
export function normalizeStatus(raw: string): OrderStatus {
	const key = raw.toLowerCase().replace(/[\s_-]+/g, "");
	return STATUS_SPELLINGS[key] ?? OrderStatus.Unknown;
}

// ── Orders ───────────────────────────────────────────────────────────

const IdLike = z.union([z.string(), z.number()]).transform((v) => String(v));

const RawOrderSchema = z
	.object({
		id: IdLike.optional(),
		orderId: IdLike.optional(),
		userProvidedId: z.string().nullish(),
		symbol: z.string().optional(),
		side: z.string().optional(),
		price: z.unknown(),
		quantity: z.unknown(),
		executedQuantity: z.unknown(),
		filled: z.unknown(),
		filledQuantity: z.unknown(),
		avgPrice: z.unknown(),
		averagePrice: z.unknown(),
		status: z.string().optional(),
	})
	.passthrough();

function firstDecimal(...values: unknown[]): Decimal | undefined {
	for (const value of values) {
		const parsed = Decimal.parse(value);
		if (parsed !== null) return parsed;
	}
	return undefined;
}

/**
 * Parses one venue order. A "closed" order with nothing executed is a
 * cancellation, not a fill.
 * @param fallbackId - Used when the payload carries no id (e.g. getorder/{id})
 * @throws ValidationError when the payload is not an order object or has no id
 */
export function parseOrder(raw: unknown, fallbackId?: string): VenueOrder {
	const parsed = validate(RawOrderSchema, raw, "Order payload");
	if (!parsed.ok) throw parsed.error;
	const o = parsed.value;

	const id = o.id ?? o.orderId ?? fallbackId;
	if (id === undefined || id.trim() === "") {
		throw new ValidationError("Order payload has no id", { payload: raw });
	}
	const rawStatus = o.status ?? "";
	const filledQuantity = firstDecimal(o.executedQuantity, o.filledQuantity, o.filled);
	let status = normalizeStatus(rawStatus);
	if (rawStatus.trim().toLowerCase() === "closed" && filledQuantity?.isZero() === true) {
		status = OrderStatus.Cancelled;
	}
	const userProvidedId = o.userProvidedId ?? undefined;

	return {
		orderId: orderId(id),
		clientReferenceId:
			userProvidedId !== undefined && userProvidedId.trim() !== ""
				? clientReferenceId(userProvidedId)
				: undefined,
		symbol: o.symbol,
		side: parseSide(o.side) ?? undefined,
		price: firstDecimal(o.price),
		quantity: firstDecimal(o.quantity),
		filledQuantity,
		avgPrice: firstDecimal(o.avgPrice, o.averagePrice),
		status,
		rawStatus,
	};
}

/** Parses an order list; entries that are not orders are dropped. */
export function parseOrders(raw: unknown): VenueOrder[] {
	let list: unknown[] = [];
	if (Array.isArray(raw)) {
		list = raw;
	} else if (isRecord(raw) && Array.isArray(raw["orders"])) {
		list = raw["orders"];
	}
	const orders: VenueOrder[] = [];
	for (const item of list) {
		try {
			orders.push(parseOrder(item));
		} catch (error) {
			if (!(error instanceof ValidationError)) throw error;
		}
	}
	return orders;
}

// ── Balances ─────────────────────────────────────────────────────────

const RawBalanceSchema = z.object({
	asset: z.string().min(1),
	available: z.unknown(),
	held: z.unknown(),
});

/** Parses the balances list; missing amounts default to zero. */
export function parseBalances(raw: unknown): Balance[] {
	const parsed = validate(z.array(RawBalanceSchema), raw ?? [], "Balances payload");
	if (!parsed.ok) throw parsed.error;
	return parsed.value.map((b) => ({
		asset: b.asset.toUpperCase(),
		available: Decimal.parse(b.available) ?? Decimal.zero(),
		held: Decimal.parse(b.held) ?? Decimal.zero(),
	}));
}

// ── Ticker ───────────────────────────────────────────────────────────

const LAST_PRICE_KEYS = ["last_price", "last", "lastPrice", "price"] as const;

/**
 * Last traded price from whichever field the venue filled in, else the
 * bid/ask midpoint; null when neither is available.
 */
export function resolveLastPrice(payload: Readonly<Record<string, unknown>>): Decimal | null {
	for (const key of LAST_PRICE_KEYS) {
		const value = Decimal.parse(payload[key]);
		if (value !== null) return value;
	}
	const bid = Decimal.parse(payload["bid"]);
	const ask = Decimal.parse(payload["ask"]);
	if (bid !== null && ask !== null) {
		return bid.add(ask).div(2);
	}
	return null;
}

export function parseTicker(raw: unknown, symbol: string): Ticker {
	const payload = isRecord(raw) ? raw : {};
	const reported = payload["symbol"];
	return {
		symbol: typeof reported === "string" && reported !== "" ? reported : symbol,
		lastPrice: resolveLastPrice(payload),
		bid: Decimal.parse(payload["bid"]),
		ask: Decimal.parse(payload["ask"]),
		volume: Decimal.parse(payload["volume"]),
	};
}
