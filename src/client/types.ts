/**
 * REST client bounded context — venue-facing types.
 */

import type { HttpMethod, QueryParams } from "../auth/types.js";
import type { Decimal } from "../shared/decimal.js";
import type { ClientReferenceId, OrderId } from "../shared/identifiers.js";
import type { OrderSide } from "../shared/side.js";

// ── Order status ─────────────────────────────────────────────────────

/** Closed set of order statuses after normalizing venue spellings. */
export const OrderStatus = {
	Open: "open",
	PartiallyFilled: "partially_filled",
	Filled: "filled",
	Cancelled: "cancelled",
	Rejected: "rejected",
	Expired: "expired",
	/** Not yet acknowledged, or a venue spelling we do not recognise. */
	Unknown: "unknown",
} as const;

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

const TERMINAL: ReadonlySet<OrderStatus> = new Set([
	OrderStatus.Filled,
	OrderStatus.Cancelled,
	OrderStatus.Rejected,
	OrderStatus.Expired,
]);

export function isTerminalStatus(status: OrderStatus): boolean {
	return TERMINAL.has(status);
}

// ── Venue payloads ───────────────────────────────────────────────────

/** An order as reported by the venue. Fields the venue omitted are undefined. */
export interface VenueOrder {
	readonly orderId: OrderId;
	readonly clientReferenceId: ClientReferenceId | undefined;
	readonly symbol: string | undefined;
	readonly side: OrderSide | undefined;
	readonly price: Decimal | undefined;
	readonly quantity: Decimal | undefined;
	readonly filledQuantity: Decimal | undefined;
	readonly avgPrice: Decimal | undefined;
	readonly status: OrderStatus;
	/** The venue's own spelling, kept for logs. */
	readonly rawStatus: string;
}

export interface Balance {
	readonly asset: string;
	readonly available: Decimal;
	readonly held: Decimal;
}

export interface Ticker {
	readonly symbol: string;
	readonly lastPrice: Decimal | null;
	readonly bid: Decimal | null;
	readonly ask: Decimal | null;
	readonly volume: Decimal | null;
}

export type OrderType = "limit" | "market";

export interface CreateOrderRequest {
	readonly symbol: string;
	readonly side: OrderSide;
	readonly type: OrderType;
	readonly quantity: Decimal;
	readonly price?: Decimal;
	readonly userProvidedId?: ClientReferenceId;
	readonly strictValidate?: boolean;
}

export type CancelTarget = { readonly id: OrderId } | { readonly userProvidedId: ClientReferenceId };

export interface CancelResult {
	readonly orderId: string;
	readonly success: boolean;
}

// ── Transport ────────────────────────────────────────────────────────

/** One logical call; `send` turns it into one or more signed HTTP attempts. */
export interface RestRequest {
	readonly method: HttpMethod;
	/** Path under the base URL, e.g. `/api/v2/balances`. */
	readonly path: string;
	readonly params?: QueryParams;
	readonly body?: Readonly<Record<string, unknown>>;
	/** Defaults to true; public market data may be sent unsigned. */
	readonly signed?: boolean;
}

/** Injectable `fetch` so tests never touch the network. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface RestClientOptions {
	readonly baseUrl: string;
	readonly timeoutMs: number;
	/** Retries after the first attempt for transient and rate-limit failures. */
	readonly maxRetries: number;
	/** Base of the exponential retry backoff, in milliseconds. */
	readonly backoffFactorMs: number;
}
