export { RestClient } from "./rest-client.js";
export type { RestClientDeps, RestClientFactoryDeps, RestClientSetup } from "./rest-client.js";
export { OrderStatus, isTerminalStatus } from "./types.js";
export type {
	Balance,
	CancelResult,
	CancelTarget,
	CreateOrderRequest,
	FetchFn,
	OrderType,
	RestClientOptions,
	RestRequest,
	Ticker,
	VenueOrder,
} from "./types.js";
export {
	isRecord,
	normalizeStatus,
	parseBalances,
	parseOrder,
	parseOrders,
	parseTicker,
	resolveLastPrice,
	unwrapPayload,
} from "./parse.js";
export { MIN_NOTIONAL_MESSAGE, classifyHttpFailure, detectMinNotional, parseRetryAfterMs } from "./http-errors.js";
export { computeBackoffMs, withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
