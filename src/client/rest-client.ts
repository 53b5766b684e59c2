/**
 * RestClient — signed, rate-limited, retrying access to the venue's v2 API.
 *
 * Every operation goes through `send()`, so bulk and administrative calls
 * raise exactly the same error classes as order placement. Each attempt
 * acquires a rate-limit token, then draws a fresh nonce and re-signs.
 */

import type { Credentials, SigningMode } from "../auth/types.js";
import { NonceGenerator } from "../auth/nonce.js";
import { ServerTimeClock, parseServerTime } from "../auth/server-time.js";
import { RequestSigner, compactSortedJson, serializeQuery } from "../auth/signer.js";
import { TokenBucketRateLimiter } from "../lib/http/rate-limiter.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { Decimal } from "../shared/decimal.js";
import {
	AuthenticationError,
	TransientApiError,
	ValidationError,
	classifyError,
} from "../shared/errors.js";
import type { OrderId } from "../shared/identifiers.js";
import type { OrderSide } from "../shared/side.js";
import { MonotonicClock, SystemClock } from "../shared/time.js";
import type { Clock } from "../shared/time.js";
import { classifyHttpFailure } from "./http-errors.js";
import {
	isRecord,
	normalizeStatus,
	parseBalances,
	parseOrder,
	parseOrders,
	parseTicker,
	unwrapPayload,
} from "./parse.js";
import { withRetry } from "./retry.js";
import { OrderStatus } from "./types.js";
import type {
	Balance,
	CancelResult,
	CancelTarget,
	CreateOrderRequest,
	FetchFn,
	RestClientOptions,
	RestRequest,
	Ticker,
	VenueOrder,
} from "./types.js";

export interface RestClientDeps {
	/** Absent for a read-only client; signed endpoints then fail with AuthenticationError. */
	readonly signer?: RequestSigner;
	readonly limiter: TokenBucketRateLimiter;
	readonly logger?: Logger;
	readonly fetchFn?: FetchFn;
	readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
	readonly random?: () => number;
	/** Synced before each signed request when present. */
	readonly serverTime?: ServerTimeClock;
}

/** Everything `RestClient.create()` needs from the validated configuration. */
export interface RestClientSetup extends RestClientOptions {
	readonly nonceMultiplier: number;
	readonly signingMode: SigningMode;
	readonly rateLimit: { readonly capacity: number; readonly refillPerSecond: number };
	/** Derive nonces from the venue clock instead of the local one. */
	readonly useServerTime?: boolean;
}

export interface RestClientFactoryDeps {
	readonly credentials?: Credentials;
	/** Share one generator between every client signing with the same key. */
	readonly nonces?: NonceGenerator;
	readonly logger?: Logger;
	readonly fetchFn?: FetchFn;
	readonly clock?: Clock;
}

const defaultFetch: FetchFn = (url, init) => fetch(url, init);

export class RestClient {
	private readonly options: RestClientOptions;
	private readonly signer: RequestSigner | undefined;
	private readonly limiter: TokenBucketRateLimiter;
	private readonly logger: Logger;
	private readonly fetchFn: FetchFn;
	private readonly sleep: ((ms: number, signal?: AbortSignal) => Promise<boolean>) | undefined;
	private readonly random: (() => number) | undefined;
	private readonly serverTime: ServerTimeClock | undefined;
	private requestSeq = 0;

	constructor(options: RestClientOptions, deps: RestClientDeps) {
		this.options = options;
		this.signer = deps.signer;
		this.limiter = deps.limiter;
		this.logger = deps.logger ?? silentLogger();
		this.fetchFn = deps.fetchFn ?? defaultFetch;
		this.sleep = deps.sleep;
		this.random = deps.random;
		this.serverTime = deps.serverTime;
	}

	/**
	 * Wires signer, nonce generator and rate limiter from configuration.
	 *
	 * @example
	 * ```ts
	 * const client = RestClient.create(config.api, { credentials, logger });
	 * const balances = await client.getBalances();
	 * ```
	 */
	static create(setup: RestClientSetup, deps: RestClientFactoryDeps = {}): RestClient {
		const clock = deps.clock ?? SystemClock;
		const logger = deps.logger?.child({ component: "rest" });
		const serverTime: ServerTimeClock | undefined =
			setup.useServerTime === true
				? new ServerTimeClock({
						fetchServerTime: () => client.getServerTime(),
						clock: deps.clock ?? MonotonicClock,
						logger,
					})
				: undefined;
		const signer: RequestSigner | undefined =
			deps.credentials !== undefined
				? new RequestSigner({
						credentials: deps.credentials,
						nonces:
							deps.nonces ?? new NonceGenerator({ multiplier: setup.nonceMultiplier, clock: serverTime }),
						signingMode: setup.signingMode,
					})
				: undefined;
		const limiter = new TokenBucketRateLimiter({
			capacity: setup.rateLimit.capacity,
			refillRate: setup.rateLimit.refillPerSecond,
			clock,
		});
		const client: RestClient = new RestClient(setup, {
			signer,
			limiter,
			logger,
			fetchFn: deps.fetchFn,
			serverTime,
		});
		return client;
	}

	/** True when requests can be signed. */
	get authenticated(): boolean {
		return this.signer !== undefined;
	}

	buildUrl(path: string): string {
		return `${this.options.baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
	}

	// ── Transport ──────────────────────────────────────────────────────

	/**
	 * Sends one logical request with retries and returns the parsed JSON
	 * body (`{}` for an empty body).
	 *
	 * @throws AuthenticationError on 401 (never retried)
	 * @throws RateLimitError on 429 once retries are spent
	 * @throws TransientApiError on timeouts, resets and 5xx once retries are spent
	 * @throws ValidationError on any other 4xx
	 */
	async send(request: RestRequest, signal?: AbortSignal): Promise<unknown> {
		if (request.signed !== false && this.serverTime !== undefined) {
			await this.serverTime.syncIfStale();
		}
		this.requestSeq++;
		const log = this.logger.child({
			requestId: `req-${this.requestSeq}`,
			method: request.method,
			path: request.path,
		});
		return withRetry(
			async (attempt) => {
				await this.limiter.acquire(signal);
				return this.sendOnce(request, log, attempt);
			},
			{
				maxRetries: this.options.maxRetries,
				backoffFactorMs: this.options.backoffFactorMs,
				logger: log,
				signal,
				sleep: this.sleep,
				random: this.random,
			},
		);
	}

	private async sendOnce(request: RestRequest, log: Logger, attempt: number): Promise<unknown> {
		const url = this.buildUrl(request.path);
		const isGet = request.method === "GET";
		const query = isGet ? serializeQuery(request.params) : "";
		const bodyObject =
			!isGet && request.body !== undefined && Object.keys(request.body).length > 0 ? request.body : undefined;
		const body = bodyObject !== undefined ? compactSortedJson(bodyObject) : undefined;

		const headers: Record<string, string> = { Accept: "application/json" };
		if (body !== undefined) headers["Content-Type"] = "application/json";

		if (request.signed !== false) {
			if (this.signer === undefined) {
				throw new AuthenticationError("Credentials are required for signed endpoints", {
					endpoint: request.path,
				});
			}
			const signed = this.signer.sign({
				method: request.method,
				url: this.signer.signingMode === "path" ? request.path : url,
				params: isGet ? request.params : undefined,
				body: bodyObject,
			});
			Object.assign(headers, signed.headers);
			log.debug({ attempt, nonce: signed.nonce }, "Signed request");
		}

		const target = query !== "" ? `${url}?${query}` : url;
		let response: Response;
		let text: string;
		try {
			response = await this.fetchFn(target, {
				method: request.method,
				headers,
				body,
				signal: AbortSignal.timeout(this.options.timeoutMs),
			});
			text = await response.text();
		} catch (error) {
			throw classifyError(error);
		}

		if (!response.ok) {
			throw classifyHttpFailure({
				status: response.status,
				payloadText: text,
				retryAfter: response.headers.get("retry-after"),
				endpoint: request.path,
			});
		}
		if (text.trim() === "") return {};
		try {
			const parsed: unknown = JSON.parse(text);
			return parsed;
		} catch (error) {
			throw new TransientApiError("Venue returned a body that is not JSON", {
				cause: error,
				status: response.status,
			});
		}
	}

	// ── Operations ─────────────────────────────────────────────────────

	/** Venue clock in epoch milliseconds. Unsigned. */
	async getServerTime(signal?: AbortSignal): Promise<number> {
		const response = await this.send({ method: "GET", path: "/api/v2/getservertime", signed: false }, signal);
		return parseServerTime(response);
	}

	async getBalances(signal?: AbortSignal): Promise<Balance[]> {
		const response = await this.send({ method: "GET", path: "/api/v2/balances" }, signal);
		return parseBalances(unwrapPayload(response));
	}

	/**
	 * Places an order. A response without an order id is reported as
	 * TransientApiError: the venue may have accepted the order, and the caller
	 * resolves the outcome by matching `userProvidedId` against open orders.
	 */
	async createOrder(req: CreateOrderRequest, signal?: AbortSignal): Promise<VenueOrder> {
		const body: Record<string, unknown> = {
			symbol: req.symbol,
			side: req.side,
			type: req.type,
			quantity: req.quantity.toString(),
		};
		if (req.price !== undefined) body["price"] = req.price.toString();
		if (req.userProvidedId !== undefined) body["userProvidedId"] = req.userProvidedId;
		if (req.strictValidate !== undefined) body["strictValidate"] = req.strictValidate;

		const payload = unwrapPayload(await this.send({ method: "POST", path: "/api/v2/createorder", body }, signal));
		let order: VenueOrder;
		try {
			order = parseOrder(payload);
		} catch (error) {
			throw new TransientApiError("createorder response carried no order id; outcome unknown", {
				cause: error,
				userProvidedId: req.userProvidedId,
			});
		}
		return {
			...order,
			clientReferenceId: order.clientReferenceId ?? req.userProvidedId,
			symbol: order.symbol ?? req.symbol,
			side: order.side ?? req.side,
			price: order.price ?? req.price,
			quantity: order.quantity ?? req.quantity,
		};
	}

	async cancelOrder(target: CancelTarget, signal?: AbortSignal): Promise<CancelResult> {
		const body = "userProvidedId" in target ? { userProvidedId: target.userProvidedId } : { id: target.id };
		const payload = unwrapPayload(await this.send({ method: "POST", path: "/api/v2/cancelorder", body }, signal));
		const record = isRecord(payload) ? payload : {};
		const status = record["status"];
		const success =
			typeof record["success"] === "boolean"
				? record["success"]
				: typeof status === "string" && normalizeStatus(status) === OrderStatus.Cancelled;
		const fallback = "userProvidedId" in target ? target.userProvidedId : target.id;
		const resolved = record["id"] ?? record["orderId"] ?? record["userProvidedId"] ?? fallback;
		return { orderId: String(resolved), success };
	}

	/** Bulk cancel for a symbol, optionally one side only. A list response counts as success. */
	async cancelAllOrders(symbol: string, side?: OrderSide, signal?: AbortSignal): Promise<boolean> {
		const body: Record<string, unknown> = { symbol };
		if (side !== undefined) body["side"] = side;
		const payload = unwrapPayload(
			await this.send({ method: "POST", path: "/api/v2/cancelallorders", body }, signal),
		);
		if (Array.isArray(payload)) return true;
		if (!isRecord(payload)) return false;
		const status = payload["status"];
		return (
			payload["success"] === true ||
			payload["ok"] === true ||
			(typeof status === "string" && normalizeStatus(status) === OrderStatus.Cancelled)
		);
	}

	async getOrder(id: OrderId, signal?: AbortSignal): Promise<VenueOrder> {
		const response = await this.send(
			{ method: "GET", path: `/api/v2/getorder/${encodeURIComponent(id)}` },
			signal,
		);
		return parseOrder(unwrapPayload(response), id);
	}

	/** Open orders for one symbol. */
	async listOpenOrders(symbol: string, signal?: AbortSignal): Promise<VenueOrder[]> {
		const response = await this.send(
			{ method: "GET", path: "/api/v2/getorders", params: { symbol, status: "active" } },
			signal,
		);
		return parseOrders(unwrapPayload(response));
	}

	async getTicker(symbol: string, signal?: AbortSignal): Promise<Ticker> {
		const response = await this.send(
			{
				method: "GET",
				path: `/api/v2/ticker/${encodeURIComponent(symbol)}`,
				signed: this.signer !== undefined,
			},
			signal,
		);
		return parseTicker(unwrapPayload(response), symbol);
	}

	/**
	 * Reference price for a symbol: the last trade, else the bid/ask midpoint.
	 * @throws ValidationError when the ticker carries neither
	 */
	async getMidPrice(symbol: string, signal?: AbortSignal): Promise<Decimal> {
		const ticker = await this.getTicker(symbol, signal);
		if (ticker.lastPrice === null) {
			throw new ValidationError(`Ticker for ${symbol} has no usable price`, { symbol });
		}
		return ticker.lastPrice;
	}
}
