import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import { createCredentials } from "../auth/credentials.js";
import { NonceGenerator } from "../auth/nonce.js";
import { RequestSigner } from "../auth/signer.js";
import { TokenBucketRateLimiter } from "../lib/http/rate-limiter.js";
import { Decimal } from "../shared/decimal.js";
import {
	AuthenticationError,
	RateLimitError,
	TransientApiError,
	ValidationError,
} from "../shared/errors.js";
import { clientReferenceId, orderId } from "../shared/identifiers.js";
import { OrderSide } from "../shared/side.js";
import { FakeClock } from "../shared/time.js";
import { MIN_NOTIONAL_MESSAGE } from "./http-errors.js";
import { RestClient } from "./rest-client.js";
import { OrderStatus } from "./types.js";
import type { FetchFn, RestClientOptions } from "./types.js";

interface RecordedCall {
	readonly url: string;
	readonly init: RequestInit;
}

const json = (body: unknown, status = 200, headers?: Record<string, string>) =>
	new Response(JSON.stringify(body), { status, headers });

function buildClient(
	responses: Array<Response | Error>,
	overrides: Partial<RestClientOptions> = {},
	withSigner = true,
) {
	const calls: RecordedCall[] = [];
	const fetchFn: FetchFn = async (url, init) => {
		calls.push({ url, init });
		const next = responses.shift();
		if (next === undefined) throw new Error("no scripted response left");
		if (next instanceof Error) throw next;
		return next;
	};
	const sleeps: number[] = [];
	const signer = withSigner
		? new RequestSigner({
				credentials: createCredentials({ apiKey: "test-key", apiSecret: "test-secret" }),
				nonces: new NonceGenerator({ clock: new FakeClock(1_000) }),
			})
		: undefined;
	const client = new RestClient(
		{
			baseUrl: "https://api.nonkyc.io/",
			timeoutMs: 1_000,
			maxRetries: 3,
			backoffFactorMs: 500,
			...overrides,
		},
		{
			signer,
			limiter: new TokenBucketRateLimiter({ capacity: 100, refillRate: 100, clock: new FakeClock(0) }),
			fetchFn,
			sleep: async (ms) => {
				sleeps.push(ms);
				return true;
			},
			random: () => 0,
		},
	);
	return { client, calls, sleeps };
}

function headersOf(call: RecordedCall | undefined): Headers {
	return new Headers(call?.init.headers);
}

function hmac(message: string): string {
	return createHmac("sha256", "test-secret").update(message).digest("hex");
}

describe("RestClient", () => {
	describe("signing", () => {
		it("signs a GET over the absolute URL with a fresh nonce", async () => {
			const { client, calls } = buildClient([json({ data: [] })]);
			await client.getBalances();

			expect(calls[0]?.url).toBe("https://api.nonkyc.io/api/v2/balances");
			const headers = headersOf(calls[0]);
			expect(headers.get("X-API-KEY")).toBe("test-key");
			expect(headers.get("X-API-NONCE")).toBe("1000");
			expect(headers.get("X-API-SIGN")).toBe(hmac("test-keyhttps://api.nonkyc.io/api/v2/balances1000"));
		});

		it("re-signs each retry with a new nonce", async () => {
			const { client, calls } = buildClient([new Response("", { status: 503 }), json({ data: [] })]);
			await client.getBalances();
			expect(headersOf(calls[0]).get("X-API-NONCE")).toBe("1000");
			expect(headersOf(calls[1]).get("X-API-NONCE")).toBe("1001");
		});

		it("fails signed endpoints without credentials and sends public ones unsigned", async () => {
			const { client, calls } = buildClient([json({ last_price: "90000" })], {}, false);
			await expect(client.getBalances()).rejects.toBeInstanceOf(AuthenticationError);

			const ticker = await client.getTicker("BTC_USDT");
			expect(ticker.lastPrice?.toString()).toBe("90000");
			expect(calls).toHaveLength(1);
			expect(headersOf(calls[0]).get("X-API-KEY")).toBeNull();
		});
	});

	describe("operations", () => {
		it("createOrder sends the compact sorted body and fills gaps from the request", async () => {
			const { client, calls } = buildClient([json({ data: { id: "ord-1", status: "Active" } })]);
			const order = await client.createOrder({
				symbol: "BTC_USDT",
				side: OrderSide.Buy,
				type: "limit",
				quantity: Decimal.from("0.001"),
				price: Decimal.from("88200"),
				userProvidedId: clientReferenceId("ladder-buy-1"),
				strictValidate: true,
			});

			expect(calls[0]?.init.method).toBe("POST");
			expect(calls[0]?.init.body).toBe(
				'{"price":"88200","quantity":"0.001","side":"buy","strictValidate":true,"symbol":"BTC_USDT","type":"limit","userProvidedId":"ladder-buy-1"}',
			);
			expect(headersOf(calls[0]).get("Content-Type")).toBe("application/json");
			expect(order.orderId).toBe("ord-1");
			expect(order.status).toBe(OrderStatus.Open);
			expect(order.price?.toString()).toBe("88200");
			expect(order.clientReferenceId).toBe("ladder-buy-1");
		});

		it("createOrder reports an unknown outcome when the venue returns no id", async () => {
			const { client } = buildClient([json({ data: { status: "ok" } })], { maxRetries: 0 });
			await expect(
				client.createOrder({
					symbol: "BTC_USDT",
					side: OrderSide.Sell,
					type: "limit",
					quantity: Decimal.from("1"),
					price: Decimal.from("100"),
				}),
			).rejects.toBeInstanceOf(TransientApiError);
		});

		it("cancelOrder by reference id reads the success flag", async () => {
			const { client, calls } = buildClient([json({ result: { id: "ord-9", success: true } })]);
			const result = await client.cancelOrder({ userProvidedId: clientReferenceId("ladder-sell-5") });
			expect(calls[0]?.init.body).toBe('{"userProvidedId":"ladder-sell-5"}');
			expect(result).toEqual({ orderId: "ord-9", success: true });
		});

		it("cancelOrder by id falls back to the status field", async () => {
			const { client } = buildClient([json({ status: "Cancelled" })]);
			const result = await client.cancelOrder({ id: orderId("ord-3") });
			expect(result).toEqual({ orderId: "ord-3", success: true });
		});

		it("cancelAllOrders posts symbol and side", async () => {
			const { client, calls } = buildClient([json({ data: ["ord-1", "ord-2"] })]);
			await expect(client.cancelAllOrders("BTC_USDT", OrderSide.Sell)).resolves.toBe(true);
			expect(calls[0]?.url).toBe("https://api.nonkyc.io/api/v2/cancelallorders");
			expect(calls[0]?.init.body).toBe('{"side":"sell","symbol":"BTC_USDT"}');
		});

		it("getOrder parses the venue order and keeps the requested id", async () => {
			const { client, calls } = buildClient([
				json({ data: { status: "Filled", price: "88200", quantity: "0.002", executedQuantity: "0.002" } }),
			]);
			const order = await client.getOrder(orderId("ord-7"));
			expect(calls[0]?.url).toBe("https://api.nonkyc.io/api/v2/getorder/ord-7");
			expect(order.orderId).toBe("ord-7");
			expect(order.status).toBe(OrderStatus.Filled);
			expect(order.filledQuantity?.toString()).toBe("0.002");
		});

		it("listOpenOrders queries active orders for the symbol", async () => {
			const { client, calls } = buildClient([
				json([
					{ id: "a", side: "buy", price: "1", quantity: "2", status: "Active" },
					{ id: "b", side: "sell", price: "3", quantity: "2", status: "Partly Filled" },
				]),
			]);
			const orders = await client.listOpenOrders("BTC_USDT");
			expect(calls[0]?.url).toBe("https://api.nonkyc.io/api/v2/getorders?status=active&symbol=BTC_USDT");
			expect(orders.map((o) => [o.orderId, o.side, o.status])).toEqual([
				["a", "buy", "open"],
				["b", "sell", "partially_filled"],
			]);
		});

		it("getMidPrice falls back to the bid/ask midpoint", async () => {
			const { client } = buildClient([json({ data: { bid: "100", ask: "102" } })]);
			const mid = await client.getMidPrice("BTC_USDT");
			expect(mid.toString()).toBe("101");
		});

		it("getMidPrice rejects a ticker without prices", async () => {
			const { client } = buildClient([json({ data: { volume: "5" } })]);
			await expect(client.getMidPrice("BTC_USDT")).rejects.toBeInstanceOf(ValidationError);
		});
	});

	describe("error classification and retry", () => {
		it("does not retry a 401 and includes the endpoint", async () => {
			const { client, calls, sleeps } = buildClient([new Response("unauthorized", { status: 401 })]);
			const error = await client.getBalances().catch((e: unknown) => e);
			expect(error).toBeInstanceOf(AuthenticationError);
			expect(error instanceof Error ? error.message : "").toContain("Endpoint: /api/v2/balances");
			expect(calls).toHaveLength(1);
			expect(sleeps).toEqual([]);
		});

		it("retries a 5xx with exponential backoff", async () => {
			const { client, calls, sleeps } = buildClient([
				new Response("", { status: 502 }),
				new Response("", { status: 504 }),
				json({ data: [{ asset: "usdt", available: "10", held: "0" }] }),
			]);
			const balances = await client.getBalances();
			expect(balances[0]?.asset).toBe("USDT");
			expect(calls).toHaveLength(3);
			expect(sleeps).toEqual([500, 1000]);
		});

		it("waits the Retry-After hint on 429", async () => {
			const { client, sleeps } = buildClient([
				new Response("", { status: 429, headers: { "Retry-After": "2" } }),
				json({ data: [] }),
			]);
			await client.getBalances();
			expect(sleeps).toEqual([2000]);
		});

		it("gives up after maxRetries with the last transient error", async () => {
			const { client, calls, sleeps } = buildClient([
				new Response("", { status: 503 }),
				new Response("", { status: 503 }),
				new Response("", { status: 503 }),
				new Response("", { status: 503 }),
			]);
			await expect(client.getBalances()).rejects.toBeInstanceOf(TransientApiError);
			expect(calls).toHaveLength(4);
			expect(sleeps).toEqual([500, 1000, 2000]);
		});

		it("raises RateLimitError once 429 retries are spent", async () => {
			const { client } = buildClient([new Response("", { status: 429 })], { maxRetries: 0 });
			await expect(client.getBalances()).rejects.toBeInstanceOf(RateLimitError);
		});

		it("classifies bulk cancel failures like every other call", async () => {
			const reset = new TypeError("fetch failed", {
				cause: Object.assign(new Error("socket"), { code: "ECONNRESET" }),
			});
			const { client, calls } = buildClient([reset, reset, reset, reset]);
			await expect(client.cancelAllOrders("BTC_USDT")).rejects.toBeInstanceOf(TransientApiError);
			expect(calls).toHaveLength(4);
		});

		it("reports min-notional rejections without retrying", async () => {
			const { client, calls } = buildClient([json({ error: { code: "MIN_NOTIONAL" } }, 400)]);
			const error = await client
				.createOrder({
					symbol: "BTC_USDT",
					side: OrderSide.Buy,
					type: "limit",
					quantity: Decimal.from("0.00001"),
					price: Decimal.from("90000"),
				})
				.catch((e: unknown) => e);
			expect(error).toBeInstanceOf(ValidationError);
			expect(error instanceof Error ? error.message : "").toContain(MIN_NOTIONAL_MESSAGE);
			expect(calls).toHaveLength(1);
		});

		it("treats a non-JSON success body as transient", async () => {
			const { client } = buildClient([new Response("<html>busy</html>", { status: 200 })], { maxRetries: 0 });
			await expect(client.getBalances()).rejects.toBeInstanceOf(TransientApiError);
		});

		it("returns an empty object for an empty body", async () => {
			const { client } = buildClient([new Response("", { status: 200 })]);
			await expect(client.send({ method: "POST", path: "/api/v2/cancelorder", body: { id: "x" } })).resolves.toEqual(
				{},
			);
		});
	});

	describe("server time", () => {
		function routed(timeResponse: () => Response) {
			const calls: RecordedCall[] = [];
			const fetchFn: FetchFn = async (url, init) => {
				calls.push({ url, init });
				return url.endsWith("/api/v2/getservertime") ? timeResponse() : json({ data: [] });
			};
			const client = RestClient.create(
				{
					baseUrl: "https://api.nonkyc.io",
					timeoutMs: 1_000,
					maxRetries: 0,
					backoffFactorMs: 500,
					nonceMultiplier: 1,
					signingMode: "absolute",
					rateLimit: { capacity: 10, refillPerSecond: 10 },
					useServerTime: true,
				},
				{
					credentials: createCredentials({ apiKey: "test-key", apiSecret: "test-secret" }),
					fetchFn,
					clock: new FakeClock(1_700_000_000_000),
				},
			);
			return { client, calls };
		}

		it("derives nonces from the venue clock", async () => {
			const { client, calls } = routed(() => json({ serverTime: 1_700_000_005_000 }));

			await client.getBalances();

			expect(calls.map((c) => c.url)).toEqual([
				"https://api.nonkyc.io/api/v2/getservertime",
				"https://api.nonkyc.io/api/v2/balances",
			]);
			expect(headersOf(calls[0]).get("X-API-KEY")).toBeNull();
			expect(headersOf(calls[1]).get("X-API-NONCE")).toBe("1700000005000");
		});

		it("falls back to the local clock when the time endpoint fails", async () => {
			const { client, calls } = routed(() => new Response("", { status: 503 }));

			await client.getBalances();

			expect(calls).toHaveLength(2);
			expect(headersOf(calls[1]).get("X-API-NONCE")).toBe("1700000000000");
		});
	});
});
