import { describe, expect, it } from "vitest";
import { ValidationError } from "../shared/errors.js";
import {
	normalizeStatus,
	parseBalances,
	parseOrder,
	parseOrders,
	parseTicker,
	resolveLastPrice,
	unwrapPayload,
} from "./parse.js";
import { OrderStatus, isTerminalStatus } from "./types.js";

describe("unwrapPayload", () => {
	it("prefers data, then result, then the payload itself", () => {
		expect(unwrapPayload({ data: [1], result: [2] })).toEqual([1]);
		expect(unwrapPayload({ result: { id: "x" } })).toEqual({ id: "x" });
		expect(unwrapPayload([3])).toEqual([3]);
	});
});

describe("normalizeStatus", () => {
	it.each([
		["Active", OrderStatus.Open],
		["New", OrderStatus.Open],
		["Partly Filled", OrderStatus.PartiallyFilled],
		["partially_filled", OrderStatus.PartiallyFilled],
		["Filled", OrderStatus.Filled],
		["Closed", OrderStatus.Filled],
		["Cancelled", OrderStatus.Cancelled],
		["Canceled", OrderStatus.Cancelled],
		["REJECTED", OrderStatus.Rejected],
		["expired", OrderStatus.Expired],
		["Suspended", OrderStatus.Unknown],
	])("%s maps to %s", (raw, expected) => {
		expect(normalizeStatus(raw)).toBe(expected);
	});

	it("marks only filled, cancelled, rejected and expired as terminal", () => {
		expect(isTerminalStatus(OrderStatus.Filled)).toBe(true);
		expect(isTerminalStatus(OrderStatus.Expired)).toBe(true);
		expect(isTerminalStatus(OrderStatus.PartiallyFilled)).toBe(false);
		expect(isTerminalStatus(OrderStatus.Unknown)).toBe(false);
	});
});

describe("parseOrder", () => {
	it("reads ids, side and decimal fields", () => {
		const order = parseOrder({
			id: 42,
			userProvidedId: "ladder-buy-1",
			symbol: "BTC_USDT",
			side: "BUY",
			price: "88200.00",
			quantity: 0.5,
			executedQuantity: "0",
			status: "Active",
		});
		expect(order.orderId).toBe("42");
		expect(order.clientReferenceId).toBe("ladder-buy-1");
		expect(order.side).toBe("buy");
		expect(order.price?.toString()).toBe("88200");
		expect(order.quantity?.toString()).toBe("0.5");
		expect(order.status).toBe(OrderStatus.Open);
		expect(order.rawStatus).toBe("Active");
	});

	it("treats a closed order with nothing executed as cancelled", () => {
		const order = parseOrder({ id: "c1", status: "Closed", executedQuantity: "0" });
		expect(order.status).toBe(OrderStatus.Cancelled);
	});

	it("uses the fallback id and rejects payloads without one", () => {
		expect(parseOrder({ status: "Filled" }, "ord-5").orderId).toBe("ord-5");
		expect(() => parseOrder({ status: "Filled" })).toThrow(ValidationError);
		expect(() => parseOrder("nope")).toThrow(ValidationError);
	});

	it("parseOrders drops malformed entries and accepts an orders envelope", () => {
		const orders = parseOrders({ orders: [{ id: "a", status: "Active" }, { status: "Active" }, 7] });
		expect(orders.map((o) => o.orderId)).toEqual(["a"]);
		expect(parseOrders(null)).toEqual([]);
	});
});

describe("parseBalances", () => {
	it("normalizes asset names and defaults missing amounts to zero", () => {
		const balances = parseBalances([
			{ asset: "btc", available: "0.5", held: "0.1" },
			{ asset: "USDT", available: 1000 },
		]);
		expect(balances.map((b) => [b.asset, b.available.toString(), b.held.toString()])).toEqual([
			["BTC", "0.5", "0.1"],
			["USDT", "1000", "0"],
		]);
	});

	it("rejects a payload that is not a list", () => {
		expect(() => parseBalances({ asset: "BTC" })).toThrow(ValidationError);
	});
});

describe("resolveLastPrice / parseTicker", () => {
	it("checks last_price, last, lastPrice and price in order", () => {
		expect(resolveLastPrice({ last: "2", price: "3" })?.toString()).toBe("2");
		expect(resolveLastPrice({ last_price: "", lastPrice: "4" })?.toString()).toBe("4");
		expect(resolveLastPrice({ price: 5 })?.toString()).toBe("5");
	});

	it("falls back to the midpoint and then to null", () => {
		expect(resolveLastPrice({ bid: "99", ask: "100" })?.toString()).toBe("99.5");
		expect(resolveLastPrice({ bid: "99" })).toBeNull();
	});

	it("keeps the requested symbol when the venue omits it", () => {
		const ticker = parseTicker({ last: "1.25", volume: "10" }, "ABC_USDT");
		expect(ticker.symbol).toBe("ABC_USDT");
		expect(ticker.volume?.toString()).toBe("10");
		expect(ticker.bid).toBeNull();
	});
});
