import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { ConfigurationError } from "../shared/errors.js";
import { OrderSide } from "../shared/side.js";
import { baseQuantity, resolveQuantity } from "./sizing.js";
import type { LadderConfig } from "./types.js";

const d = (value: string) => Decimal.from(value);

function config(overrides: Partial<LadderConfig> = {}): LadderConfig {
	return {
		symbol: "BTC_USDT",
		variant: "bounded",
		mode: "live",
		stepMode: "pct",
		stepPct: d("0.02"),
		stepAbs: undefined,
		nBuyLevels: 3,
		nSellLevels: 3,
		baseOrderSize: d("0.001"),
		totalFeeRate: d("0.002"),
		feeBufferPct: d("0.0001"),
		minNotionalQuote: d("10"),
		tickSize: d("0.01"),
		stepSize: d("0.00001"),
		buySizingMode: "fixed",
		sellSizingMode: "fixed",
		targetQuotePerOrder: undefined,
		minBaseOrderQty: undefined,
		minOrderQty: undefined,
		extendBuyLevelsOnRestart: false,
		...overrides,
	};
}

describe("baseQuantity", () => {
	it("uses baseOrderSize in fixed mode", () => {
		expect(baseQuantity(config(), OrderSide.Buy, d("80000"), d("90000")).toString()).toBe("0.001");
	});

	it("divides the quote target by the price in dynamic mode, per side", () => {
		const dynamicBuys = config({ buySizingMode: "dynamic", targetQuotePerOrder: d("100") });
		expect(baseQuantity(dynamicBuys, OrderSide.Buy, d("80000"), null).toString()).toBe("0.00125");
		expect(baseQuantity(dynamicBuys, OrderSide.Sell, d("80000"), null).toString()).toBe("0.001");
	});

	it("derives the quote target from the reference price when none is set", () => {
		const dynamic = config({ sellSizingMode: "dynamic" });
		expect(baseQuantity(dynamic, OrderSide.Sell, d("45000"), d("90000")).toString()).toBe("0.002");
		expect(() => baseQuantity(dynamic, OrderSide.Sell, d("45000"), null)).toThrow(ConfigurationError);
	});

	it("never goes below minBaseOrderQty in hybrid mode", () => {
		const hybrid = config({ buySizingMode: "hybrid", targetQuotePerOrder: d("100"), minBaseOrderQty: d("0.002") });
		expect(baseQuantity(hybrid, OrderSide.Buy, d("80000"), null).toString()).toBe("0.002");
		expect(baseQuantity(hybrid, OrderSide.Buy, d("20000"), null).toString()).toBe("0.005");
		const missing = config({ buySizingMode: "hybrid", targetQuotePerOrder: d("100") });
		expect(() => baseQuantity(missing, OrderSide.Buy, d("80000"), null)).toThrow("minBaseOrderQty");
	});
});

describe("resolveQuantity", () => {
	it("keeps a quantity that already clears the minimum notional", () => {
		const result = resolveQuantity(config(), d("90000"), d("0.001"));
		if (!result.ok) throw new Error(result.detail);
		expect(result.quantity.toString()).toBe("0.001");
	});

	it("bumps a small quantity until the notional clears", () => {
		const result = resolveQuantity(config({ stepSize: d("0.000001") }), d("90000"), d("0.0001"));
		if (!result.ok) throw new Error(result.detail);
		expect(result.quantity.toString()).toBe("0.000116");
	});

	it("skips when the lot step swallows every bump", () => {
		const result = resolveQuantity(config(), d("90000"), d("0.0001"));
		expect(result).toEqual({ ok: false, reason: "below-min-notional", detail: "9.9 < 10" });
	});

	it("skips quantities that round to zero or fall under minOrderQty", () => {
		expect(resolveQuantity(config({ stepSize: d("0.01") }), d("90000"), d("0.001"))).toMatchObject({
			ok: false,
			reason: "invalid-quantity",
		});
		expect(resolveQuantity(config({ minOrderQty: d("0.01") }), d("90000"), d("0.001"))).toEqual({
			ok: false,
			reason: "below-min-quantity",
			detail: "0.001 < 0.01",
		});
	});

	it("rejects a non-positive price", () => {
		expect(resolveQuantity(config(), d("0"), d("0.001"))).toMatchObject({ ok: false, reason: "invalid-price" });
	});
});
