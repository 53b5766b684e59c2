import { describe, expect, it } from "vitest";
import { LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	describe("factories", () => {
		it("creates from string and number", () => {
			expect(LibDecimal.from("1.500").toString()).toBe("1.5");
			expect(LibDecimal.from(100).toString()).toBe("100");
			expect(LibDecimal.from("0.001").toString()).toBe("0.001");
		});

		it("returns the same instance when given a LibDecimal", () => {
			const d = LibDecimal.from("2");
			expect(LibDecimal.from(d)).toBe(d);
		});

		it("rejects empty, non-numeric and non-finite input", () => {
			expect(() => LibDecimal.from("")).toThrow("empty string");
			expect(() => LibDecimal.from("abc")).toThrow('invalid decimal "abc"');
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid number");
		});

		it("parse returns null for venue fields that are not numbers", () => {
			expect(LibDecimal.parse(undefined)).toBeNull();
			expect(LibDecimal.parse("")).toBeNull();
			expect(LibDecimal.parse("n/a")).toBeNull();
			expect(LibDecimal.parse({})).toBeNull();
			expect(LibDecimal.parse("88200.5")?.toString()).toBe("88200.5");
			expect(LibDecimal.parse(3)?.toString()).toBe("3");
		});
	});

	describe("arithmetic precision", () => {
		it("0.1 + 0.2 = 0.3 exactly", () => {
			expect(LibDecimal.from("0.1").add("0.2").toString()).toBe("0.3");
		});

		it("multiplies grid prices without float drift", () => {
			expect(LibDecimal.from("88200").mul("1.02").toString()).toBe("89964");
			expect(LibDecimal.from("101000").mul("0.98").toString()).toBe("98980");
		});

		it("div throws on zero", () => {
			expect(() => LibDecimal.from("1").div("0")).toThrow("division by zero");
		});
	});

	describe("quantization", () => {
		it("floorTo rounds down to the increment", () => {
			expect(LibDecimal.from("1.2399").floorTo("0.01").toString()).toBe("1.23");
			expect(LibDecimal.from("89964.987").floorTo("0.5").toString()).toBe("89964.5");
			expect(LibDecimal.from("-1.231").floorTo("0.01").toString()).toBe("-1.24");
		});

		it("ceilTo rounds up to the increment", () => {
			expect(LibDecimal.from("1.231").ceilTo("0.01").toString()).toBe("1.24");
			expect(LibDecimal.from("2").ceilTo("0.5").toString()).toBe("2");
		});

		it("leaves the value unchanged for a non-positive increment", () => {
			expect(LibDecimal.from("1.2345").floorTo("0").toString()).toBe("1.2345");
		});
	});

	describe("comparison", () => {
		it("cmp and min/max", () => {
			const a = LibDecimal.from("1");
			const b = LibDecimal.from("2");
			expect(a.cmp(b)).toBe(-1);
			expect(b.cmp(a)).toBe(1);
			expect(a.cmp(LibDecimal.from("1.0"))).toBe(0);
			expect(LibDecimal.min(a, b)).toBe(a);
			expect(LibDecimal.max(a, b)).toBe(b);
		});
	});

	it("serializes to a plain JSON string", () => {
		expect(JSON.stringify({ price: LibDecimal.from("90000.10") })).toBe('{"price":"90000.1"}');
	});
});
