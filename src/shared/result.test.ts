import { describe, expect, it } from "vitest";
import { err, isErr, isOk, map, mapErr, ok, unwrap, unwrapOr } from "./result.js";

describe("Result", () => {
	it("ok wraps a value", () => {
		const r = ok(42);
		expect(isOk(r)).toBe(true);
		if (r.ok) expect(r.value).toBe(42);
	});

	it("err wraps an error", () => {
		const r = err("rejected");
		expect(isErr(r)).toBe(true);
		if (!r.ok) expect(r.error).toBe("rejected");
	});

	it("map transforms only successes", () => {
		expect(map(ok(2), (n) => n * 3)).toEqual({ ok: true, value: 6 });
		expect(map(err("x"), (n: number) => n * 3)).toEqual({ ok: false, error: "x" });
	});

	it("mapErr transforms only failures", () => {
		expect(mapErr(err("x"), (e) => `${e}!`)).toEqual({ ok: false, error: "x!" });
		expect(mapErr(ok(1), (e: string) => `${e}!`)).toEqual({ ok: true, value: 1 });
	});

	it("unwrap throws the carried Error", () => {
		const failure = new Error("bad config");
		expect(() => unwrap(err(failure))).toThrow(failure);
		expect(() => unwrap(err("plain"))).toThrow("plain");
		expect(unwrap(ok("v"))).toBe("v");
	});

	it("unwrapOr falls back on error", () => {
		expect(unwrapOr(err("x"), 7)).toBe(7);
		expect(unwrapOr(ok(3), 7)).toBe(3);
	});
});
