import { describe, expect, it } from "vitest";
import { AuthenticationError, TransientApiError, ValidationError } from "../shared/errors.js";
import { FakeClock } from "../shared/time.js";
import { ServerTimeClock, parseServerTime } from "./server-time.js";

describe("parseServerTime", () => {
	it("reads milliseconds under the usual keys", () => {
		expect(parseServerTime({ serverTime: 1_700_000_005_000 })).toBe(1_700_000_005_000);
		expect(parseServerTime({ timestamp: "1700000005000" })).toBe(1_700_000_005_000);
	});

	it("unwraps data and scales seconds to milliseconds", () => {
		expect(parseServerTime({ data: { server_time: "1700000005" } })).toBe(1_700_000_005_000);
		expect(parseServerTime(1_700_000_005.5)).toBe(1_700_000_005_500);
	});

	it("rejects payloads without a usable time", () => {
		expect(() => parseServerTime({ time: "soon" })).toThrow(ValidationError);
		expect(() => parseServerTime({})).toThrow("Unsupported server time payload");
		expect(() => parseServerTime({ serverTime: 0 })).toThrow(ValidationError);
	});
});

describe("ServerTimeClock", () => {
	function setup(fetchServerTime: () => Promise<number>) {
		const local = new FakeClock(1_000_000);
		const clock = new ServerTimeClock({ fetchServerTime, clock: local, maxAgeMs: 60_000 });
		return { local, clock };
	}

	it("shifts local time by the offset measured at sync", async () => {
		const { local, clock } = setup(async () => 1_000_500);

		expect(clock.now()).toBe(1_000_000);
		await clock.sync();
		expect(clock.offset).toBe(500);
		expect(clock.now()).toBe(1_000_500);
		local.advance(1_000);
		expect(clock.now()).toBe(1_001_500);
	});

	it("syncs again only once the offset is older than maxAgeMs", async () => {
		let calls = 0;
		const { local, clock } = setup(async () => {
			calls++;
			return 2_000_000;
		});

		expect(await clock.syncIfStale()).toBe(true);
		expect(await clock.syncIfStale()).toBe(false);
		local.advance(59_999);
		expect(clock.isStale).toBe(false);
		local.advance(1);
		expect(await clock.syncIfStale()).toBe(true);
		expect(calls).toBe(2);
	});

	it("keeps the last offset when a sync fails", async () => {
		const replies: Array<number | Error> = [1_000_250, new TransientApiError("timeout")];
		const { local, clock } = setup(async () => {
			const next = replies.shift();
			if (next === undefined || next instanceof Error) throw next ?? new Error("no reply left");
			return next;
		});

		await clock.sync();
		local.advance(60_000);
		expect(await clock.syncIfStale()).toBe(true);
		expect(clock.offset).toBe(250);
		expect(clock.isStale).toBe(true);
	});

	it("rethrows fatal failures", async () => {
		const { clock } = setup(async () => {
			throw new AuthenticationError("bad key");
		});

		await expect(clock.syncIfStale()).rejects.toBeInstanceOf(AuthenticationError);
	});
});
