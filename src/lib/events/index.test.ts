import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type TestEvents = {
	fill: (fill: { orderId: string; price: string }) => void;
	stateChange: (from: string, to: string) => void;
	halted: () => void;
};

describe("TypedEmitter", () => {
	it("emit() triggers registered handlers with their arguments", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("stateChange", handler);
		emitter.emit("stateChange", "connecting", "streaming");

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith("connecting", "streaming");
	});

	it("off() removes a listener", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.on("fill", handler);
		emitter.off("fill", handler);
		emitter.emit("fill", { orderId: "o-1", price: "100" });

		expect(handler).not.toHaveBeenCalled();
	});

	it("once() fires handler exactly once", () => {
		const emitter = new TypedEmitter<TestEvents>();
		const handler = vi.fn();

		emitter.once("halted", handler);
		emitter.emit("halted");
		emitter.emit("halted");

		expect(handler).toHaveBeenCalledTimes(1);
	});

	it("emit() reports whether anyone listened", () => {
		const emitter = new TypedEmitter<TestEvents>();
		expect(emitter.emit("halted")).toBe(false);
		emitter.on("halted", () => {});
		expect(emitter.emit("halted")).toBe(true);
	});

	it("removeAllListeners() clears one event or all", () => {
		const emitter = new TypedEmitter<TestEvents>();
		emitter.on("fill", () => {});
		emitter.on("halted", () => {});

		emitter.removeAllListeners("fill");
		expect(emitter.listenerCount("fill")).toBe(0);
		expect(emitter.listenerCount("halted")).toBe(1);

		emitter.removeAllListeners();
		expect(emitter.listenerCount("halted")).toBe(0);
	});
});
