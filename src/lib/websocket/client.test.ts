import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocketServer } from "ws";
import { StreamError } from "../../shared/errors.js";
import { isOk } from "../../shared/result.js";
import { WsClient } from "./client.js";
import type { WsConfig } from "./types.js";

const settle = (ms = 100) => new Promise((resolve) => setTimeout(resolve, ms));

describe("WsClient", () => {
	let wss: WebSocketServer;
	let port: number;

	function testConfig(overrides?: Partial<WsConfig>): WsConfig {
		return {
			url: `ws://127.0.0.1:${port}`,
			pingIntervalMs: 30_000,
			pongTimeoutMs: 5_000,
			...overrides,
		};
	}

	beforeEach(() => {
		wss = new WebSocketServer({ port: 0 });
		const addr = wss.address();
		port = typeof addr === "object" && addr !== null ? addr.port : 0;
	});

	afterEach(async () => {
		for (const socket of wss.clients) socket.terminate();
		wss.close();
		await settle(50);
	});

	it("state starts as closed before connect", () => {
		const client = new WsClient(testConfig());
		expect(client.getState()).toBe("closed");
	});

	it("connect resolves and state becomes open", async () => {
		const client = new WsClient(testConfig());
		await client.connect();
		expect(client.getState()).toBe("open");
		client.close();
	});

	it("sendJson delivers a serialized payload", async () => {
		const received: string[] = [];
		wss.on("connection", (ws) => {
			ws.on("message", (data) => received.push(data.toString()));
		});

		const client = new WsClient(testConfig());
		await client.connect();
		const result = client.sendJson({ method: "subscribeReports", params: {} });
		expect(isOk(result)).toBe(true);

		await settle();
		expect(received).toEqual(['{"method":"subscribeReports","params":{}}']);
		client.close();
	});

	it("onMessage receives server-pushed messages", async () => {
		wss.on("connection", (ws) => {
			ws.send("push-1");
			ws.send("push-2");
		});

		const client = new WsClient(testConfig());
		const received: string[] = [];
		client.onMessage((data) => received.push(data));

		await client.connect();
		await settle();

		expect(received).toEqual(["push-1", "push-2"]);
		client.close();
	});

	it("send when not connected returns a StreamError", () => {
		const client = new WsClient(testConfig());
		const result = client.send("hello");
		expect(isOk(result)).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(StreamError);
			expect(result.error.code).toBe("STREAM_ERROR");
		}
	});

	it("connect rejects when already open", async () => {
		const client = new WsClient(testConfig());
		await client.connect();
		await expect(client.connect()).rejects.toThrow("already connecting or open");
		client.close();
	});

	it("connect rejects with StreamError when the server is unreachable", async () => {
		const client = new WsClient(testConfig({ url: "ws://127.0.0.1:1" }));
		const onError = vi.fn();
		client.onError(onError);
		await expect(client.connect()).rejects.toBeInstanceOf(StreamError);
		expect(onError).toHaveBeenCalled();
		expect(client.getState()).toBe("closed");
	});

	it("fires close handlers when the server drops the connection", async () => {
		wss.on("connection", (ws) => {
			ws.close(1001, "going away");
		});
		const client = new WsClient(testConfig());
		const onClose = vi.fn();
		client.onClose(onClose);

		await client.connect();
		await settle();

		expect(onClose).toHaveBeenCalledWith(1001, "going away");
		expect(client.getState()).toBe("closed");
	});

	it("keeps handlers across a reconnect", async () => {
		let connections = 0;
		wss.on("connection", (ws) => {
			connections++;
			ws.send(`hello-${connections}`);
		});
		const client = new WsClient(testConfig());
		const received: string[] = [];
		client.onMessage((data) => received.push(data));

		await client.connect();
		await settle();
		client.close();
		await settle();
		await client.connect();
		await settle();

		expect(received).toEqual(["hello-1", "hello-2"]);
		client.close();
	});
});
