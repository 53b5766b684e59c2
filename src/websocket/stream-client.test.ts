import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocketServer } from "ws";
import type { WebSocket } from "ws";
import { createCredentials } from "../auth/credentials.js";
import { StubTransport } from "../__tests__/stub-transport.js";
import { CircuitOpenError, StreamError } from "../shared/errors.js";
import { StreamClient } from "./stream-client.js";
import type { StreamMessage, StreamState } from "./types.js";

const credentials = createCredentials({ apiKey: "test-key", apiSecret: "test-secret" });

function recordingSleep() {
	const delays: number[] = [];
	const sleep = async (ms: number): Promise<boolean> => {
		delays.push(ms);
		return true;
	};
	return { delays, sleep };
}

function createStream(transport: StubTransport, sleep = recordingSleep().sleep, maxAttempts = 5) {
	return new StreamClient({
		transport,
		credentials,
		reconnection: { baseDelayMs: 100, maxDelayMs: 1_000, maxAttempts },
		sleep,
	});
}

describe("StreamClient session", () => {
	it("sends login before replaying subscriptions", async () => {
		const transport = new StubTransport();
		const stream = createStream(transport);
		const states: StreamState[] = [];
		stream.events.on("stateChange", (_from, to) => states.push(to));

		stream.subscribeReports();
		stream.subscribeOrderbook("BTC_USDT", 50);
		await stream.connect();

		const [login, reports, book] = transport.sentFrames();
		expect(login).toMatchObject({ method: "login", params: { algo: "HS256", pKey: "test-key" } });
		expect(reports).toEqual({ method: "subscribeReports", params: {} });
		expect(book).toEqual({ method: "subscribeOrderbook", params: { symbol: "BTC_USDT", limit: 50 } });
		expect(states).toEqual(["connecting", "authenticated", "subscribed", "streaming"]);
		expect(stream.state()).toBe("streaming");
	});

	it("skips login and subscribe states when neither is configured", async () => {
		const transport = new StubTransport();
		const stream = new StreamClient({
			transport,
			reconnection: { baseDelayMs: 100, maxDelayMs: 1_000, maxAttempts: 5 },
		});
		const states: StreamState[] = [];
		stream.events.on("stateChange", (_from, to) => states.push(to));

		await stream.connect();

		expect(transport.sent).toEqual([]);
		expect(states).toEqual(["connecting", "streaming"]);
	});

	it("sends a subscription immediately when already streaming", async () => {
		const transport = new StubTransport();
		const stream = createStream(transport);
		await stream.connect();

		stream.subscribeTrades("ETH_USDT");

		expect(transport.sentFrames()[1]).toEqual({ method: "subscribeTrades", params: { symbol: "ETH_USDT" } });
		expect(stream.subscriptionCount).toBe(1);
	});

	it("rejects with StreamError when the first connect fails", async () => {
		const transport = new StubTransport();
		transport.connectResults.push(new Error("ECONNREFUSED"));
		const stream = createStream(transport);

		await expect(stream.connect()).rejects.toBeInstanceOf(StreamError);
		expect(stream.isRunning).toBe(false);
		expect(stream.state()).toBe("disconnected");
	});

	it("refuses a second connect while running", async () => {
		const stream = createStream(new StubTransport());
		await stream.connect();
		await expect(stream.connect()).rejects.toThrow("already running");
	});
});

describe("StreamClient dispatch", () => {
	async function connected() {
		const transport = new StubTransport();
		const stream = createStream(transport);
		await stream.connect();
		return { transport, stream };
	}

	it("routes frames by method, then channel, then default", async () => {
		const { transport, stream } = await connected();
		const seen: Array<[string, StreamMessage]> = [];
		stream.on("report", (m) => {
			seen.push(["report", m]);
		});
		stream.on("trades", (m) => {
			seen.push(["trades", m]);
		});
		stream.onDefault((m) => {
			seen.push(["default", m]);
		});

		transport.simulateMessage('{"method":"report","params":{"id":"o-1"}}');
		transport.simulateMessage('{"channel":"trades","data":[]}');
		transport.simulateMessage('{"result":true,"id":7}');

		expect(seen).toEqual([
			["report", { method: "report", params: { id: "o-1" } }],
			["trades", { channel: "trades", data: [] }],
			["default", { result: true, id: 7 }],
		]);
	});

	it("sends error frames and undecodable payloads to the error handler", async () => {
		const { transport, stream } = await connected();
		const errors: StreamMessage[] = [];
		stream.onError((m) => {
			errors.push(m);
		});

		transport.simulateMessage('{"error":{"code":401,"message":"unauthorized"},"id":1}');
		transport.simulateMessage("not json");
		transport.simulateMessage("[1,2]");

		expect(errors).toEqual([
			{ error: { code: 401, message: "unauthorized" }, id: 1 },
			{ error: "invalid_json", payload: "not json" },
			{ method: "error", data: [1, 2] },
		]);
	});

	it("keeps dispatching after a handler throws or rejects", async () => {
		const { transport, stream } = await connected();
		let calls = 0;
		stream.on("report", () => {
			calls += 1;
			if (calls === 1) throw new Error("boom");
		});
		stream.on("balances", async () => {
			calls += 1;
			throw new Error("async boom");
		});

		transport.simulateMessage('{"method":"report"}');
		transport.simulateMessage('{"method":"balances"}');
		transport.simulateMessage('{"method":"report"}');
		await Promise.resolve();

		expect(calls).toBe(3);
	});
});

describe("StreamClient reconnect", () => {
	it("backs off exponentially, replays login and subscriptions, then resets", async () => {
		const transport = new StubTransport();
		const { delays, sleep } = recordingSleep();
		const stream = createStream(transport, sleep);
		stream.subscribeReports();
		await stream.connect();
		transport.sent.length = 0;

		transport.connectResults.push(new Error("down"), new Error("down"));
		transport.simulateDrop();
		await stream.idle();

		expect(delays).toEqual([100, 200, 400]);
		expect(stream.state()).toBe("streaming");
		expect(transport.sentMethods()).toEqual(["login", "subscribeReports"]);

		transport.simulateDrop();
		await stream.idle();
		expect(delays).toEqual([100, 200, 400, 100]);
		expect(transport.connects).toBe(5);
	});

	it("opens the circuit breaker after max consecutive failures", async () => {
		const transport = new StubTransport();
		const { delays, sleep } = recordingSleep();
		const stream = createStream(transport, sleep, 3);
		const fatal: CircuitOpenError[] = [];
		stream.events.on("fatal", (e) => fatal.push(e));
		await stream.connect();

		transport.connectResults.push(new Error("down"), new Error("down"), new Error("down"));
		transport.simulateDrop();
		await stream.idle();

		expect(delays).toEqual([100, 200, 400]);
		expect(fatal).toHaveLength(1);
		expect(fatal[0]).toBeInstanceOf(CircuitOpenError);
		expect(fatal[0]?.code).toBe("CIRCUIT_OPEN");
		expect(stream.isRunning).toBe(false);
		expect(stream.state()).toBe("disconnected");
	});

	it("close() interrupts a pending backoff wait", async () => {
		const transport = new StubTransport();
		const sleep = (_ms: number, signal?: AbortSignal): Promise<boolean> =>
			new Promise((resolve) => {
				signal?.addEventListener("abort", () => resolve(false), { once: true });
			});
		const stream = createStream(transport, sleep);
		await stream.connect();

		transport.simulateDrop();
		await stream.close();

		expect(transport.connects).toBe(1);
		expect(stream.isRunning).toBe(false);
	});

	it("does not reconnect after an intentional close", async () => {
		const transport = new StubTransport();
		const { delays, sleep } = recordingSleep();
		const stream = createStream(transport, sleep);
		await stream.connect();

		await stream.close();

		expect(delays).toEqual([]);
		expect(stream.state()).toBe("disconnected");
	});
});

describe("StreamClient over a live socket", () => {
	let wss: WebSocketServer;
	let port: number;
	const connections: Array<{ socket: WebSocket; frames: string[] }> = [];

	const waitFor = async (predicate: () => boolean, timeoutMs = 2_000): Promise<void> => {
		const started = Date.now();
		while (!predicate()) {
			if (Date.now() - started > timeoutMs) throw new Error("timed out waiting for condition");
			await new Promise((resolve) => setTimeout(resolve, 5));
		}
	};

	beforeEach(() => {
		connections.length = 0;
		wss = new WebSocketServer({ port: 0 });
		const addr = wss.address();
		port = typeof addr === "object" && addr !== null ? addr.port : 0;
		wss.on("connection", (socket) => {
			const entry: { socket: WebSocket; frames: string[] } = { socket, frames: [] };
			connections.push(entry);
			socket.on("message", (data) => entry.frames.push(data.toString()));
		});
	});

	afterEach(async () => {
		for (const socket of wss.clients) socket.terminate();
		await new Promise((resolve) => wss.close(resolve));
	});

	it("delivers reports and re-authenticates after the server drops the socket", async () => {
		const stream = StreamClient.create(
			{
				url: `ws://127.0.0.1:${port}`,
				pingIntervalMs: 30_000,
				pongTimeoutMs: 5_000,
				handshakeTimeoutMs: 2_000,
				reconnectBaseMs: 10,
				reconnectMaxMs: 50,
				maxConsecutiveFailures: 5,
			},
			{ credentials },
		);
		const reports: StreamMessage[] = [];
		stream.on("report", (m) => {
			reports.push(m);
		});
		stream.subscribeReports();
		await stream.connect();

		await waitFor(() => connections[0]?.frames.length === 2);
		connections[0]?.socket.send('{"method":"report","params":{"id":"o-1","status":"Filled"}}');
		await waitFor(() => reports.length === 1);
		expect(reports[0]).toEqual({ method: "report", params: { id: "o-1", status: "Filled" } });

		connections[0]?.socket.terminate();
		await waitFor(() => connections[1]?.frames.length === 2);

		const replayed = (connections[1]?.frames ?? []).map((f) => JSON.parse(f).method);
		expect(replayed).toEqual(["login", "subscribeReports"]);
		await stream.close();
	});
});
