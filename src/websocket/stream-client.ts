import { buildLoginPayload } from "../auth/signer.js";
import type { Credentials } from "../auth/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { WsClient } from "../lib/websocket/client.js";
import { CircuitOpenError, StreamError, TradingError } from "../shared/errors.js";
import { sleep as defaultSleep } from "../shared/time.js";
import { ReconnectionPolicy } from "./reconnection.js";
import type { ReconnectionConfig } from "./reconnection.js";
import {
	StreamState,
	type StreamHandler,
	type StreamMessage,
	type StreamTransport,
	type Subscription,
	canTransition,
} from "./types.js";

/** Events emitted by {@link StreamClient}. */
export type StreamEvents = {
	stateChange: (from: StreamState, to: StreamState) => void;
	reconnecting: (info: { readonly attempt: number; readonly delayMs: number }) => void;
	/** A connect or send failure the client will recover from. */
	error: (error: TradingError) => void;
	/** The circuit breaker opened; the client has stopped. */
	fatal: (error: CircuitOpenError) => void;
};

export interface StreamClientConfig {
	readonly transport: StreamTransport;
	/** When set, a login frame is sent before any subscription on every connect. */
	readonly credentials?: Credentials;
	readonly reconnection: ReconnectionPolicy | ReconnectionConfig;
	/** Reconnect automatically after an unexpected drop. Default: true */
	readonly autoReconnect?: boolean;
	readonly logger?: Logger;
	/** Injectable for tests; must resolve false when the signal aborts. */
	readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

/** Plain settings for {@link StreamClient.create}. */
export interface StreamSetup {
	readonly url: string;
	readonly pingIntervalMs: number;
	readonly pongTimeoutMs: number;
	readonly handshakeTimeoutMs: number;
	readonly reconnectBaseMs: number;
	readonly reconnectMaxMs: number;
	readonly maxConsecutiveFailures: number;
}

/**
 * Authenticated, self-healing streaming session.
 *
 * Sends the login frame first, then replays every registered subscription,
 * on each connect. Inbound frames are dispatched by their `method`
 * (or `channel`) to one registered handler, falling back to the default
 * handler. Frames that carry an `error` key go to the error handler.
 *
 * After an unexpected drop the client waits `min(base × 2^k, max)` and
 * reconnects; after `maxAttempts` consecutive failures it emits `fatal`
 * with a {@link CircuitOpenError} and stops.
 *
 * @example
 * ```ts
 * const stream = StreamClient.create(config.stream, { credentials, logger });
 * stream.on("report", (msg) => engine.handleReport(msg));
 * stream.subscribeReports();
 * await stream.connect();
 * ```
 */
export class StreamClient {
	readonly events = new TypedEmitter<StreamEvents>();

	private readonly transport: StreamTransport;
	private readonly credentials: Credentials | undefined;
	private readonly policy: ReconnectionPolicy;
	private readonly autoReconnect: boolean;
	private readonly logger: Logger;
	private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;

	private readonly subscriptions: Subscription[] = [];
	private readonly handlers = new Map<string, StreamHandler>();
	private defaultHandler: StreamHandler | null = null;
	private errorHandler: StreamHandler | null = null;

	private current: StreamState = StreamState.Disconnected;
	private running = false;
	private stopController = new AbortController();
	private reconnectTask: Promise<void> | null = null;

	constructor(config: StreamClientConfig) {
		this.transport = config.transport;
		this.credentials = config.credentials;
		this.policy =
			config.reconnection instanceof ReconnectionPolicy
				? config.reconnection
				: new ReconnectionPolicy(config.reconnection);
		this.autoReconnect = config.autoReconnect ?? true;
		this.logger = config.logger ?? silentLogger();
		this.sleep = config.sleep ?? defaultSleep;

		this.transport.onMessage((data) => this.handleFrame(data));
		this.transport.onClose((code, reason) => this.handleClose(code, reason));
		this.transport.onError((error) => {
			this.logger.debug({ err: error.message }, "stream transport error");
		});
	}

	/** Builds a client over the ws transport. */
	static create(
		setup: StreamSetup,
		deps: { readonly credentials?: Credentials; readonly logger?: Logger } = {},
	): StreamClient {
		const transport = new WsClient({
			url: setup.url,
			pingIntervalMs: setup.pingIntervalMs,
			pongTimeoutMs: setup.pongTimeoutMs,
			handshakeTimeoutMs: setup.handshakeTimeoutMs,
		});
		return new StreamClient({
			transport,
			credentials: deps.credentials,
			reconnection: {
				baseDelayMs: setup.reconnectBaseMs,
				maxDelayMs: setup.reconnectMaxMs,
				maxAttempts: setup.maxConsecutiveFailures,
			},
			logger: deps.logger?.child({ component: "stream" }),
		});
	}

	// ── Queries ────────────────────────────────────────────────────

	state(): StreamState {
		return this.current;
	}

	get isRunning(): boolean {
		return this.running;
	}

	get subscriptionCount(): number {
		return this.subscriptions.length;
	}

	// ── Handlers ───────────────────────────────────────────────────

	/** Registers the handler for frames whose `method` or `channel` equals `key`. */
	on(key: string, handler: StreamHandler): this {
		this.handlers.set(key, handler);
		return this;
	}

	/** Receives frames no keyed handler claims. */
	onDefault(handler: StreamHandler): this {
		this.defaultHandler = handler;
		return this;
	}

	/** Receives error frames and undecodable payloads. */
	onError(handler: StreamHandler): this {
		this.errorHandler = handler;
		return this;
	}

	// ── Subscriptions ──────────────────────────────────────────────

	/**
	 * Records a subscription and sends it right away when the session is up.
	 * Recorded subscriptions are replayed after every reconnect.
	 */
	subscribe(subscription: Subscription): void {
		this.subscriptions.push(subscription);
		if (this.current === StreamState.Streaming) {
			this.sendFrame(subscription, "subscription");
		}
	}

	subscribeOrderbook(symbol: string, limit?: number): void {
		const params: Record<string, unknown> = { symbol };
		if (limit !== undefined) params.limit = limit;
		this.subscribe({ method: "subscribeOrderbook", params });
	}

	subscribeTrades(symbol: string): void {
		this.subscribe({ method: "subscribeTrades", params: { symbol } });
	}

	/** Own order reports; requires credentials. */
	subscribeReports(): void {
		this.subscribe({ method: "subscribeReports", params: {} });
	}

	/** Own balance updates; requires credentials. */
	subscribeBalances(): void {
		this.subscribe({ method: "subscribeBalances", params: {} });
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Opens the session: login, then subscription replay.
	 * Rejects with a StreamError if the first connect fails; later drops are
	 * healed in the background while `autoReconnect` is on.
	 */
	async connect(): Promise<void> {
		if (this.running) {
			throw new StreamError("Stream client is already running");
		}
		this.running = true;
		this.stopController = new AbortController();
		try {
			await this.openSession();
		} catch (error) {
			this.running = false;
			this.stopController.abort();
			throw error;
		}
	}

	/** Stops reconnecting and closes the socket. Resolves once any pending reconnect has exited. */
	async close(): Promise<void> {
		this.running = false;
		this.stopController.abort();
		this.transport.close();
		this.setState(StreamState.Disconnected);
		if (this.reconnectTask !== null) {
			await this.reconnectTask;
		}
	}

	/** Resolves when no reconnect loop is in flight. */
	async idle(): Promise<void> {
		if (this.reconnectTask !== null) {
			await this.reconnectTask;
		}
	}

	// ── Internals ──────────────────────────────────────────────────

	private async openSession(): Promise<void> {
		this.setState(StreamState.Connecting);
		try {
			await this.transport.connect();
		} catch (error) {
			this.setState(StreamState.Disconnected);
			throw error instanceof StreamError
				? error
				: new StreamError("Stream connect failed", { cause: error });
		}

		if (this.credentials !== undefined) {
			this.sendOrThrow(buildLoginPayload(this.credentials), "login");
			this.setState(StreamState.Authenticated);
		}
		if (this.subscriptions.length > 0) {
			for (const subscription of this.subscriptions) {
				this.sendOrThrow(subscription, "subscription");
			}
			this.setState(StreamState.Subscribed);
		}
		this.setState(StreamState.Streaming);
		this.policy.reset();
		this.logger.info({ subscriptions: this.subscriptions.length }, "stream session open");
	}

	private sendOrThrow(frame: unknown, what: string): void {
		const result = this.transport.send(JSON.stringify(frame));
		if (!result.ok) {
			this.transport.close();
			this.setState(StreamState.Disconnected);
			throw new StreamError(`Failed to send ${what} frame`, { cause: result.error });
		}
	}

	private sendFrame(frame: unknown, what: string): void {
		const result = this.transport.send(JSON.stringify(frame));
		if (!result.ok) {
			this.logger.warn({ err: result.error.message }, `failed to send ${what} frame`);
			this.events.emit("error", result.error);
		}
	}

	private handleClose(code: number, reason: string): void {
		this.setState(StreamState.Disconnected);
		if (!this.running) return;
		this.logger.warn({ code, reason }, "stream dropped");
		if (this.autoReconnect && this.reconnectTask === null) {
			this.reconnectTask = this.reconnectLoop().finally(() => {
				this.reconnectTask = null;
			});
		}
	}

	private async reconnectLoop(): Promise<void> {
		const signal = this.stopController.signal;
		while (this.running) {
			if (!this.policy.shouldRetry()) {
				const failures = this.policy.consecutiveFailures;
				this.running = false;
				this.logger.error({ failures }, "stream circuit breaker open");
				this.events.emit(
					"fatal",
					new CircuitOpenError("Stream reconnect attempts exhausted", { failures }),
				);
				return;
			}
			const delayMs = this.policy.nextDelay();
			this.events.emit("reconnecting", { attempt: this.policy.consecutiveFailures, delayMs });
			const elapsed = await this.sleep(delayMs, signal);
			if (!elapsed || !this.running) return;
			try {
				await this.openSession();
				return;
			} catch (error) {
				const streamError =
					error instanceof TradingError ? error : new StreamError("Reconnect failed", { cause: error });
				this.logger.warn({ err: streamError.message }, "stream reconnect failed");
				this.events.emit("error", streamError);
			}
		}
	}

	private handleFrame(data: string): void {
		let parsed: unknown;
		try {
			parsed = JSON.parse(data);
		} catch {
			this.invoke(this.errorHandler, { error: "invalid_json", payload: data }, "error");
			return;
		}
		if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
			this.invoke(this.errorHandler, { method: "error", data: parsed }, "error");
			return;
		}
		const message: StreamMessage = Object.fromEntries(Object.entries(parsed));
		if ("error" in message && message.error !== undefined && message.error !== null) {
			this.invoke(this.errorHandler, message, "error");
			return;
		}
		const key = dispatchKey(message);
		const handler = key !== undefined ? this.handlers.get(key) : undefined;
		this.invoke(handler ?? this.defaultHandler, message, key ?? "default");
	}

	private invoke(handler: StreamHandler | null | undefined, message: StreamMessage, key: string): void {
		if (handler === null || handler === undefined) {
			this.logger.debug({ key }, "stream frame without handler");
			return;
		}
		try {
			const result = handler(message);
			if (result instanceof Promise) {
				result.catch((error: unknown) => this.logHandlerFailure(key, error));
			}
		} catch (error) {
			this.logHandlerFailure(key, error);
		}
	}

	private logHandlerFailure(key: string, error: unknown): void {
		const message = error instanceof Error ? error.message : String(error);
		this.logger.error({ key, err: message }, "stream handler failed");
	}

	private setState(next: StreamState): void {
		const from = this.current;
		if (from === next) return;
		if (!canTransition(from, next)) {
			this.logger.debug({ from, to: next }, "ignored stream state change");
			return;
		}
		this.current = next;
		this.events.emit("stateChange", from, next);
	}
}

function dispatchKey(message: StreamMessage): string | undefined {
	const method = message.method;
	if (typeof method === "string" && method.length > 0) return method;
	const channel = message.channel;
	if (typeof channel === "string" && channel.length > 0) return channel;
	return undefined;
}
