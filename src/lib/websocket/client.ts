import WebSocket from "ws";
import { StreamError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	WsCloseHandler,
	WsConfig,
	WsErrorHandler,
	WsMessageHandler,
	WsState,
} from "./types.js";

/**
 * Thin transport over the ws library with ping/pong keepalive.
 *
 * Handlers are registered once and survive reconnects: every `connect()`
 * opens a fresh socket and forwards its frames to the same handlers.
 * Send failures are returned as Result, never thrown.
 */
export class WsClient {
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private readonly messageHandlers: WsMessageHandler[] = [];
	private readonly closeHandlers: WsCloseHandler[] = [];
	private readonly errorHandlers: WsErrorHandler[] = [];
	private pingTimer: ReturnType<typeof setInterval> | null = null;
	private pongTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(config: WsConfig) {
		this.config = config;
	}

	/**
	 * Opens a new socket. Rejects with StreamError if one is already
	 * connecting or open, or if the handshake fails.
	 */
	connect(): Promise<void> {
		if (this.state === "connecting" || this.state === "open") {
			return Promise.reject(new StreamError("WebSocket is already connecting or open"));
		}
		return new Promise<void>((resolve, reject) => {
			this.state = "connecting";
			const ws = new WebSocket(this.config.url, {
				handshakeTimeout: this.config.handshakeTimeoutMs,
			});
			this.ws = ws;

			let opened = false;
			ws.on("open", () => {
				opened = true;
				this.state = "open";
				this.startPing();
				resolve();
			});

			ws.on("message", (data, isBinary) => {
				if (isBinary) return;
				const message = data.toString();
				for (const handler of this.messageHandlers) {
					handler(message);
				}
			});

			ws.on("close", (code, reason) => {
				// a superseded socket closing late must not reset the current one
				if (this.ws !== ws) return;
				this.state = "closed";
				this.ws = null;
				this.clearTimers();
				if (!opened) {
					reject(new StreamError("WebSocket closed during handshake", { code }));
					return;
				}
				for (const handler of this.closeHandlers) {
					handler(code, reason.toString());
				}
			});

			ws.on("error", (error) => {
				for (const handler of this.errorHandlers) {
					handler(error);
				}
				if (this.state === "connecting") {
					this.state = "closed";
					this.ws = null;
					this.clearTimers();
					reject(new StreamError("WebSocket connection failed", { cause: error, url: this.config.url }));
				}
			});

			ws.on("pong", () => {
				this.clearPongTimeout();
			});
		});
	}

	/**
	 * Sends a text frame.
	 * @returns Result indicating success or a StreamError
	 */
	send(data: string): Result<void, StreamError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new StreamError("WebSocket is not connected"));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(new StreamError("WebSocket send failed", { cause: error }));
		}
	}

	/** Serializes `payload` as JSON and sends it. */
	sendJson(payload: unknown): Result<void, StreamError> {
		return this.send(JSON.stringify(payload));
	}

	/** Gracefully closes the socket and clears keepalive timers. */
	close(): void {
		if (this.ws !== null) {
			this.state = "closing";
			this.clearTimers();
			this.ws.close();
		}
	}

	/** Returns the current connection state. */
	getState(): WsState {
		return this.state;
	}

	onMessage(handler: WsMessageHandler): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: WsCloseHandler): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: WsErrorHandler): void {
		this.errorHandlers.push(handler);
	}

	private startPing(): void {
		this.pingTimer = setInterval(() => {
			if (this.ws !== null && this.state === "open") {
				this.ws.ping();
				this.pongTimer = setTimeout(() => {
					if (this.ws !== null) {
						this.ws.terminate();
					}
				}, this.config.pongTimeoutMs);
			}
		}, this.config.pingIntervalMs);
	}

	private clearTimers(): void {
		if (this.pingTimer !== null) {
			clearInterval(this.pingTimer);
			this.pingTimer = null;
		}
		this.clearPongTimeout();
	}

	private clearPongTimeout(): void {
		if (this.pongTimer !== null) {
			clearTimeout(this.pongTimer);
			this.pongTimer = null;
		}
	}
}
