/**
 * Configuration for the WebSocket transport.
 */
export interface WsConfig {
	/** WebSocket server URL (ws:// or wss://) */
	readonly url: string;
	/** Interval between ping frames in milliseconds. */
	readonly pingIntervalMs: number;
	/** Timeout waiting for pong response before terminating the connection. */
	readonly pongTimeoutMs: number;
	/** Opening handshake timeout; the connect promise rejects when it expires. */
	readonly handshakeTimeoutMs?: number;
}

/**
 * Transport connection state.
 * - `connecting`: Connection in progress
 * - `open`: Connected and ready
 * - `closing`: Close initiated
 * - `closed`: Connection terminated
 */
export type WsState = "connecting" | "open" | "closing" | "closed";

/** Callback invoked with each text frame received. */
export type WsMessageHandler = (data: string) => void;

/** Callback invoked when the connection closes. */
export type WsCloseHandler = (code: number, reason: string) => void;

export type WsErrorHandler = (error: Error) => void;
