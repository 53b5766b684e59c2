/**
 * Streaming session types.
 *
 * A session moves disconnected → connecting → (authenticated) →
 * (subscribed) → streaming, and back to disconnected on any drop.
 */

import type { WsState } from "../lib/websocket/types.js";
import type { StreamError, TradingError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";

// ── Session states ───────────────────────────────────────────────────

export const StreamState = {
	Disconnected: "disconnected",
	Connecting: "connecting",
	/** Login frame sent */
	Authenticated: "authenticated",
	/** Subscriptions (re)sent */
	Subscribed: "subscribed",
	/** Ready; frames are being dispatched */
	Streaming: "streaming",
} as const;

export type StreamState = (typeof StreamState)[keyof typeof StreamState];

export const STREAM_TRANSITIONS: Readonly<Record<StreamState, readonly StreamState[]>> = {
	disconnected: ["connecting"],
	connecting: ["authenticated", "subscribed", "streaming", "disconnected"],
	authenticated: ["subscribed", "streaming", "disconnected"],
	subscribed: ["streaming", "disconnected"],
	streaming: ["disconnected"],
};

export function canTransition(from: StreamState, to: StreamState): boolean {
	return STREAM_TRANSITIONS[from].includes(to);
}

// ── Frames ───────────────────────────────────────────────────────────

/** A subscription request, replayed verbatim after every reconnect. */
export interface Subscription {
	readonly method: string;
	readonly params: Readonly<Record<string, unknown>>;
}

/** A decoded inbound frame. */
export type StreamMessage = Readonly<Record<string, unknown>>;

/** Handlers may be sync or async; failures are logged, never propagated. */
export type StreamHandler = (message: StreamMessage) => void | Promise<void>;

// ── Transport seam ───────────────────────────────────────────────────

/**
 * Minimal interface of the socket transport.
 * Allows injection of stubs for testing.
 */
export interface StreamTransport {
	connect(): Promise<void>;
	send(data: string): Result<void, StreamError | TradingError>;
	close(): void;
	getState(): WsState;
	onMessage(handler: (data: string) => void): void;
	onClose(handler: (code: number, reason: string) => void): void;
	onError(handler: (error: Error) => void): void;
}
