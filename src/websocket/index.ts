export { ReconnectionPolicy } from "./reconnection.js";
export type { ReconnectionConfig, ReconnectState } from "./reconnection.js";
export { StreamClient } from "./stream-client.js";
export type { StreamClientConfig, StreamEvents, StreamSetup } from "./stream-client.js";
export { STREAM_TRANSITIONS, StreamState, canTransition } from "./types.js";
export type {
	StreamHandler,
	StreamMessage,
	StreamTransport,
	Subscription,
} from "./types.js";
