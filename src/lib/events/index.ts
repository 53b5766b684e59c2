import EventEmitter from "eventemitter3";

/**
 * Typed event map: keys are event names, values are handler signatures.
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * Type-safe event emitter over eventemitter3. The streaming client and the
 * ladder engine expose their lifecycle through it.
 *
 * @example
 * ```ts
 * type Events = { stateChange: (from: StreamState, to: StreamState) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("stateChange", (from, to) => log.info({ from, to }, "stream state"));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler);
		return this;
	}

	/** Registers a handler that is removed after its first invocation. */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler);
		return this;
	}

	/** Invokes every handler for `event`; returns false when none is registered. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event !== undefined) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
