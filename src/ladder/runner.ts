/**
 * LadderRunner — drives one LadderEngine.
 *
 * Two contexts feed the engine: the polling loop (`reconcile` every
 * `pollIntervalMs`) and order reports from the stream. Both, plus start-up
 * and stop, run through one Mutex so the engine never sees interleaved
 * mutations.
 */

import { parseOrder } from "../client/parse.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { StateStore } from "../persistence/state-store.js";
import { ConfigurationError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { Mutex } from "../shared/mutex.js";
import { normalizeSymbol } from "../shared/symbols.js";
import { sleep as defaultSleep } from "../shared/time.js";
import type { StreamClient } from "../websocket/stream-client.js";
import type { StreamMessage } from "../websocket/types.js";
import type { LadderEngine } from "./ladder-engine.js";
import type { StartupRebalancer } from "./rebalance.js";
import type { ReconcileSummary, UpdateOutcome } from "./types.js";
import type { LadderVenue } from "./venue.js";

export interface LadderRunnerOptions {
	readonly symbol: string;
	readonly pollIntervalMs: number;
	readonly maxPollBackoffMs: number;
	/** Cancel every open order for the symbol before seeding a fresh ladder. */
	readonly startupCancelAll?: boolean;
}

export interface LadderRunnerDeps {
	readonly engine: LadderEngine;
	readonly venue: LadderVenue;
	readonly store?: StateStore;
	readonly stream?: StreamClient;
	/** Runs before a fresh ladder is seeded, never on top of live orders. */
	readonly rebalancer?: StartupRebalancer;
	readonly logger?: Logger;
	readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * @example
 * ```ts
 * const runner = new LadderRunner(
 *   { symbol: "BTC_USDT", pollIntervalMs: 5_000, maxPollBackoffMs: 300_000 },
 *   { engine, venue: rest, store, stream, logger },
 * );
 * await runner.start();
 * process.once("SIGINT", () => void runner.stop());
 * await runner.done();
 * ```
 */
export class LadderRunner {
	private readonly options: LadderRunnerOptions;
	private readonly engine: LadderEngine;
	private readonly venue: LadderVenue;
	private readonly store: StateStore | undefined;
	private readonly stream: StreamClient | undefined;
	private readonly rebalancer: StartupRebalancer | undefined;
	private readonly logger: Logger;
	private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>;
	private readonly mutex = new Mutex();

	private controller = new AbortController();
	private loopTask: Promise<void> | null = null;
	private streaming = false;
	private consecutiveFailures = 0;
	private completedCycles = 0;
	private fatalError: TradingError | null = null;

	constructor(options: LadderRunnerOptions, deps: LadderRunnerDeps) {
		this.options = options;
		this.engine = deps.engine;
		this.venue = deps.venue;
		this.store = deps.store;
		this.stream = deps.stream;
		this.rebalancer = deps.rebalancer;
		this.logger = deps.logger ?? silentLogger();
		this.sleep = deps.sleep ?? defaultSleep;
	}

	// ── Queries ────────────────────────────────────────────────────

	get isRunning(): boolean {
		return this.loopTask !== null && !this.controller.signal.aborted;
	}

	/** True while stream reports are feeding the engine. */
	get isStreaming(): boolean {
		return this.streaming;
	}

	get cycles(): number {
		return this.completedCycles;
	}

	get failures(): number {
		return this.consecutiveFailures;
	}

	get lastFatal(): TradingError | null {
		return this.fatalError;
	}

	/** Delay before the next polling cycle: `pollInterval × 2^failures`, capped. */
	nextDelayMs(): number {
		const { pollIntervalMs, maxPollBackoffMs } = this.options;
		return Math.min(pollIntervalMs * 2 ** this.consecutiveFailures, maxPollBackoffMs);
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Restores the last snapshot, syncs with the venue, rebalances an empty
	 * book when configured, seeds the ladder, attaches the stream and starts
	 * polling.
	 * @throws the classified error when start-up fails; the failure is persisted first
	 */
	async start(): Promise<void> {
		if (this.loopTask !== null) {
			throw new ConfigurationError("Runner already started");
		}
		this.controller = new AbortController();
		this.fatalError = null;

		try {
			await this.mutex.runExclusive(async () => {
				await this.restoreSnapshot();
				if (this.engine.openOrders().length === 0) {
					await this.prepareBook();
					if (this.engine.openOrders().length === 0) await this.rebalancer?.run();
				}
				await this.engine.seed();
				this.engine.markRunning(true);
				await this.persist();
			});
		} catch (error) {
			const classified = classifyError(error);
			await this.mutex.runExclusive(async () => {
				this.engine.recordFatal(classified);
				await this.persist();
			});
			this.logger.error({ err: classified.message, code: classified.code }, "ladder start-up failed");
			throw classified;
		}

		await this.attachStream();
		this.loopTask = this.loop(this.controller.signal);
		this.logger.info(
			{ symbol: this.options.symbol, pollIntervalMs: this.options.pollIntervalMs, streaming: this.streaming },
			"ladder runner started",
		);
	}

	/**
	 * Cooperative stop: aborts the sleep, lets an in-flight cycle finish,
	 * closes the stream and writes the final snapshot.
	 */
	async stop(): Promise<void> {
		this.controller.abort();
		if (this.loopTask !== null) {
			await this.loopTask;
			this.loopTask = null;
		}
		await this.closeStream();
		await this.mutex.runExclusive(async () => {
			this.engine.markRunning(false);
			await this.persist();
		});
		await this.store?.flush();
		this.logger.info({ cycles: this.completedCycles }, "ladder runner stopped");
	}

	/** Resolves once the polling loop has exited, by stop() or by a fatal error. */
	async done(): Promise<void> {
		if (this.loopTask !== null) await this.loopTask;
	}

	/** One reconcile pass under the mutex; failures are handled like a polling cycle. */
	async runOnce(): Promise<ReconcileSummary | null> {
		return this.cycle();
	}

	// ── Polling ────────────────────────────────────────────────────

	private async loop(signal: AbortSignal): Promise<void> {
		while (!signal.aborted) {
			const elapsed = await this.sleep(this.nextDelayMs(), signal);
			if (!elapsed || signal.aborted) return;
			await this.cycle();
		}
	}

	private async cycle(): Promise<ReconcileSummary | null> {
		try {
			const summary = await this.mutex.runExclusive(async () => {
				const result = await this.engine.reconcile();
				await this.persist();
				return result;
			});
			this.consecutiveFailures = 0;
			this.completedCycles++;
			if (summary.fills > 0 || summary.removed > 0 || summary.placements.length > 0) {
				this.logger.info(
					{
						fills: summary.fills,
						removed: summary.removed,
						placements: summary.placements.length,
						skippedQueries: summary.skippedQueries,
					},
					"reconcile cycle",
				);
			}
			return summary;
		} catch (error) {
			const classified = classifyError(error);
			if (classified.isFatal) {
				await this.fail(classified);
				return null;
			}
			this.consecutiveFailures++;
			this.completedCycles++;
			this.logger.warn(
				{ err: classified.message, failures: this.consecutiveFailures, nextDelayMs: this.nextDelayMs() },
				"reconcile cycle failed",
			);
			return null;
		}
	}

	// ── Streaming ──────────────────────────────────────────────────

	private async attachStream(): Promise<void> {
		const stream = this.stream;
		if (stream === undefined) return;
		stream.on("report", (message) => this.onReport(message));
		stream.onError((message) => {
			this.logger.warn({ frame: message }, "stream error frame");
		});
		stream.events.on("fatal", (error) => {
			this.streaming = false;
			this.logger.error({ err: error.message }, "stream gave up; polling only");
		});
		stream.subscribeReports();
		try {
			await stream.connect();
			this.streaming = true;
		} catch (error) {
			const classified = classifyError(error);
			this.logger.warn(
				{ err: classified.message, code: classified.code },
				"stream connect failed; falling back to polling",
			);
		}
	}

	private async closeStream(): Promise<void> {
		if (this.stream === undefined) return;
		this.streaming = false;
		await this.stream.close();
	}

	private async onReport(message: StreamMessage): Promise<void> {
		const params = message["params"];
		const items = Array.isArray(params) ? params : [params];
		for (const item of items) {
			if (!isRecord(item)) continue;
			if (!this.isOwnSymbol(item["symbol"])) continue;
			await this.applyReport(item);
		}
	}

	private async applyReport(raw: Record<string, unknown>): Promise<UpdateOutcome | null> {
		if (this.controller.signal.aborted) return null;
		const report = parseOrder(raw);
		try {
			return await this.mutex.runExclusive(async () => {
				const outcome = await this.engine.handleOrderUpdate({
					orderId: report.orderId,
					clientReferenceId: report.clientReferenceId,
					status: report.status,
					filledQuantity: report.filledQuantity,
					avgPrice: report.avgPrice,
				});
				if (outcome.kind !== "untracked") await this.persist();
				return outcome;
			});
		} catch (error) {
			const classified = classifyError(error);
			if (classified.isFatal) {
				await this.fail(classified);
				return null;
			}
			throw classified;
		}
	}

	/** Reports without a symbol are taken as ours; the order id decides. */
	private isOwnSymbol(symbol: unknown): boolean {
		if (typeof symbol !== "string") return true;
		try {
			return normalizeSymbol(symbol) === this.options.symbol;
		} catch {
			return false;
		}
	}

	// ── Internals ──────────────────────────────────────────────────

	private async restoreSnapshot(): Promise<void> {
		if (this.store === undefined) return;
		const state = await this.store.load();
		if (state === null) return;
		this.engine.restore(state);
		this.logger.info(
			{ openOrders: state.openOrders.length, ambiguous: state.ambiguousPlacements.length },
			"restored ladder snapshot",
		);
	}

	/** Start-up without tracked orders: clear the book or adopt what the venue holds. */
	private async prepareBook(): Promise<void> {
		if (this.options.startupCancelAll === true) {
			const cancelled = await this.venue.cancelAllOrders(this.options.symbol);
			this.logger.info({ symbol: this.options.symbol, cancelled }, "cancelled open orders before seeding");
			return;
		}
		await this.engine.syncOpenOrders();
	}

	/**
	 * Records the error, persists and stops. Never awaits the loop: fail()
	 * runs inside it.
	 */
	private async fail(error: TradingError): Promise<void> {
		this.fatalError = error;
		this.controller.abort();
		await this.mutex.runExclusive(async () => {
			this.engine.recordFatal(error);
			await this.persist();
		});
		this.logger.error({ err: error.message, code: error.code, category: error.category }, "fatal error; stopping");
		await this.closeStream();
	}

	private async persist(): Promise<void> {
		if (this.store === undefined) return;
		try {
			await this.store.save(this.engine.toState());
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			this.logger.warn({ err: message, path: this.store.path }, "snapshot write failed");
		}
	}
}
