/**
 * BalanceTracker — venue balances plus locally predicted effects.
 *
 * The engine records the expected effect of an order it just placed
 * (`applyPending`) so the next placement sees the reduced balance before the
 * venue's snapshot catches up. `reconcile` settles each prediction against
 * the next snapshot exactly once: a prediction the venue has absorbed is
 * cleared, one it has not is given a single extra cycle, then dropped.
 */

import type { Balance } from "../client/types.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { Decimal } from "../shared/decimal.js";
import { ConfigurationError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import { MonotonicClock } from "../shared/time.js";
import type { BalanceFetcher, PendingAction, ReconcileReport } from "./types.js";

const DEFAULT_CACHE_TTL_MS = 5_000;
const DEFAULT_TOLERANCE = "0.000000001";
/** A mismatched prediction survives this many reconcile passes. */
const MAX_PENDING_CYCLES = 1;

export interface BalanceTrackerConfig {
	readonly fetcher?: BalanceFetcher;
	readonly cacheTtlMs?: number;
	readonly tolerance?: Decimal;
	readonly clock?: Clock;
	readonly logger?: Logger;
}

interface PendingEntry {
	readonly delta: Decimal;
	/** Reconcile passes this prediction has already survived. */
	readonly cycles: number;
}

export class BalanceTracker {
	private readonly fetcher: BalanceFetcher | undefined;
	private readonly cacheTtlMs: number;
	private readonly tolerance: Decimal;
	private readonly clock: Clock;
	private readonly logger: Logger;

	private readonly available = new Map<string, Decimal>();
	private readonly held = new Map<string, Decimal>();
	private readonly pending = new Map<string, PendingEntry>();
	private lastFetchMs: number | null = null;

	constructor(config: BalanceTrackerConfig = {}) {
		this.fetcher = config.fetcher;
		this.cacheTtlMs = config.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
		this.tolerance = config.tolerance ?? Decimal.from(DEFAULT_TOLERANCE);
		this.clock = config.clock ?? MonotonicClock;
		this.logger = config.logger ?? silentLogger();
	}

	// ── Queries ────────────────────────────────────────────────────

	/** Venue available balance plus any pending prediction. */
	get(asset: string): Decimal {
		const key = asset.toUpperCase();
		return this.venueAvailable(key).add(this.pendingDelta(key));
	}

	/** The last venue-reported available balance, without predictions. */
	venueAvailable(asset: string): Decimal {
		return this.available.get(asset.toUpperCase()) ?? Decimal.zero();
	}

	venueHeld(asset: string): Decimal {
		return this.held.get(asset.toUpperCase()) ?? Decimal.zero();
	}

	pendingDelta(asset: string): Decimal {
		return this.pending.get(asset.toUpperCase())?.delta ?? Decimal.zero();
	}

	get hasSnapshot(): boolean {
		return this.lastFetchMs !== null;
	}

	/** Effective balances per asset, as strings for logs and snapshots. */
	snapshot(): Record<string, string> {
		const out: Record<string, string> = {};
		const assets = new Set([...this.available.keys(), ...this.pending.keys()]);
		for (const asset of [...assets].sort()) {
			out[asset] = this.get(asset).toString();
		}
		return out;
	}

	// ── Predictions ────────────────────────────────────────────────

	/**
	 * Records the predicted effect of an order on `asset`.
	 * @example tracker.applyPending("USDT", price.mul(qty).neg())
	 */
	applyPending(asset: string, delta: Decimal): void {
		const key = asset.toUpperCase();
		const current = this.pending.get(key);
		const next = (current?.delta ?? Decimal.zero()).add(delta);
		this.store(key, next, 0);
	}

	/** Withdraws a prediction whose order was cancelled or rejected before it could settle. */
	resolvePending(asset: string, delta: Decimal): void {
		const key = asset.toUpperCase();
		const current = this.pending.get(key);
		if (current === undefined) return;
		this.store(key, current.delta.sub(delta), current.cycles);
	}

	// ── Venue truth ────────────────────────────────────────────────

	/**
	 * Settles pending predictions against a fresh venue snapshot, then
	 * replaces the cached balances with it.
	 */
	reconcile(fresh: readonly Balance[]): ReconcileReport {
		const freshAvailable = new Map<string, Decimal>();
		for (const balance of fresh) {
			freshAvailable.set(balance.asset.toUpperCase(), balance.available);
		}

		const actions: PendingAction[] = [];
		for (const [asset, entry] of [...this.pending]) {
			const previous = this.venueAvailable(asset);
			const expected = previous.add(entry.delta);
			const freshAmount = freshAvailable.get(asset) ?? Decimal.zero();

			if (freshAmount.sub(expected).abs().lte(this.tolerance)) {
				this.pending.delete(asset);
				actions.push({ type: "confirmed", asset, delta: entry.delta });
			} else if (entry.cycles < MAX_PENDING_CYCLES) {
				this.pending.set(asset, { delta: entry.delta, cycles: entry.cycles + 1 });
				actions.push({ type: "kept", asset, delta: entry.delta, expected, fresh: freshAmount });
			} else {
				this.pending.delete(asset);
				actions.push({ type: "dropped", asset, delta: entry.delta, fresh: freshAmount });
				this.logger.warn(
					{ asset, delta: entry.delta.toString(), fresh: freshAmount.toString() },
					"dropping stale pending balance prediction",
				);
			}
		}

		this.available.clear();
		this.held.clear();
		for (const balance of fresh) {
			const asset = balance.asset.toUpperCase();
			this.available.set(asset, balance.available);
			this.held.set(asset, balance.held);
		}
		this.lastFetchMs = this.clock.now();
		return { actions, assets: this.available.size };
	}

	/**
	 * Fetches and reconciles when the cache is older than `cacheTtlMs`
	 * (or always, with `force`).
	 * @returns true when a fetch happened
	 */
	async refresh(force = false): Promise<boolean> {
		if (this.fetcher === undefined) {
			throw new ConfigurationError("No balance fetcher configured");
		}
		if (!force && this.lastFetchMs !== null && this.clock.now() - this.lastFetchMs < this.cacheTtlMs) {
			return false;
		}
		const fresh = await this.fetcher();
		const report = this.reconcile(fresh);
		this.logger.debug({ assets: report.assets, settled: report.actions.length }, "balances refreshed");
		return true;
	}

	private store(asset: string, delta: Decimal, cycles: number): void {
		if (delta.abs().lte(this.tolerance)) {
			this.pending.delete(asset);
		} else {
			this.pending.set(asset, { delta, cycles });
		}
	}
}
