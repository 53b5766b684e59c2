/**
 * BotConfig — the one validated configuration object built at start-up.
 *
 * Decimal settings are kept as plain strings here so the config stays
 * serializable; {@link toLadderConfig} turns them into Decimals for the engine.
 */

import type { RestClientSetup } from "../client/rest-client.js";
import type { RebalanceSettings } from "../ladder/rebalance.js";
import type { LadderConfig } from "../ladder/types.js";
import { z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { normalizeSymbol } from "../shared/symbols.js";
import type { StreamSetup } from "../websocket/stream-client.js";
import { DEFAULT_API, DEFAULT_LADDER, DEFAULT_LOG_LEVEL, DEFAULT_RUNNER, DEFAULT_STREAM } from "./defaults.js";

// ── Field helpers ────────────────────────────────────────────────────

function decimalField(rule: "positive" | "non-negative") {
	return z
		.union([z.string(), z.number()])
		.transform((value) => String(value).trim())
		.superRefine((value, ctx) => {
			const parsed = Decimal.parse(value);
			if (parsed === null) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a decimal number` });
			} else if (rule === "positive" && !parsed.isPositive()) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be greater than 0" });
			} else if (rule === "non-negative" && parsed.isNegative()) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must not be negative" });
			}
		});
}

const positiveDecimal = () => decimalField("positive");
const nonNegativeDecimal = () => decimalField("non-negative");
const positiveInt = () => z.number().int().positive();
const levelCount = () => z.number().int().min(0);

const SymbolField = z.string().transform((value, ctx) => {
	try {
		return normalizeSymbol(value);
	} catch (error) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: error instanceof Error ? error.message : String(error),
		});
		return z.NEVER;
	}
});

// ── Sections ─────────────────────────────────────────────────────────

const ApiSchema = z.object({
	baseUrl: z.string().url().default(DEFAULT_API.baseUrl),
	wsUrl: z.string().url().default(DEFAULT_API.wsUrl),
	timeoutMs: positiveInt().default(DEFAULT_API.timeoutMs),
	maxRetries: z.number().int().min(0).default(DEFAULT_API.maxRetries),
	backoffFactorMs: z.number().min(0).default(DEFAULT_API.backoffFactorMs),
	nonceMultiplier: z.number().positive().default(DEFAULT_API.nonceMultiplier),
	signingMode: z.enum(["absolute", "path"]).default(DEFAULT_API.signingMode),
	useServerTime: z.boolean().default(DEFAULT_API.useServerTime),
	rateLimit: z
		.object({
			capacity: positiveInt().default(DEFAULT_API.rateLimit.capacity),
			refillPerSecond: z.number().positive().default(DEFAULT_API.rateLimit.refillPerSecond),
		})
		.default({}),
});

const StreamSchema = z.object({
	enabled: z.boolean().default(DEFAULT_STREAM.enabled),
	pingIntervalMs: positiveInt().default(DEFAULT_STREAM.pingIntervalMs),
	pongTimeoutMs: positiveInt().default(DEFAULT_STREAM.pongTimeoutMs),
	handshakeTimeoutMs: positiveInt().default(DEFAULT_STREAM.handshakeTimeoutMs),
	reconnectBaseMs: positiveInt().default(DEFAULT_STREAM.reconnectBaseMs),
	reconnectMaxMs: positiveInt().default(DEFAULT_STREAM.reconnectMaxMs),
	maxConsecutiveFailures: positiveInt().default(DEFAULT_STREAM.maxConsecutiveFailures),
});

const SizingModeField = z.enum(["fixed", "dynamic", "hybrid"]);

const LadderSchema = z
	.object({
		symbol: SymbolField,
		variant: z.enum(["bounded", "unbounded"]).default(DEFAULT_LADDER.variant),
		mode: z.enum(["live", "dry-run", "monitor"]).default(DEFAULT_LADDER.mode),
		stepMode: z.enum(["pct", "abs"]).default(DEFAULT_LADDER.stepMode),
		stepPct: positiveDecimal().optional(),
		stepAbs: positiveDecimal().optional(),
		nBuyLevels: levelCount().default(DEFAULT_LADDER.nBuyLevels),
		nSellLevels: levelCount().optional(),
		/** Unbounded ladders name their initial sell window this way. */
		initialSellLevels: levelCount().optional(),
		baseOrderSize: positiveDecimal().default(DEFAULT_LADDER.baseOrderSize),
		totalFeeRate: nonNegativeDecimal().default(DEFAULT_LADDER.totalFeeRate),
		feeBufferPct: nonNegativeDecimal().default(DEFAULT_LADDER.feeBufferPct),
		minNotionalQuote: nonNegativeDecimal().default(DEFAULT_LADDER.minNotionalQuote),
		tickSize: nonNegativeDecimal().default(DEFAULT_LADDER.tickSize),
		stepSize: nonNegativeDecimal().default(DEFAULT_LADDER.stepSize),
		buySizingMode: SizingModeField.default(DEFAULT_LADDER.buySizingMode),
		sellSizingMode: SizingModeField.default(DEFAULT_LADDER.sellSizingMode),
		targetQuotePerOrder: positiveDecimal().optional(),
		minBaseOrderQty: positiveDecimal().optional(),
		minOrderQty: positiveDecimal().optional(),
		/** Unbounded only: on restart, add buy levels below the current floor. */
		extendBuyLevelsOnRestart: z.boolean().default(DEFAULT_LADDER.extendBuyLevelsOnRestart),
	})
	.superRefine((ladder, ctx) => {
		if (ladder.stepMode === "pct" && ladder.stepPct === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["stepPct"], message: "required when stepMode is pct" });
		}
		if (ladder.stepMode === "abs" && ladder.stepAbs === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["stepAbs"], message: "required when stepMode is abs" });
		}
		const hybrid = ladder.buySizingMode === "hybrid" || ladder.sellSizingMode === "hybrid";
		if (hybrid && ladder.minBaseOrderQty === undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["minBaseOrderQty"],
				message: "required for hybrid sizing",
			});
		}
		const fee = Decimal.parse(ladder.totalFeeRate);
		const buffer = Decimal.parse(ladder.feeBufferPct);
		if (fee !== null && buffer !== null && fee.add(buffer).gte(Decimal.one())) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["totalFeeRate"],
				message: "totalFeeRate + feeBufferPct must be below 1",
			});
		}
	})
	.transform(({ nSellLevels, initialSellLevels, ...ladder }) => ({
		...ladder,
		nSellLevels:
			(ladder.variant === "unbounded" ? (initialSellLevels ?? nSellLevels) : (nSellLevels ?? initialSellLevels)) ??
			DEFAULT_LADDER.nSellLevels,
	}));

const RunnerSchema = z.object({
	pollIntervalMs: positiveInt().default(DEFAULT_RUNNER.pollIntervalMs),
	maxPollBackoffMs: positiveInt().default(DEFAULT_RUNNER.maxPollBackoffMs),
	statePath: z.string().min(1).default(DEFAULT_RUNNER.statePath),
	/** Cancel every open order for the symbol before seeding a fresh ladder. */
	startupCancelAll: z.boolean().default(DEFAULT_RUNNER.startupCancelAll),
	/** Trade toward `rebalanceTargetBasePct` before seeding a fresh ladder. */
	startupRebalance: z.boolean().default(DEFAULT_RUNNER.startupRebalance),
	rebalanceTargetBasePct: positiveDecimal()
		.default(DEFAULT_RUNNER.rebalanceTargetBasePct)
		.refine((value) => Decimal.parse(value)?.lt(Decimal.one()) ?? true, { message: "must be below 1" }),
	rebalanceSlippagePct: nonNegativeDecimal().default(DEFAULT_RUNNER.rebalanceSlippagePct),
	rebalanceMaxAttempts: positiveInt().default(DEFAULT_RUNNER.rebalanceMaxAttempts),
	balanceCacheTtlMs: z.number().int().min(0).default(DEFAULT_RUNNER.balanceCacheTtlMs),
});

export const BotConfigSchema = z.object({
	api: ApiSchema.default({}),
	stream: StreamSchema.default({}),
	ladder: LadderSchema,
	runner: RunnerSchema.default({}),
	logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default(DEFAULT_LOG_LEVEL),
});

export type BotConfig = z.infer<typeof BotConfigSchema>;
/** What a caller may hand to `loadConfig` before defaults are applied. */
export type BotConfigInput = z.input<typeof BotConfigSchema>;
export type LadderSettings = BotConfig["ladder"];
export type RunnerSettings = BotConfig["runner"];

// ── Projections ──────────────────────────────────────────────────────

function optionalDecimal(value: string | undefined): Decimal | undefined {
	return value === undefined ? undefined : Decimal.from(value);
}

/** The engine's view of the ladder settings, with Decimals. */
export function toLadderConfig(ladder: LadderSettings): LadderConfig {
	return {
		symbol: ladder.symbol,
		variant: ladder.variant,
		mode: ladder.mode,
		stepMode: ladder.stepMode,
		stepPct: optionalDecimal(ladder.stepPct),
		stepAbs: optionalDecimal(ladder.stepAbs),
		nBuyLevels: ladder.nBuyLevels,
		nSellLevels: ladder.nSellLevels,
		baseOrderSize: Decimal.from(ladder.baseOrderSize),
		totalFeeRate: Decimal.from(ladder.totalFeeRate),
		feeBufferPct: Decimal.from(ladder.feeBufferPct),
		minNotionalQuote: Decimal.from(ladder.minNotionalQuote),
		tickSize: Decimal.from(ladder.tickSize),
		stepSize: Decimal.from(ladder.stepSize),
		buySizingMode: ladder.buySizingMode,
		sellSizingMode: ladder.sellSizingMode,
		targetQuotePerOrder: optionalDecimal(ladder.targetQuotePerOrder),
		minBaseOrderQty: optionalDecimal(ladder.minBaseOrderQty),
		minOrderQty: optionalDecimal(ladder.minOrderQty),
		extendBuyLevelsOnRestart: ladder.extendBuyLevelsOnRestart,
	};
}

/** Start-up rebalance settings; a limit fallback is checked after one poll interval. */
export function toRebalanceSettings(runner: RunnerSettings): RebalanceSettings {
	return {
		targetBasePct: Decimal.from(runner.rebalanceTargetBasePct),
		slippagePct: Decimal.from(runner.rebalanceSlippagePct),
		maxAttempts: runner.rebalanceMaxAttempts,
		settleMs: runner.pollIntervalMs,
	};
}

export function toRestSetup(config: BotConfig): RestClientSetup {
	const { wsUrl: _wsUrl, ...rest } = config.api;
	return rest;
}

export function toStreamSetup(config: BotConfig): StreamSetup {
	const { enabled: _enabled, ...stream } = config.stream;
	return { url: config.api.wsUrl, ...stream };
}
