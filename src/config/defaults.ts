/**
 * Every configuration default, in one place. Components never carry their
 * own fallbacks for these values; they receive the validated BotConfig.
 */

export const DEFAULT_API = {
	baseUrl: "https://api.nonkyc.io",
	wsUrl: "wss://ws.nonkyc.io",
	timeoutMs: 10_000,
	maxRetries: 3,
	backoffFactorMs: 500,
	/** 1 = millisecond nonces; 10 gives the 1e4-per-second format. */
	nonceMultiplier: 1,
	signingMode: "absolute",
	/** Nonces follow the venue clock, synced at most once a minute. */
	useServerTime: false,
	rateLimit: {
		capacity: 10,
		refillPerSecond: 5,
	},
} as const;

export const DEFAULT_STREAM = {
	enabled: true,
	pingIntervalMs: 20_000,
	pongTimeoutMs: 10_000,
	handshakeTimeoutMs: 10_000,
	reconnectBaseMs: 1_000,
	reconnectMaxMs: 60_000,
	maxConsecutiveFailures: 10,
} as const;

export const DEFAULT_LADDER = {
	variant: "bounded",
	mode: "live",
	stepMode: "pct",
	nBuyLevels: 3,
	nSellLevels: 3,
	baseOrderSize: "1",
	totalFeeRate: "0.002",
	feeBufferPct: "0.0001",
	minNotionalQuote: "1.05",
	/** 0 disables rounding. */
	tickSize: "0",
	stepSize: "0",
	buySizingMode: "fixed",
	sellSizingMode: "fixed",
	extendBuyLevelsOnRestart: false,
} as const;

export const DEFAULT_RUNNER = {
	pollIntervalMs: 5_000,
	maxPollBackoffMs: 300_000,
	statePath: "state/ladder-state.json",
	startupCancelAll: false,
	startupRebalance: false,
	/** Share of portfolio value to hold in the base asset after rebalancing. */
	rebalanceTargetBasePct: "0.5",
	rebalanceSlippagePct: "0.002",
	rebalanceMaxAttempts: 2,
	balanceCacheTtlMs: 5_000,
} as const;

export const DEFAULT_LOG_LEVEL = "info";
