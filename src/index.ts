// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type OrderId,
	type ClientReferenceId,
	orderId,
	clientReferenceId,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	Decimal,
	OrderSide,
	oppositeSide,
	parseSide,
	splitSymbol,
	normalizeSymbol,
	Mutex,
	type Clock,
	SystemClock,
	MonotonicClock,
	FakeClock,
	Duration,
	sleep,
	TradingError,
	ErrorCategory,
	AuthenticationError,
	RateLimitError,
	TransientApiError,
	ValidationError,
	ConfigurationError,
	StreamError,
	CircuitOpenError,
	classifyError,
	isAuthenticationError,
	isRateLimitError,
	isTransientApiError,
	isValidationError,
	isConfigurationError,
} from "./shared/index.js";

// ── Config ──────────────────────────────────────────────────────────
export {
	BotConfigSchema,
	DEFAULT_API,
	DEFAULT_LADDER,
	DEFAULT_RUNNER,
	DEFAULT_STREAM,
	configFromEnv,
	loadConfig,
	toLadderConfig,
	toRebalanceSettings,
	toRestSetup,
	toStreamSetup,
} from "./config/index.js";
export type { BotConfig, BotConfigInput, ConfigOverrides, LadderSettings, RunnerSettings } from "./config/index.js";

// ── Auth ────────────────────────────────────────────────────────────
export {
	type ApiKeySet,
	type Credentials,
	type SigningMode,
	createCredentials,
	unwrapCredentials,
	NonceGenerator,
	ServerTimeClock,
	parseServerTime,
	RequestSigner,
	buildLoginPayload,
	signRequest,
} from "./auth/index.js";

// ── REST Client ─────────────────────────────────────────────────────
export { RestClient, OrderStatus, isTerminalStatus, parseOrder } from "./client/index.js";
export type {
	Balance,
	CancelResult,
	CancelTarget,
	CreateOrderRequest,
	RestClientSetup,
	Ticker,
	VenueOrder,
} from "./client/index.js";

// ── Streaming ───────────────────────────────────────────────────────
export { StreamClient, StreamState, ReconnectionPolicy } from "./websocket/index.js";
export type {
	ReconnectionConfig,
	StreamEvents,
	StreamHandler,
	StreamMessage,
	StreamSetup,
	StreamTransport,
	Subscription,
} from "./websocket/index.js";

// ── Balances ────────────────────────────────────────────────────────
export { BalanceTracker } from "./balance/index.js";
export type { BalanceFetcher, BalanceTrackerConfig, ReconcileReport } from "./balance/index.js";

// ── Ladder ──────────────────────────────────────────────────────────
export {
	LadderEngine,
	LadderRunner,
	StartupRebalancer,
	rebalanceNeed,
	LadderVariant,
	RunMode,
	SizingMode,
	StepMode,
	SkipReason,
	PlacementErrorKind,
	minProfitableStep,
	roundTripProfit,
} from "./ladder/index.js";
export type {
	LadderConfig,
	LadderEvents,
	LadderRunnerOptions,
	LadderVenue,
	PlacementResult,
	RebalanceOutcome,
	RebalanceSettings,
	ReconcileSummary,
	TrackedOrder,
	UpdateOutcome,
} from "./ladder/index.js";

// ── Persistence ─────────────────────────────────────────────────────
export { StateStore, EngineStateSchema, stripSecrets } from "./persistence/index.js";
export type { EngineState, StateStoreConfig } from "./persistence/index.js";

// ── Lib: HTTP ───────────────────────────────────────────────────────
export { TokenBucketRateLimiter } from "./lib/http/index.js";
export type { RateLimiterConfig, RateLimiterStats } from "./lib/http/index.js";

// ── Lib: WebSocket ──────────────────────────────────────────────────
export { WsClient } from "./lib/websocket/index.js";
export type { WsConfig, WsState } from "./lib/websocket/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { createLogger, silentLogger } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";

// ── Lib: Events ─────────────────────────────────────────────────────
export { TypedEmitter } from "./lib/events/index.js";
export type { EventMap } from "./lib/events/index.js";
