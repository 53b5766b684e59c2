export {
	type OrderId,
	type ClientReferenceId,
	orderId,
	clientReferenceId,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
} from "./result.js";

export {
	ErrorCategory,
	TradingError,
	AuthenticationError,
	RateLimitError,
	TransientApiError,
	ValidationError,
	type ValidationIssue,
	ConfigurationError,
	StreamError,
	CircuitOpenError,
	classifyError,
	isAuthenticationError,
	isRateLimitError,
	isTransientApiError,
	isValidationError,
	isConfigurationError,
} from "./errors.js";

export { Decimal } from "./decimal.js";
export { OrderSide, oppositeSide, parseSide } from "./side.js";
export {
	type SymbolParts,
	splitSymbol,
	normalizeSymbol,
	roundDownToTick,
	roundUpToTick,
	roundDownToStep,
	roundUpToStep,
} from "./symbols.js";
export { Mutex } from "./mutex.js";
export { type Clock, SystemClock, MonotonicClock, FakeClock, Duration, sleep } from "./time.js";
