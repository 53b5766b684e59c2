export { TokenBucketRateLimiter } from "./rate-limiter.js";
export type { RateLimiterConfig, RateLimiterState, RateLimiterStats } from "./rate-limiter.js";
