import { describe, expect, it } from "vitest";
import {
	AuthenticationError,
	RateLimitError,
	TransientApiError,
	ValidationError,
} from "../shared/errors.js";
import {
	MIN_NOTIONAL_MESSAGE,
	classifyHttpFailure,
	detectMinNotional,
	parseRetryAfterMs,
} from "./http-errors.js";

const failure = (status: number, payloadText = "", retryAfter: string | null = null) => ({
	status,
	payloadText,
	retryAfter,
	endpoint: "/api/v2/createorder",
});

describe("classifyHttpFailure", () => {
	it("maps 401 to AuthenticationError with guidance and endpoint", () => {
		const error = classifyHttpFailure(failure(401, '{"error":"bad sign"}'));
		expect(error).toBeInstanceOf(AuthenticationError);
		expect(error.message).toContain("clock skew");
		expect(error.message).toContain('Endpoint: /api/v2/createorder Response payload: {"error":"bad sign"}');
		expect(error.isFatal).toBe(true);
	});

	it("maps 429 to RateLimitError with the Retry-After hint in ms", () => {
		const error = classifyHttpFailure(failure(429, "", "1.5"));
		expect(error).toBeInstanceOf(RateLimitError);
		expect(error instanceof RateLimitError ? error.retryAfterMs : undefined).toBe(1500);
	});

	it.each([500, 502, 503, 504])("maps %d to TransientApiError", (status) => {
		expect(classifyHttpFailure(failure(status))).toBeInstanceOf(TransientApiError);
	});

	it("maps other statuses to ValidationError", () => {
		const error = classifyHttpFailure(failure(404, "not found"));
		expect(error).toBeInstanceOf(ValidationError);
		expect(error.message).toBe("HTTP error 404: not found");
		expect(error.isRetryable).toBe(false);
	});

	it("flags insufficient funds rejections", () => {
		const error = classifyHttpFailure(failure(400, '{"error":"Insufficient funds for order creation"}'));
		expect(error.context["insufficientFunds"]).toBe(true);
	});
});

describe("detectMinNotional", () => {
	it("recognises venue error codes", () => {
		expect(detectMinNotional('{"code":"min_notional_not_met"}')).toBe(MIN_NOTIONAL_MESSAGE);
		expect(detectMinNotional('{"errors":{"errorCode":"MIN_NOTIONAL"}}')).toBe(MIN_NOTIONAL_MESSAGE);
	});

	it("recognises keywords in the message or raw text", () => {
		expect(detectMinNotional('{"message":"Order value below minimum"}')).toBe(MIN_NOTIONAL_MESSAGE);
		expect(detectMinNotional("total is under the min for this market")).toBe(MIN_NOTIONAL_MESSAGE);
	});

	it("ignores unrelated rejections", () => {
		expect(detectMinNotional('{"error":"Invalid symbol"}')).toBeUndefined();
		expect(detectMinNotional("")).toBeUndefined();
	});
});

describe("parseRetryAfterMs", () => {
	it("accepts seconds and rejects garbage", () => {
		expect(parseRetryAfterMs("3")).toBe(3000);
		expect(parseRetryAfterMs(null)).toBeUndefined();
		expect(parseRetryAfterMs("soon")).toBeUndefined();
	});
});
