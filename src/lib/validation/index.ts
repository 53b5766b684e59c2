/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code builds schemas with the re-exported `z` and never imports
 * zod directly, so the dependency stays behind one import path.
 */

import { z } from "zod";
import { ValidationError } from "../../shared/errors.js";
import type { ValidationIssue } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };
export { ValidationError };
export type { ValidationIssue };

function formatIssue(issue: ValidationIssue): string {
	return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * Validate data against a Zod schema, returning a Result instead of throwing.
 * @param label - What was being validated; prefixes the error message
 */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	label = "Validation",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	const summary = issues.slice(0, 3).map(formatIssue).join("; ");
	return err(new ValidationError(`${label} failed: ${summary}`, {}, issues));
}
