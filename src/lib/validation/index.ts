/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code imports `{ z }` from here rather than from "zod" directly, so the
 * dependency stays behind a single import path.
 */

import { z } from "zod";
import { TradingError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
	/** True when the field was absent rather than present with a bad value. */
	readonly missing: boolean;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends TradingError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", "non_retryable", { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}

	/** Dotted paths of every absent field, in schema order. */
	missingPaths(): readonly string[] {
		return this.issues.filter((i) => i.missing).map((i) => formatPath(i.path));
	}
}

/** Render an issue path as `a.b[0].c`. */
export function formatPath(path: readonly (string | number)[]): string {
	let out = "";
	for (const part of path) {
		if (typeof part === "number") {
			out += `[${part}]`;
		} else {
			out += out.length === 0 ? part : `.${part}`;
		}
	}
	return out.length === 0 ? "(root)" : out;
}

/**
 * An absent value fails every branch of a union the same way, so one branch
 * reporting `undefined` is enough to call the field missing.
 */
function isMissing(issue: z.ZodIssue): boolean {
	if (issue.code === "invalid_type") return issue.received === "undefined";
	if (issue.code === "invalid_union") {
		return issue.unionErrors.some((e) =>
			e.issues.some((inner) => inner.path.length === issue.path.length && isMissing(inner)),
		);
	}
	return false;
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
		missing: isMissing(i),
	}));
	return err(new ValidationError("Validation failed", issues));
}
