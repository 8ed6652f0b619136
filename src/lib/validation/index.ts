/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code imports `{ z }` from here rather than from "zod" directly, so the
 * dependency stays behind one import path.
 */

import { z } from "zod";
import { ErrorCategory, ErrorCode, LedgerError } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Parameter error containing one or more validation issues. */
export class ValidationError extends LedgerError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, ErrorCode.ValidationFailed, ErrorCategory.Parameter, {
			issues: issues.map((i) => `${i.path.join(".")}: ${i.message}`),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}
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
	}));
	return err(new ValidationError("Validation failed", issues));
}

// ── Shared schemas ──────────────────────────────────────────────────

/** Integer-valued bigint input: a bigint, a safe integer, or a decimal integer string. */
export const bigintLike = z.union([
	z.bigint(),
	z
		.number()
		.int()
		.refine((n) => Number.isSafeInteger(n), "must be a safe integer")
		.transform((n) => BigInt(n)),
	z
		.string()
		.regex(/^-?\d+$/, "must be an integer string")
		.transform((s) => BigInt(s)),
]);
