/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code builds schemas with the re-exported `z` and never imports zod
 * directly, so the dependency stays behind a single import path.
 */

import { z } from "zod";
import { DecimalError, ErrorCategory } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Invalid-input error containing one or more validation issues. */
export class ValidationError extends DecimalError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.InvalidInput, {
			fields: issues.map((i) => i.path.join(".")),
		});
		this.name = "ValidationError";
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			issues: this.issues,
		};
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T>,
	data: unknown,
	label = "Validation failed",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError(label, issues));
}
