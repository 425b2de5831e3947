/**
 * DecimalError hierarchy — structured error classification.
 *
 * Every error carries a category so callers can tell malformed input apart
 * from an operation that has no defined result and from internal faults.
 */

/** Error categories for decimal operations. */
export const ErrorCategory = {
	InvalidInput: "invalid_input",
	InvalidOperation: "invalid_operation",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing DecimalError subclasses with optional cause chain. */
interface DecimalErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all decimal operations. */
export class DecimalError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "DecimalError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Text that matches none of the literal shapes. Holds the normalized literal. */
export class InvalidLiteralError extends DecimalError {
	readonly literal: string;

	constructor(
		literal: string,
		context: Record<string, unknown> & DecimalErrorOptions = {},
		hint?: string,
	) {
		const { cause, ...rest } = context;
		super(`Invalid literal: "${literal}"`, "INVALID_LITERAL", ErrorCategory.InvalidInput, rest, hint);
		this.name = "InvalidLiteralError";
		this.literal = literal;
		if (cause !== undefined) this.cause = cause;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			literal: this.literal,
		};
	}
}

/** An ordering was requested with NaN as an operand. */
export class UndefinedComparisonError extends DecimalError {
	constructor(message: string, context: Record<string, unknown> & DecimalErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"UNDEFINED_COMPARISON",
			ErrorCategory.InvalidOperation,
			rest,
			"NaN has no position in the ordering; test with isNaN() first",
		);
		this.name = "UndefinedComparisonError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends DecimalError {
	constructor(message: string, context: Record<string, unknown> & DecimalErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends DecimalError {
	constructor(message: string, context: Record<string, unknown> & DecimalErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Wrap an unknown thrown value into the DecimalError hierarchy. */
export function classifyError(error: unknown): DecimalError {
	if (error instanceof DecimalError) return error;
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for InvalidLiteralError. */
export function isInvalidLiteral(e: unknown): e is InvalidLiteralError {
	return e instanceof InvalidLiteralError;
}

/** Type guard for UndefinedComparisonError. */
export function isUndefinedComparison(e: unknown): e is UndefinedComparisonError {
	return e instanceof UndefinedComparisonError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Type guard for SystemError. */
export function isSystemError(e: unknown): e is SystemError {
	return e instanceof SystemError;
}
