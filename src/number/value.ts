/**
 * Value representation — constructors, constants and structural queries.
 *
 * Every function returns a new frozen value; nothing here mutates its input.
 */

import { InvalidLiteralError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { Sign, negateSign, signToInt } from "./sign.js";
import {
	type DecimalTuple,
	type DecimalValue,
	type FiniteValue,
	type InfinityValue,
	type NaNValue,
	ValueKind,
} from "./types.js";

const DIGITS = /^[0-9]+$/;
const ALL_ZEROS = /^0+$/;
const LEADING_ZEROS = /^0+/;

/**
 * The leading significant digit must sit this many places inside the
 * safe-integer range, so every layout of a value can be written out and
 * parsed back with a safe exponent.
 */
const EXPONENT_MARGIN = 3;
export const MAX_ADJUSTED = Number.MAX_SAFE_INTEGER - EXPONENT_MARGIN;
export const MIN_ADJUSTED = Number.MIN_SAFE_INTEGER + EXPONENT_MARGIN;

export const EXPONENT_RANGE_HINT = "exponent is outside the representable range";

// ── Constructors ────────────────────────────────────────────────────

/** Build a finite value from parts already known to be well-formed. */
export function finite(sign: Sign, coefficient: string, exponent: number): FiniteValue {
	return Object.freeze({ kind: ValueKind.Finite, sign, coefficient, exponent });
}

export function infinity(sign: Sign): InfinityValue {
	return Object.freeze({ kind: ValueKind.Infinity, sign });
}

/**
 * True when `exponent` and `exponent + coefficient.length` are safe integers
 * and the leading significant digit lies within [MIN_ADJUSTED, MAX_ADJUSTED].
 * An all-zero coefficient is placed at `exponent`.
 */
export function isRepresentable(coefficient: string, exponent: bigint): boolean {
	if (
		exponent < BigInt(Number.MIN_SAFE_INTEGER) ||
		exponent + BigInt(coefficient.length) > BigInt(Number.MAX_SAFE_INTEGER)
	) {
		return false;
	}
	const significant = coefficient.replace(LEADING_ZEROS, "").length;
	const leading = significant === 0 ? exponent : exponent + BigInt(significant - 1);
	return leading >= BigInt(MIN_ADJUSTED) && leading <= BigInt(MAX_ADJUSTED);
}

/**
 * Build a finite value from untrusted parts.
 * Fails when the coefficient is not a digit run, the exponent is not an
 * integer, or the value is not representable.
 */
export function createFinite(
	sign: Sign,
	coefficient: string,
	exponent: number,
): Result<FiniteValue, InvalidLiteralError> {
	if (!DIGITS.test(coefficient)) {
		return err(new InvalidLiteralError(coefficient, { exponent }, "coefficient must be digits only"));
	}
	if (!Number.isSafeInteger(exponent)) {
		return err(
			new InvalidLiteralError(coefficient, { exponent }, "exponent must be a safe integer"),
		);
	}
	if (!isRepresentable(coefficient, BigInt(exponent))) {
		return err(new InvalidLiteralError(coefficient, { exponent }, EXPONENT_RANGE_HINT));
	}
	return ok(finite(sign, coefficient, exponent));
}

// ── Constants ───────────────────────────────────────────────────────

export const ZERO: FiniteValue = finite(Sign.Positive, "0", 0);
export const ONE: FiniteValue = finite(Sign.Positive, "1", 0);
export const POSITIVE_INFINITY: InfinityValue = infinity(Sign.Positive);
export const NEGATIVE_INFINITY: InfinityValue = infinity(Sign.Negative);
export const NAN: NaNValue = Object.freeze({ kind: ValueKind.NaN });

// ── Queries ─────────────────────────────────────────────────────────

export function isFinite(value: DecimalValue): value is FiniteValue {
	return value.kind === ValueKind.Finite;
}

export function isInfinite(value: DecimalValue): value is InfinityValue {
	return value.kind === ValueKind.Infinity;
}

export function isNaN(value: DecimalValue): value is NaNValue {
	return value.kind === ValueKind.NaN;
}

/** True for a coefficient made only of zeros ("0", "000"). */
export function isZeroCoefficient(coefficient: string): boolean {
	return ALL_ZEROS.test(coefficient);
}

/** True for any finite zero, whatever its sign or exponent. */
export function isZero(value: DecimalValue): boolean {
	return isFinite(value) && isZeroCoefficient(value.coefficient);
}

/** False only for a finite zero. NaN and infinities are truthy. */
export function toBool(value: DecimalValue): boolean {
	return !isZero(value);
}

/** `-1` for negative values, `1` otherwise. NaN reports `1`. */
export function signOf(value: DecimalValue): 1 | -1 {
	return value.kind === ValueKind.NaN ? 1 : signToInt(value.sign);
}

/** Adjusted exponent (position of the first coefficient digit); specials report `0`. */
export function adjusted(value: DecimalValue): number {
	return isFinite(value) ? value.exponent + value.coefficient.length - 1 : 0;
}

export function toTuple(value: DecimalValue): DecimalTuple {
	switch (value.kind) {
		case ValueKind.Finite:
			return [signToInt(value.sign), value.coefficient, value.exponent];
		case ValueKind.Infinity:
			return [signToInt(value.sign), "Inf", 0];
		case ValueKind.NaN:
			return [1, "NaN", 0];
	}
}

// ── Sign transforms ─────────────────────────────────────────────────

export function negate(value: DecimalValue): DecimalValue {
	switch (value.kind) {
		case ValueKind.Finite:
			return finite(negateSign(value.sign), value.coefficient, value.exponent);
		case ValueKind.Infinity:
			return infinity(negateSign(value.sign));
		case ValueKind.NaN:
			return value;
	}
}

/** Magnitude: negative values flip to positive, NaN passes through. */
export function abs(value: DecimalValue): DecimalValue {
	if (value.kind === ValueKind.NaN || value.sign === Sign.Positive) {
		return value;
	}
	return value.kind === ValueKind.Finite
		? finite(Sign.Positive, value.coefficient, value.exponent)
		: POSITIVE_INFINITY;
}
