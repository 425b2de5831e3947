/**
 * Comparator — total order over finite values and infinities.
 *
 * NaN has no place in the order: any comparison involving it is an
 * UndefinedComparisonError, and so is every relational helper built on it.
 */

import { UndefinedComparisonError } from "../shared/errors.js";
import { type Result, err, map, ok } from "../shared/result.js";
import { Sign, signToInt } from "./sign.js";
import { type DecimalValue, type FiniteValue, ValueKind } from "./types.js";
import { isZeroCoefficient } from "./value.js";

export type Ordering = -1 | 0 | 1;

/**
 * Three-way comparison by value, not representation:
 * `compare(parse("1E2"), parse("100"))` is `ok(0)`.
 */
export function compare(
	a: DecimalValue,
	b: DecimalValue,
): Result<Ordering, UndefinedComparisonError> {
	if (a.kind === ValueKind.NaN || b.kind === ValueKind.NaN) {
		return err(
			new UndefinedComparisonError("Cannot order NaN against a decimal", {
				left: a.kind,
				right: b.kind,
			}),
		);
	}

	if (a.kind === ValueKind.Infinity) {
		if (b.kind === ValueKind.Infinity && a.sign === b.sign) return ok<Ordering>(0);
		return ok<Ordering>(a.sign === Sign.Negative ? -1 : 1);
	}
	if (b.kind === ValueKind.Infinity) {
		return ok<Ordering>(b.sign === Sign.Negative ? 1 : -1);
	}

	return ok(compareFinite(a, b));
}

function compareFinite(a: FiniteValue, b: FiniteValue): Ordering {
	const aZero = isZeroCoefficient(a.coefficient);
	const bZero = isZeroCoefficient(b.coefficient);
	if (aZero && bZero) return 0;
	if (aZero) return negateOrdering(signToInt(b.sign));
	if (bZero) return signToInt(a.sign);

	if (a.sign !== b.sign) {
		return a.sign === Sign.Negative ? -1 : 1;
	}

	const magnitude = compareMagnitude(a, b);
	return a.sign === Sign.Negative ? negateOrdering(magnitude) : magnitude;
}

/** Order two nonzero finite values by absolute value. */
function compareMagnitude(a: FiniteValue, b: FiniteValue): Ordering {
	const aDigits = significantDigits(a.coefficient);
	const bDigits = significantDigits(b.coefficient);

	// a's leading-digit position minus b's, without forming either position
	const shift = a.exponent - b.exponent + (aDigits.length - bDigits.length);
	if (shift !== 0) {
		return shift > 0 ? 1 : -1;
	}

	// Same leading position: padding to a common scale gives equal-length digit runs
	const aPadded = aDigits.padEnd(bDigits.length, "0");
	const bPadded = bDigits.padEnd(aDigits.length, "0");
	if (aPadded === bPadded) return 0;
	return aPadded > bPadded ? 1 : -1;
}

function significantDigits(coefficient: string): string {
	return coefficient.replace(/^0+/, "");
}

function negateOrdering(o: Ordering): Ordering {
	return o === 0 ? 0 : o === 1 ? -1 : 1;
}

// ── Relational helpers ──────────────────────────────────────────────

export function eq(a: DecimalValue, b: DecimalValue): Result<boolean, UndefinedComparisonError> {
	return map(compare(a, b), (o) => o === 0);
}

export function lt(a: DecimalValue, b: DecimalValue): Result<boolean, UndefinedComparisonError> {
	return map(compare(a, b), (o) => o < 0);
}

export function lte(a: DecimalValue, b: DecimalValue): Result<boolean, UndefinedComparisonError> {
	return map(compare(a, b), (o) => o <= 0);
}

export function gt(a: DecimalValue, b: DecimalValue): Result<boolean, UndefinedComparisonError> {
	return map(compare(a, b), (o) => o > 0);
}

export function gte(a: DecimalValue, b: DecimalValue): Result<boolean, UndefinedComparisonError> {
	return map(compare(a, b), (o) => o >= 0);
}

/** The smaller operand; `a` when they are equal. */
export function min(
	a: DecimalValue,
	b: DecimalValue,
): Result<DecimalValue, UndefinedComparisonError> {
	return map(compare(a, b), (o) => (o <= 0 ? a : b));
}

/** The larger operand; `a` when they are equal. */
export function max(
	a: DecimalValue,
	b: DecimalValue,
): Result<DecimalValue, UndefinedComparisonError> {
	return map(compare(a, b), (o) => (o >= 0 ? a : b));
}
