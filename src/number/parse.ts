/**
 * Parser — builds decimal values from text, integers and binary floats.
 */

import { InvalidLiteralError } from "../shared/errors.js";
import { type Result, err, flatMap, ok } from "../shared/result.js";
import { LiteralShape, type LiteralMatch, matchLiteral, normalizeLiteral } from "./grammar.js";
import { Sign, signFromString } from "./sign.js";
import type { DecimalValue } from "./types.js";
import {
	NAN,
	NEGATIVE_INFINITY,
	POSITIVE_INFINITY,
	EXPONENT_RANGE_HINT,
	ZERO,
	finite,
	infinity,
	isRepresentable,
} from "./value.js";

/**
 * Parse a decimal literal.
 *
 * Accepts `[sign]digits[.]`, `[sign][digits].digits`, an exponential form
 * with `E`/`e`, `[sign]Inf`/`Infinity` and `NaN` (letters case-insensitive).
 * Surrounding whitespace, `_` separators and redundant leading zeros are ignored.
 *
 * @example parse("123.456") // ok({ sign: "positive", coefficient: "123456", exponent: -3 })
 * @example parse("1_000") // ok({ sign: "positive", coefficient: "1000", exponent: 0 })
 */
export function parse(text: string): Result<DecimalValue, InvalidLiteralError> {
	const normalized = normalizeLiteral(text);
	if (normalized === "" || normalized === "0") {
		return ok(ZERO);
	}

	const match = matchLiteral(normalized);
	if (match === undefined) {
		return err(new InvalidLiteralError(normalized, { input: text }));
	}
	return fromMatch(match, normalized, text);
}

function fromMatch(
	match: LiteralMatch,
	normalized: string,
	input: string,
): Result<DecimalValue, InvalidLiteralError> {
	if (match.shape === LiteralShape.NaN) {
		return ok(NAN);
	}
	const signed = match;
	return flatMap(signFromString(signed.sign), (sign) => build(sign, signed, normalized, input));
}

function build(
	sign: Sign,
	match: Exclude<LiteralMatch, { shape: typeof LiteralShape.NaN }>,
	normalized: string,
	input: string,
): Result<DecimalValue, InvalidLiteralError> {
	switch (match.shape) {
		case LiteralShape.Infinity:
			return ok(infinity(sign));
		case LiteralShape.Whole:
			return ok(finite(sign, match.digits || "0", 0));
		case LiteralShape.Fractional:
			return ok(
				finite(
					sign,
					(match.integerDigits || "0") + match.fractionDigits,
					-match.fractionDigits.length,
				),
			);
		case LiteralShape.Exponential: {
			const coefficient = (match.integerDigits || "0") + match.fractionDigits;
			const stated = BigInt(match.exponentDigits);
			const exponent =
				(match.exponentSign === "-" ? -stated : stated) -
				BigInt(match.fractionDigits.length);
			if (!isRepresentable(coefficient, exponent)) {
				return err(new InvalidLiteralError(normalized, { input }, EXPONENT_RANGE_HINT));
			}
			return ok(finite(sign, coefficient, Number(exponent)));
		}
	}
}

/**
 * Exact decimal for an integer. Numbers must be safe integers; bigints of
 * any size are accepted.
 */
export function fromInteger(n: number | bigint): Result<DecimalValue, InvalidLiteralError> {
	if (typeof n === "number" && !Number.isSafeInteger(n)) {
		return err(new InvalidLiteralError(String(n), {}, "expected a safe integer"));
	}
	const big = BigInt(n);
	const sign = big < 0n ? Sign.Negative : Sign.Positive;
	return ok(finite(sign, (big < 0n ? -big : big).toString(), 0));
}

/**
 * Decimal for the shortest round-trip rendering of a binary float.
 *
 * Whole-valued floats get exponent 0, the same as integer literals, so
 * `fromFloat(3)` and `parse("3")` are identical.
 */
export function fromFloat(x: number): DecimalValue {
	if (Number.isNaN(x)) return NAN;
	if (x === Number.POSITIVE_INFINITY) return POSITIVE_INFINITY;
	if (x === Number.NEGATIVE_INFINITY) return NEGATIVE_INFINITY;
	if (x === 0) return ZERO;

	const sign = x < 0 ? Sign.Negative : Sign.Positive;
	// Number#toString switches to "d.ddde±x" outside [1e-7, 1e21)
	const [mantissa = "", exponentText = "0"] = Math.abs(x).toString().split("e");
	const [integerDigits = "", fractionDigits = ""] = mantissa.split(".");
	return finite(
		sign,
		integerDigits + fractionDigits,
		Number(exponentText) - fractionDigits.length,
	);
}
