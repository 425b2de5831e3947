/**
 * Rescale — move a value to a target exponent, dropping or appending
 * coefficient digits and rounding with the selected policy.
 */

import type { Sign } from "../number/sign.js";
import type { DecimalValue } from "../number/types.js";
import { ValueKind } from "../number/types.js";
import { finite, isRepresentable, isZeroCoefficient } from "../number/value.js";
import { DEFAULT_CONTEXT, type DecimalContext } from "../shared/config.js";
import { policyFor } from "./policies.js";
import { RoundingDecision, type RoundingMode } from "./types.js";

/** A rounding mode, or a context whose `rounding` supplies one. */
export type RoundingSource = RoundingMode | DecimalContext;

function modeOf(source: RoundingSource): RoundingMode {
	return typeof source === "string" ? source : source.rounding;
}

/**
 * Return `value` expressed with exponent `targetExponent`.
 *
 * Lowering the exponent appends zeros and is always exact. Raising it drops
 * trailing digits; `rounding` (a mode, or a context's mode; DEFAULT_CONTEXT
 * when omitted) decides whether the kept digits are incremented. Infinities
 * and NaN pass through.
 *
 * @throws RangeError if `targetExponent` is not a safe integer or the result
 * is not representable
 * @example rescale(parse("1.005"), -2, RoundingMode.HalfUp) // 1.01
 * @example rescale(parse("2.5"), 0, RoundingMode.HalfEven) // 2
 */
export function rescale(
	value: DecimalValue,
	targetExponent: number,
	rounding: RoundingSource = DEFAULT_CONTEXT,
): DecimalValue {
	if (!Number.isSafeInteger(targetExponent)) {
		throw new RangeError(`rescale: exponent must be a safe integer, got ${targetExponent}`);
	}
	if (value.kind !== ValueKind.Finite) {
		return value;
	}

	const { sign, coefficient, exponent } = value;
	if (isZeroCoefficient(coefficient)) {
		return checked(sign, coefficient, targetExponent);
	}

	if (exponent >= targetExponent) {
		return checked(
			sign,
			coefficient.padEnd(coefficient.length + exponent - targetExponent, "0"),
			targetExponent,
		);
	}

	let keep = coefficient.length + exponent - targetExponent;
	// Entirely below the target's last place: the policy sees a lone 1 one place under it
	let subject = value;
	if (keep < 0) {
		subject = finite(sign, "1", targetExponent - 1);
		keep = 0;
	}

	const kept = coefficient.slice(0, keep) || "0";
	const decision = policyFor(modeOf(rounding))(keep, subject);
	const rounded = decision === RoundingDecision.RoundUp ? (BigInt(kept) + 1n).toString() : kept;
	return checked(sign, rounded, targetExponent);
}

function checked(sign: Sign, coefficient: string, exponent: number): DecimalValue {
	if (!isRepresentable(coefficient, BigInt(exponent))) {
		throw new RangeError(`rescale: result at exponent ${exponent} is not representable`);
	}
	return finite(sign, coefficient, exponent);
}

/**
 * Rescale `value` to the exponent of `reference`. A non-finite reference
 * leaves `value` unchanged.
 */
export function quantize(
	value: DecimalValue,
	reference: DecimalValue,
	rounding: RoundingSource = DEFAULT_CONTEXT,
): DecimalValue {
	if (reference.kind !== ValueKind.Finite) {
		return value;
	}
	return rescale(value, reference.exponent, rounding);
}
