/**
 * Formatter — canonical text for a decimal value.
 *
 * Plain notation is used when the exponent is non-positive and the most
 * significant digit sits no more than six places right of the point;
 * otherwise scientific (one digit before the point) or engineering
 * (exponent a multiple of three) notation.
 */

import { DEFAULT_CONTEXT, type DecimalContext } from "../shared/config.js";
import { signToString } from "./sign.js";
import { type DecimalValue, type FiniteValue, ValueKind } from "./types.js";

export interface FormatOptions {
	/** Supplies `capitals` when it is not given. Defaults to DEFAULT_CONTEXT. */
	readonly context?: DecimalContext;
	/** `E` rather than `e` before the exponent. Defaults to the context's `capitals`. */
	readonly capitals?: boolean;
	/** Engineering notation: exponent kept a multiple of 3. */
	readonly engineering?: boolean;
}

/**
 * @example format(parse("1.5e3")) // "1.5E+3"
 * @example format(parse("1.5e3"), { engineering: true, capitals: false }) // "1.5e+3"
 * @example format(parse("1.5e3"), { context: resolveContext() })
 */
export function format(value: DecimalValue, options: FormatOptions = {}): string {
	switch (value.kind) {
		case ValueKind.NaN:
			return "NaN";
		case ValueKind.Infinity:
			return `${signToString(value.sign)}Infinity`;
		case ValueKind.Finite:
			return formatFinite(
				value,
				options.capitals ?? (options.context ?? DEFAULT_CONTEXT).capitals,
				options.engineering ?? false,
			);
	}
}

function formatFinite(value: FiniteValue, capitals: boolean, engineering: boolean): string {
	const { coefficient, exponent } = value;
	// digits of the coefficient left of the point, before any exponent is applied
	const leftDigits = BigInt(exponent) + BigInt(coefficient.length);
	const dotPlace = placeDot(leftDigits, exponent, coefficient, engineering);

	let intPart: string;
	let fracPart: string;
	if (dotPlace <= 0) {
		intPart = "0";
		fracPart = `.${"0".repeat(-dotPlace)}${coefficient}`;
	} else if (dotPlace >= coefficient.length) {
		intPart = coefficient.padEnd(dotPlace, "0");
		fracPart = "";
	} else {
		intPart = coefficient.slice(0, dotPlace);
		fracPart = `.${coefficient.slice(dotPlace)}`;
	}

	const suffix = exponentSuffix(leftDigits - BigInt(dotPlace), capitals);
	return `${signToString(value.sign)}${intPart}${fracPart}${suffix}`;
}

/** Coefficient digits before the printed point; zero or less means leading zeros after it. */
function placeDot(
	leftDigits: bigint,
	exponent: number,
	coefficient: string,
	engineering: boolean,
): number {
	if (exponent <= 0 && leftDigits > -6n) {
		return Number(leftDigits);
	}
	if (!engineering) {
		return 1;
	}
	if (coefficient === "0") {
		return Number(floorMod(leftDigits + 1n, 3n)) - 1;
	}
	return Number(floorMod(leftDigits - 1n, 3n)) + 1;
}

/** Modulo taking the sign of the divisor (`floorMod(-8n, 3n) === 1n`). */
function floorMod(n: bigint, m: bigint): bigint {
	return ((n % m) + m) % m;
}

function exponentSuffix(exp: bigint, capitals: boolean): string {
	if (exp === 0n) {
		return "";
	}
	const letter = capitals ? "E" : "e";
	return exp > 0n ? `${letter}+${exp}` : `${letter}${exp}`;
}
