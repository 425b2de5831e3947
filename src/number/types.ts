import type { Sign } from "./sign.js";

/** Discriminator for the three shapes a decimal value can take. */
export const ValueKind = {
	Finite: "finite",
	Infinity: "infinity",
	NaN: "nan",
} as const;

export type ValueKind = (typeof ValueKind)[keyof typeof ValueKind];

/**
 * Exact number `sign × coefficient × 10^exponent`.
 *
 * `coefficient` is a non-empty run of ASCII digits. Leading zeros are kept
 * as parsed ("0.05" holds "005"), so two finite values can be equal in
 * value while differing in representation.
 */
export interface FiniteValue {
	readonly kind: typeof ValueKind.Finite;
	readonly sign: Sign;
	readonly coefficient: string;
	readonly exponent: number;
}

/** Signed unbounded magnitude. */
export interface InfinityValue {
	readonly kind: typeof ValueKind.Infinity;
	readonly sign: Sign;
}

/** Not-a-number. Unsigned and unordered. */
export interface NaNValue {
	readonly kind: typeof ValueKind.NaN;
}

export type DecimalValue = FiniteValue | InfinityValue | NaNValue;

/** `[signAsInt, coefficient | "Inf" | "NaN", exponent]` */
export type DecimalTuple = readonly [1 | -1, string, number];
