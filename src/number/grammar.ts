/**
 * Literal grammar — the five textual shapes a decimal literal may take.
 *
 * Matching is anchored at both ends and runs against normalized text
 * (trimmed, underscores removed, leading zeros stripped). Shapes are tried
 * in priority order; they are mutually exclusive, so at most one matches.
 */

/** Names of the accepted literal shapes, in matching order. */
export const LiteralShape = {
	Whole: "whole",
	Fractional: "fractional",
	Exponential: "exponential",
	Infinity: "infinity",
	NaN: "nan",
} as const;

export type LiteralShape = (typeof LiteralShape)[keyof typeof LiteralShape];

export type LiteralMatch =
	| { readonly shape: typeof LiteralShape.Whole; readonly sign: string; readonly digits: string }
	| {
			readonly shape: typeof LiteralShape.Fractional;
			readonly sign: string;
			readonly integerDigits: string;
			readonly fractionDigits: string;
	  }
	| {
			readonly shape: typeof LiteralShape.Exponential;
			readonly sign: string;
			readonly integerDigits: string;
			readonly fractionDigits: string;
			readonly exponentSign: string;
			readonly exponentDigits: string;
	  }
	| { readonly shape: typeof LiteralShape.Infinity; readonly sign: string }
	| { readonly shape: typeof LiteralShape.NaN };

// [sign] digits [.]
const WHOLE = /^([-+]?)([0-9]+)\.?$/;
// [sign] [digits] . digits
const FRACTIONAL = /^([-+]?)([0-9]*)\.([0-9]+)$/;
// [sign] [digits] [. [digits]] (E|e) [sign] digits, at least one mantissa digit
const EXPONENTIAL = /^([-+]?)([0-9]*)(?:\.([0-9]*))?[Ee]([-+]?)([0-9]+)$/;
const INFINITY = /^([-+]?)inf(?:inity)?$/i;
const NAN = /^nan$/i;

/**
 * Trim, drop `_` group separators, then strip leading zeros that precede
 * another digit ("007" → "7", "0.5" and "0E+5" unchanged).
 */
export function normalizeLiteral(text: string): string {
	return text.trim().replaceAll("_", "").replace(/^0+(?=[0-9])/, "");
}

/** Classify normalized text; `undefined` when no shape matches. */
export function matchLiteral(text: string): LiteralMatch | undefined {
	const whole = WHOLE.exec(text);
	if (whole) {
		return { shape: LiteralShape.Whole, sign: whole[1] ?? "", digits: whole[2] ?? "" };
	}

	const fractional = FRACTIONAL.exec(text);
	if (fractional) {
		return {
			shape: LiteralShape.Fractional,
			sign: fractional[1] ?? "",
			integerDigits: fractional[2] ?? "",
			fractionDigits: fractional[3] ?? "",
		};
	}

	const exponential = EXPONENTIAL.exec(text);
	if (exponential) {
		const integerDigits = exponential[2] ?? "";
		const fractionDigits = exponential[3] ?? "";
		if (integerDigits.length + fractionDigits.length > 0) {
			return {
				shape: LiteralShape.Exponential,
				sign: exponential[1] ?? "",
				integerDigits,
				fractionDigits,
				exponentSign: exponential[4] ?? "",
				exponentDigits: exponential[5] ?? "",
			};
		}
	}

	const inf = INFINITY.exec(text);
	if (inf) {
		return { shape: LiteralShape.Infinity, sign: inf[1] ?? "" };
	}

	if (NAN.test(text)) {
		return { shape: LiteralShape.NaN };
	}

	return undefined;
}
