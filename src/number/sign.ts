/**
 * Sign — polarity of a decimal value.
 *
 * Acts as a multiplier (1 / -1) and as a display glyph ("" / "-").
 */

import { InvalidLiteralError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

/** The two polarities a finite value or an infinity can carry. */
export const Sign = {
	Positive: "positive",
	Negative: "negative",
} as const;

export type Sign = (typeof Sign)[keyof typeof Sign];

/** Read a sign glyph as captured by the literal grammar ("", "+" or "-"). */
export function signFromString(glyph: string): Result<Sign, InvalidLiteralError> {
	switch (glyph) {
		case "-":
			return ok(Sign.Negative);
		case "":
		case "+":
			return ok(Sign.Positive);
		default:
			return err(new InvalidLiteralError(glyph, {}, "a sign must be empty, '+' or '-'"));
	}
}

export function signToInt(sign: Sign): 1 | -1 {
	return sign === Sign.Negative ? -1 : 1;
}

export function signToString(sign: Sign): "" | "-" {
	return sign === Sign.Negative ? "-" : "";
}

export function negateSign(sign: Sign): Sign {
	return sign === Sign.Positive ? Sign.Negative : Sign.Positive;
}
