/**
 * Rounding-decision policies.
 *
 * Each policy looks at the digits a truncation to `precision` places would
 * discard and reports whether the kept digits must be incremented.
 */

import { Sign } from "../number/sign.js";
import type { FiniteValue } from "../number/types.js";
import { RoundingDecision, RoundingMode, type RoundingPolicy } from "./types.js";

const ALL_ZEROS = /^0*$/;
const EXACT_HALF = /^50*$/;
const EVEN_DIGITS = "02468";
const ZERO_FIVE = "05";

function discarded(precision: number, value: FiniteValue): string {
	return value.coefficient.slice(precision);
}

/** The digit just before the discarded tail, or undefined when nothing is kept. */
function lastKept(precision: number, value: FiniteValue): string | undefined {
	return precision > 0 ? value.coefficient[precision - 1] : undefined;
}

/** Turn an inexact truncation into a round-up. */
function awayFromZero(decision: RoundingDecision): RoundingDecision {
	return decision === RoundingDecision.TruncateInexact ? RoundingDecision.RoundUp : decision;
}

const down: RoundingPolicy = (precision, value) =>
	ALL_ZEROS.test(discarded(precision, value))
		? RoundingDecision.TruncateExact
		: RoundingDecision.TruncateInexact;

const up: RoundingPolicy = (precision, value) => awayFromZero(down(precision, value));

const halfUp: RoundingPolicy = (precision, value) => {
	const first = discarded(precision, value)[0];
	if (first !== undefined && first >= "5") {
		return RoundingDecision.RoundUp;
	}
	return down(precision, value);
};

const halfDown: RoundingPolicy = (precision, value) =>
	EXACT_HALF.test(discarded(precision, value))
		? RoundingDecision.TruncateInexact
		: halfUp(precision, value);

// ties go to the even kept digit; nothing kept counts as even
const halfEven: RoundingPolicy = (precision, value) => {
	const kept = lastKept(precision, value);
	if (
		EXACT_HALF.test(discarded(precision, value)) &&
		(kept === undefined || EVEN_DIGITS.includes(kept))
	) {
		return RoundingDecision.TruncateInexact;
	}
	return halfUp(precision, value);
};

const ceiling: RoundingPolicy = (precision, value) =>
	value.sign === Sign.Negative ? down(precision, value) : up(precision, value);

const floor: RoundingPolicy = (precision, value) =>
	value.sign === Sign.Positive ? down(precision, value) : up(precision, value);

// away from zero only if the truncated result would end in 0 or 5
const zeroFiveUp: RoundingPolicy = (precision, value) => {
	const kept = lastKept(precision, value);
	if (kept !== undefined && !ZERO_FIVE.includes(kept)) {
		return down(precision, value);
	}
	return up(precision, value);
};

/** Policy table, one entry per rounding mode. */
export const Round = {
	down,
	up,
	halfUp,
	halfDown,
	halfEven,
	ceiling,
	floor,
	zeroFiveUp,
} as const;

const BY_MODE: Readonly<Record<RoundingMode, RoundingPolicy>> = {
	[RoundingMode.Down]: down,
	[RoundingMode.Up]: up,
	[RoundingMode.HalfUp]: halfUp,
	[RoundingMode.HalfDown]: halfDown,
	[RoundingMode.HalfEven]: halfEven,
	[RoundingMode.Ceiling]: ceiling,
	[RoundingMode.Floor]: floor,
	[RoundingMode.ZeroFiveUp]: zeroFiveUp,
};

export function policyFor(mode: RoundingMode): RoundingPolicy {
	return BY_MODE[mode];
}
