import type { FiniteValue } from "../number/types.js";

/** The eight rounding policies, by the name a context selects them with. */
export const RoundingMode = {
	Down: "down",
	Up: "up",
	HalfUp: "half_up",
	HalfDown: "half_down",
	HalfEven: "half_even",
	Ceiling: "ceiling",
	Floor: "floor",
	ZeroFiveUp: "zero_five_up",
} as const;

export type RoundingMode = (typeof RoundingMode)[keyof typeof RoundingMode];

export const ROUNDING_MODES: readonly RoundingMode[] = Object.values(RoundingMode);

/** What to do with the kept digits once the tail is discarded. */
export const RoundingDecision = {
	/** Add one unit in the last kept place. */
	RoundUp: "round_up",
	/** Discarded digits are all zero; truncation loses nothing. */
	TruncateExact: "truncate_exact",
	/** Discarded digits are nonzero but the kept digits stay as they are. */
	TruncateInexact: "truncate_inexact",
} as const;

export type RoundingDecision = (typeof RoundingDecision)[keyof typeof RoundingDecision];

/**
 * Decides how to round `value` when only its first `precision` coefficient
 * digits are kept. Requires `0 <= precision < value.coefficient.length`.
 */
export type RoundingPolicy = (precision: number, value: FiniteValue) => RoundingDecision;
