import { describe, expect, it } from "vitest";
import { Sign } from "../number/sign.js";
import { finite } from "../number/value.js";
import { Round, policyFor } from "./policies.js";
import { ROUNDING_MODES, RoundingDecision, RoundingMode } from "./types.js";

const { RoundUp, TruncateExact, TruncateInexact } = RoundingDecision;

const pos = (coefficient: string) => finite(Sign.Positive, coefficient, 0);
const neg = (coefficient: string) => finite(Sign.Negative, coefficient, 0);

describe("rounding policies", () => {
	describe("down", () => {
		it("never rounds up", () => {
			expect(Round.down(2, pos("1234"))).toBe(TruncateInexact);
			expect(Round.down(2, neg("1299"))).toBe(TruncateInexact);
		});

		it("reports an exact truncation when only zeros are dropped", () => {
			expect(Round.down(2, pos("1200"))).toBe(TruncateExact);
		});
	});

	describe("up", () => {
		it("rounds away from zero whenever something nonzero is dropped", () => {
			expect(Round.up(2, pos("1201"))).toBe(RoundUp);
			expect(Round.up(2, neg("1234"))).toBe(RoundUp);
			expect(Round.up(2, pos("1200"))).toBe(TruncateExact);
		});
	});

	describe("halfUp", () => {
		it("rounds up from the first discarded 5", () => {
			expect(Round.halfUp(2, pos("1250"))).toBe(RoundUp);
			expect(Round.halfUp(2, pos("1249"))).toBe(TruncateInexact);
			expect(Round.halfUp(1, neg("19"))).toBe(RoundUp);
		});
	});

	describe("halfDown", () => {
		it("truncates an exact half", () => {
			expect(Round.halfDown(2, pos("1250"))).toBe(TruncateInexact);
		});

		it("rounds up past the half", () => {
			expect(Round.halfDown(2, pos("1251"))).toBe(RoundUp);
			expect(Round.halfDown(2, pos("1260"))).toBe(RoundUp);
		});
	});

	describe("halfEven", () => {
		it("sends ties to the even kept digit", () => {
			expect(Round.halfEven(2, pos("1250"))).toBe(TruncateInexact);
			expect(Round.halfEven(2, pos("1350"))).toBe(RoundUp);
		});

		it("treats an empty kept part as even", () => {
			expect(Round.halfEven(0, pos("5"))).toBe(TruncateInexact);
			expect(Round.halfEven(0, pos("6"))).toBe(RoundUp);
		});

		it("behaves like halfUp off the tie", () => {
			expect(Round.halfEven(2, pos("1251"))).toBe(RoundUp);
			expect(Round.halfEven(2, pos("1249"))).toBe(TruncateInexact);
		});
	});

	describe("ceiling and floor", () => {
		it("ceiling rounds positives up and truncates negatives", () => {
			expect(Round.ceiling(2, pos("1234"))).toBe(RoundUp);
			expect(Round.ceiling(2, neg("1234"))).toBe(TruncateInexact);
		});

		it("floor truncates positives and rounds negatives away from zero", () => {
			expect(Round.floor(2, pos("1234"))).toBe(TruncateInexact);
			expect(Round.floor(2, neg("1234"))).toBe(RoundUp);
		});

		it("both report exact truncations", () => {
			expect(Round.ceiling(2, pos("1200"))).toBe(TruncateExact);
			expect(Round.floor(2, neg("1200"))).toBe(TruncateExact);
		});
	});

	describe("zeroFiveUp", () => {
		it("truncates when the last kept digit is not 0 or 5", () => {
			expect(Round.zeroFiveUp(2, pos("1234"))).toBe(TruncateInexact);
		});

		it("rounds up when the last kept digit is 0 or 5", () => {
			expect(Round.zeroFiveUp(2, pos("1034"))).toBe(RoundUp);
			expect(Round.zeroFiveUp(2, pos("1534"))).toBe(RoundUp);
		});

		it("rounds up when nothing is kept", () => {
			expect(Round.zeroFiveUp(0, pos("7"))).toBe(RoundUp);
		});

		it("stays exact when only zeros are dropped", () => {
			expect(Round.zeroFiveUp(2, pos("1000"))).toBe(TruncateExact);
		});
	});
});

describe("policyFor", () => {
	it("maps every mode to its policy", () => {
		expect(policyFor(RoundingMode.Down)).toBe(Round.down);
		expect(policyFor(RoundingMode.Up)).toBe(Round.up);
		expect(policyFor(RoundingMode.HalfUp)).toBe(Round.halfUp);
		expect(policyFor(RoundingMode.HalfDown)).toBe(Round.halfDown);
		expect(policyFor(RoundingMode.HalfEven)).toBe(Round.halfEven);
		expect(policyFor(RoundingMode.Ceiling)).toBe(Round.ceiling);
		expect(policyFor(RoundingMode.Floor)).toBe(Round.floor);
		expect(policyFor(RoundingMode.ZeroFiveUp)).toBe(Round.zeroFiveUp);
	});

	it("ROUNDING_MODES lists the eight mode names", () => {
		expect(ROUNDING_MODES).toEqual([
			"down",
			"up",
			"half_up",
			"half_down",
			"half_even",
			"ceiling",
			"floor",
			"zero_five_up",
		]);
	});
});
