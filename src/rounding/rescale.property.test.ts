import DecimalLight from "decimal.js-light";
import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { compare } from "../number/compare.js";
import { parse } from "../number/parse.js";
import type { DecimalValue } from "../number/types.js";
import { ValueKind } from "../number/types.js";
import { quantize, rescale } from "./rescale.js";
import { RoundingMode } from "./types.js";

DecimalLight.set({ precision: 40 });

// zero_five_up has no counterpart in the oracle
const ORACLE_MODES: ReadonlyArray<[RoundingMode, number]> = [
	[RoundingMode.Up, DecimalLight.ROUND_UP],
	[RoundingMode.Down, DecimalLight.ROUND_DOWN],
	[RoundingMode.Ceiling, DecimalLight.ROUND_CEIL],
	[RoundingMode.Floor, DecimalLight.ROUND_FLOOR],
	[RoundingMode.HalfUp, DecimalLight.ROUND_HALF_UP],
	[RoundingMode.HalfDown, DecimalLight.ROUND_HALF_DOWN],
	[RoundingMode.HalfEven, DecimalLight.ROUND_HALF_EVEN],
];

/** A literal such as "-1234e-7" with no redundant leading zeros. */
const arbLiteral = fc
	.tuple(fc.boolean(), fc.bigInt({ min: 0n, max: 999_999_999_999n }), fc.integer({ min: -24, max: -1 }))
	.map(([negative, digits, exponent]) => `${negative ? "-" : ""}${digits}e${exponent}`);

function d(text: string): DecimalValue {
	const result = parse(text);
	if (!result.ok) throw result.error;
	return result.value;
}

describe("rescale (property-based)", () => {
	it.each(ORACLE_MODES)("agrees with decimal.js-light under %s", (mode, oracleMode) => {
		fc.assert(
			fc.property(arbLiteral, fc.integer({ min: 0, max: 10 }), (literal, places) => {
				const ours = rescale(d(literal), -places, mode);
				const expected = new DecimalLight(literal).toDecimalPlaces(places, oracleMode);

				expect(ours.kind).toBe(ValueKind.Finite);
				if (ours.kind === ValueKind.Finite) {
					expect(ours.exponent).toBe(-places);
				}
				expect(compare(ours, d(expected.toString()))).toEqual({ ok: true, value: 0 });
			}),
			{ numRuns: 300 },
		);
	});

	it("widening then truncating back is the identity", () => {
		fc.assert(
			fc.property(arbLiteral, fc.integer({ min: 1, max: 8 }), (literal, extra) => {
				const value = d(literal);
				if (value.kind !== ValueKind.Finite) return;
				const widened = rescale(value, value.exponent - extra);
				expect(rescale(widened, value.exponent, RoundingMode.Down)).toEqual(value);
			}),
		);
	});

	it("is idempotent at a fixed exponent", () => {
		fc.assert(
			fc.property(arbLiteral, fc.integer({ min: 0, max: 10 }), (literal, places) => {
				const once = rescale(d(literal), -places, RoundingMode.HalfEven);
				expect(rescale(once, -places, RoundingMode.Up)).toEqual(once);
			}),
		);
	});

	it("quantize matches rescale to the reference exponent", () => {
		fc.assert(
			fc.property(arbLiteral, arbLiteral, (literal, reference) => {
				const ref = d(reference);
				if (ref.kind !== ValueKind.Finite) return;
				expect(quantize(d(literal), ref)).toEqual(rescale(d(literal), ref.exponent));
			}),
		);
	});
});
