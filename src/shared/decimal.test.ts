import { describe, expect, it } from "vitest";
import { Sign } from "../number/sign.js";
import { RoundingMode } from "../rounding/types.js";
import { createContext } from "./config.js";
import { Decimal } from "./decimal.js";
import { InvalidLiteralError, UndefinedComparisonError } from "./errors.js";
import { unwrap } from "./result.js";

describe("Decimal", () => {
	describe("factory methods", () => {
		it("creates from string", () => {
			expect(Decimal.from("1.5").toString()).toBe("1.5");
			expect(Decimal.from("1_000").toString()).toBe("1000");
			expect(Decimal.from("0.001").toString()).toBe("0.001");
			expect(Decimal.from("1.5e3").toString()).toBe("1.5E+3");
		});

		it("creates from number", () => {
			expect(Decimal.from(1.5).toString()).toBe("1.5");
			expect(Decimal.from(100).toString()).toBe("100");
			expect(Decimal.from(0).toString()).toBe("0");
			expect(Decimal.from(-0.25).toString()).toBe("-0.25");
		});

		it("creates from bigint exactly", () => {
			expect(Decimal.from(12345678901234567890n).toString()).toBe("12345678901234567890");
		});

		it("constants", () => {
			expect(Decimal.zero().toString()).toBe("0");
			expect(Decimal.one().toString()).toBe("1");
			expect(Decimal.nan().toString()).toBe("NaN");
			expect(Decimal.infinity().toString()).toBe("Infinity");
			expect(Decimal.infinity(Sign.Negative).toString()).toBe("-Infinity");
		});

		it("from throws on invalid literals", () => {
			expect(() => Decimal.from("abc")).toThrow(InvalidLiteralError);
			expect(() => Decimal.from("1.2.3")).toThrow('Invalid literal: "1.2.3"');
		});

		it("parse returns a Result instead of throwing", () => {
			const bad = Decimal.parse("12a");
			expect(bad.ok).toBe(false);
			if (!bad.ok) expect(bad.error.literal).toBe("12a");

			const good = Decimal.parse("-0.5");
			expect(good.ok && good.value.toString()).toBe("-0.5");
		});

		it("fromInteger rejects fractional numbers", () => {
			expect(Decimal.fromInteger(2.5).ok).toBe(false);
			const seven = Decimal.fromInteger(7);
			expect(seven.ok && seven.value.toString()).toBe("7");
		});
	});

	describe("inspection", () => {
		it("classifies kinds", () => {
			expect(Decimal.from("1").isFinite()).toBe(true);
			expect(Decimal.from("-inf").isInfinite()).toBe(true);
			expect(Decimal.from("NaN").isNaN()).toBe(true);
			expect(Decimal.from("0.000").isZero()).toBe(true);
		});

		it("toBool is false only for zero", () => {
			expect(Decimal.from("-0").toBool()).toBe(false);
			expect(Decimal.from("0.1").toBool()).toBe(true);
			expect(Decimal.nan().toBool()).toBe(true);
		});

		it("sign, adjusted and toTuple", () => {
			const value = Decimal.from("-123.45");
			expect(value.sign()).toBe(-1);
			expect(value.adjusted()).toBe(2);
			expect(value.toTuple()).toEqual([-1, "12345", -2]);
		});
	});

	describe("sign", () => {
		it("negate and abs return new instances", () => {
			const value = Decimal.from("2.5");
			expect(value.negate().toString()).toBe("-2.5");
			expect(value.negate().abs().toString()).toBe("2.5");
			expect(value.toString()).toBe("2.5");
		});
	});

	describe("comparison", () => {
		const a = Decimal.from("1.10");
		const b = Decimal.from("1.1");
		const c = Decimal.from("2");

		it("compares by value", () => {
			expect(a.compare(c)).toEqual({ ok: true, value: -1 });
			expect(a.eq(b)).toEqual({ ok: true, value: true });
			expect(c.gt(a)).toEqual({ ok: true, value: true });
			expect(a.gte(b)).toEqual({ ok: true, value: true });
			expect(c.lt(a)).toEqual({ ok: true, value: false });
			expect(a.lte(c)).toEqual({ ok: true, value: true });
		});

		it("min and max keep the first operand on ties", () => {
			const low = Decimal.min(a, b);
			expect(low.ok && low.value).toBe(a);
			const high = Decimal.max(b, c);
			expect(high.ok && high.value).toBe(c);
		});

		it("reports NaN comparisons as errors", () => {
			const result = Decimal.nan().lt(c);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error).toBeInstanceOf(UndefinedComparisonError);
			expect(Decimal.max(c, Decimal.nan()).ok).toBe(false);
		});
	});

	describe("rounding", () => {
		it("rescale uses the given mode", () => {
			expect(Decimal.from("1.005").rescale(-2, RoundingMode.HalfUp).toString()).toBe("1.01");
			expect(Decimal.from("1.005").rescale(-2).toString()).toBe("1.00");
		});

		it("quantize rounds to the reference exponent", () => {
			expect(Decimal.from("2.675").quantize(Decimal.from("0.01")).toString()).toBe("2.68");
			expect(Decimal.from("2.675").quantize(Decimal.from("1"), RoundingMode.Floor).toString()).toBe("2");
		});

		it("rescale and quantize accept a context in place of a mode", () => {
			const halfUp = unwrap(createContext({ rounding: RoundingMode.HalfUp }));
			expect(Decimal.from("2.5").rescale(0, halfUp).toString()).toBe("3");
			expect(Decimal.from("2.5").rescale(0).toString()).toBe("2");
			expect(Decimal.from("0.125").quantize(Decimal.from("0.01"), halfUp).toString()).toBe("0.13");
		});
	});

	describe("conversion", () => {
		it("format honours the layout options", () => {
			const value = Decimal.from("123456e2");
			expect(value.format()).toBe("1.23456E+7");
			expect(value.format({ capitals: false })).toBe("1.23456e+7");
			expect(value.toEngString()).toBe("12.3456E+6");
		});

		it("toString and toEngString read capitals from a context", () => {
			const lower = unwrap(createContext({ capitals: false }));
			const value = Decimal.from("1.5e4");
			expect(value.toString(lower)).toBe("1.5e+4");
			expect(value.toEngString(lower)).toBe("15e+3");
			expect(value.toString()).toBe("1.5E+4");
		});

		it("serializes to its canonical string", () => {
			expect(JSON.stringify({ amount: Decimal.from("0.10") })).toBe('{"amount":"0.10"}');
		});
	});
});
