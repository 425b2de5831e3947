/**
 * Decimal — immutable object facade over the value engine.
 *
 * Wraps a DecimalValue and forwards to the parser, formatter, comparator
 * and rounding engine. Parsing and ordering return Result; `Decimal.from`
 * throws and is meant for literals known to be valid.
 */

import { type Ordering, compare } from "../number/compare.js";
import { type FormatOptions, format } from "../number/format.js";
import { fromFloat, fromInteger, parse } from "../number/parse.js";
import { Sign } from "../number/sign.js";
import { type DecimalTuple, type DecimalValue, ValueKind } from "../number/types.js";
import {
	NAN,
	ONE,
	ZERO,
	abs,
	adjusted,
	infinity,
	isZero,
	negate,
	signOf,
	toBool,
	toTuple,
} from "../number/value.js";
import { type RoundingSource, quantize, rescale } from "../rounding/rescale.js";
import type { DecimalContext } from "./config.js";
import type { InvalidLiteralError, UndefinedComparisonError } from "./errors.js";
import { type Result, map, unwrap } from "./result.js";

export class Decimal {
	readonly value: DecimalValue;

	private constructor(value: DecimalValue) {
		this.value = value;
	}

	// ── Factories ──────────────────────────────────────────────────

	static of(value: DecimalValue): Decimal {
		return new Decimal(value);
	}

	/**
	 * Parse a literal such as "1_000.25", "-1.5e-3", "Infinity" or "NaN".
	 * @example Decimal.parse("123.456") // ok(Decimal 123.456)
	 */
	static parse(text: string): Result<Decimal, InvalidLiteralError> {
		return map(parse(text), Decimal.of);
	}

	/**
	 * Strings are parsed, bigints taken exactly, numbers via their shortest
	 * round-trip decimal form.
	 * @throws InvalidLiteralError if a string is not a valid literal
	 */
	static from(value: string | number | bigint): Decimal {
		if (typeof value === "number") return Decimal.fromFloat(value);
		if (typeof value === "bigint") return unwrap(Decimal.fromInteger(value));
		return unwrap(Decimal.parse(value));
	}

	static fromInteger(n: number | bigint): Result<Decimal, InvalidLiteralError> {
		return map(fromInteger(n), Decimal.of);
	}

	static fromFloat(x: number): Decimal {
		return new Decimal(fromFloat(x));
	}

	static zero(): Decimal {
		return new Decimal(ZERO);
	}

	static one(): Decimal {
		return new Decimal(ONE);
	}

	static nan(): Decimal {
		return new Decimal(NAN);
	}

	static infinity(sign: Sign = Sign.Positive): Decimal {
		return new Decimal(infinity(sign));
	}

	// ── Min / Max ──────────────────────────────────────────────────

	static min(a: Decimal, b: Decimal): Result<Decimal, UndefinedComparisonError> {
		return map(a.compare(b), (o) => (o <= 0 ? a : b));
	}

	static max(a: Decimal, b: Decimal): Result<Decimal, UndefinedComparisonError> {
		return map(a.compare(b), (o) => (o >= 0 ? a : b));
	}

	// ── Inspection ─────────────────────────────────────────────────

	isFinite(): boolean {
		return this.value.kind === ValueKind.Finite;
	}

	isInfinite(): boolean {
		return this.value.kind === ValueKind.Infinity;
	}

	isNaN(): boolean {
		return this.value.kind === ValueKind.NaN;
	}

	isZero(): boolean {
		return isZero(this.value);
	}

	/** False only for zero. */
	toBool(): boolean {
		return toBool(this.value);
	}

	/** `-1` or `1`; NaN reports `1`. */
	sign(): 1 | -1 {
		return signOf(this.value);
	}

	adjusted(): number {
		return adjusted(this.value);
	}

	toTuple(): DecimalTuple {
		return toTuple(this.value);
	}

	// ── Sign (immutable) ───────────────────────────────────────────

	negate(): Decimal {
		return new Decimal(negate(this.value));
	}

	abs(): Decimal {
		return new Decimal(abs(this.value));
	}

	// ── Comparison ─────────────────────────────────────────────────

	compare(other: Decimal): Result<Ordering, UndefinedComparisonError> {
		return compare(this.value, other.value);
	}

	eq(other: Decimal): Result<boolean, UndefinedComparisonError> {
		return map(this.compare(other), (o) => o === 0);
	}

	gt(other: Decimal): Result<boolean, UndefinedComparisonError> {
		return map(this.compare(other), (o) => o > 0);
	}

	gte(other: Decimal): Result<boolean, UndefinedComparisonError> {
		return map(this.compare(other), (o) => o >= 0);
	}

	lt(other: Decimal): Result<boolean, UndefinedComparisonError> {
		return map(this.compare(other), (o) => o < 0);
	}

	lte(other: Decimal): Result<boolean, UndefinedComparisonError> {
		return map(this.compare(other), (o) => o <= 0);
	}

	// ── Rounding (immutable) ───────────────────────────────────────

	/**
	 * `rounding` is a mode or a context; DEFAULT_CONTEXT's mode when omitted.
	 * @example Decimal.from("1.005").rescale(-2, RoundingMode.HalfUp).toString() // "1.01"
	 */
	rescale(exponent: number, rounding?: RoundingSource): Decimal {
		return new Decimal(rescale(this.value, exponent, rounding));
	}

	/**
	 * Round to the exponent of `reference`.
	 * @example Decimal.from("2.675").quantize(Decimal.from("0.01")).toString() // "2.68"
	 */
	quantize(reference: Decimal, rounding?: RoundingSource): Decimal {
		return new Decimal(quantize(this.value, reference.value, rounding));
	}

	// ── Conversion ─────────────────────────────────────────────────

	format(options?: FormatOptions): string {
		return format(this.value, options);
	}

	/** Scientific layout; `context` supplies `capitals`. */
	toString(context?: DecimalContext): string {
		return format(this.value, { context });
	}

	toEngString(context?: DecimalContext): string {
		return format(this.value, { context, engineering: true });
	}

	toJSON(): string {
		return this.toString();
	}
}
