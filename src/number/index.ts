export { Sign, signFromString, signToInt, signToString, negateSign } from "./sign.js";
export {
	ValueKind,
	type FiniteValue,
	type InfinityValue,
	type NaNValue,
	type DecimalValue,
	type DecimalTuple,
} from "./types.js";
export {
	LiteralShape,
	type LiteralMatch,
	normalizeLiteral,
	matchLiteral,
} from "./grammar.js";
export {
	ZERO,
	ONE,
	POSITIVE_INFINITY,
	NEGATIVE_INFINITY,
	NAN,
	createFinite,
	isRepresentable,
	MAX_ADJUSTED,
	MIN_ADJUSTED,
	infinity,
	isFinite,
	isInfinite,
	isNaN,
	isZero,
	toBool,
	signOf,
	adjusted,
	toTuple,
	negate,
	abs,
} from "./value.js";
export { parse, fromInteger, fromFloat } from "./parse.js";
export { type FormatOptions, format } from "./format.js";
export { type Ordering, compare, eq, lt, lte, gt, gte, min, max } from "./compare.js";
