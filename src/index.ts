// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	tryCatch,
	Decimal,
	type DecimalContext,
	DEFAULT_CONTEXT,
	createContext,
	contextFromEnv,
	resolveContext,
	eTiny,
	eTop,
	DecimalError,
	ErrorCategory,
	InvalidLiteralError,
	UndefinedComparisonError,
	ConfigError,
	SystemError,
	classifyError,
	isInvalidLiteral,
	isUndefinedComparison,
	isConfigError,
	isSystemError,
} from "./shared/index.js";

// ── Number ───────────────────────────────────────────────────────────
export {
	Sign,
	signFromString,
	signToInt,
	signToString,
	negateSign,
	ValueKind,
	type FiniteValue,
	type InfinityValue,
	type NaNValue,
	type DecimalValue,
	type DecimalTuple,
	LiteralShape,
	type LiteralMatch,
	normalizeLiteral,
	matchLiteral,
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
	parse,
	fromInteger,
	fromFloat,
	type FormatOptions,
	format,
	type Ordering,
	compare,
	eq,
	lt,
	lte,
	gt,
	gte,
	min,
	max,
} from "./number/index.js";

// ── Rounding ─────────────────────────────────────────────────────────
export {
	RoundingMode,
	RoundingDecision,
	ROUNDING_MODES,
	type RoundingPolicy,
	type RoundingSource,
	Round,
	policyFor,
	rescale,
	quantize,
} from "./rounding/index.js";

// ── Lib ──────────────────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger } from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";
