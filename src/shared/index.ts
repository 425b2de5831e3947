export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	tryCatch,
} from "./result.js";

export {
	ErrorCategory,
	DecimalError,
	InvalidLiteralError,
	UndefinedComparisonError,
	ConfigError,
	SystemError,
	classifyError,
	isInvalidLiteral,
	isUndefinedComparison,
	isConfigError,
	isSystemError,
} from "./errors.js";

export {
	type DecimalContext,
	DEFAULT_CONTEXT,
	createContext,
	contextFromEnv,
	resolveContext,
	eTiny,
	eTop,
} from "./config.js";

export { Decimal } from "./decimal.js";
