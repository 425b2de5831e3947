/**
 * Decimal context — precision, rounding and display preferences.
 *
 * The engine reads only `capitals` (formatting) and `rounding` (rescale),
 * from a context passed to it or else from DEFAULT_CONTEXT. `precision`,
 * `eMin`, `eMax` and `clamp` are carried for callers and for a clamping
 * step that does not exist yet.
 */

import { type Logger, createLogger } from "../lib/logger/index.js";
import { type ValidationError, validate, z } from "../lib/validation/index.js";
import { ROUNDING_MODES, RoundingMode } from "../rounding/types.js";
import { ConfigError } from "./errors.js";
import { type Result, map } from "./result.js";

const defaultLogger = createLogger({ level: "warn", bindings: { module: "decimal-context" } });

export interface DecimalContext {
	/** Maximum significant digits a result may carry */
	readonly precision: number;
	/** Policy used by rescale when none is given */
	readonly rounding: RoundingMode;
	/** Print `E` (true) or `e` (false) before an exponent */
	readonly capitals: boolean;
	/** Smallest adjusted exponent of a normal value */
	readonly eMin: number;
	/** Largest adjusted exponent of a normal value */
	readonly eMax: number;
	/** Clamp exponents of large values into `eTop` */
	readonly clamp: boolean;
}

export const DEFAULT_CONTEXT: DecimalContext = Object.freeze({
	precision: 28,
	rounding: RoundingMode.HalfEven,
	capitals: true,
	eMin: -999_999,
	eMax: 999_999,
	clamp: false,
});

const roundingSchema = z.nativeEnum(RoundingMode);

const overridesSchema = z
	.object({
		precision: z.number().int().min(1),
		rounding: roundingSchema,
		capitals: z.boolean(),
		eMin: z.number().int().max(0),
		eMax: z.number().int().min(0),
		clamp: z.boolean(),
	})
	.partial()
	.strict();

/**
 * Build a context from the defaults plus validated overrides.
 * @example createContext({ rounding: "half_up", capitals: false })
 */
export function createContext(overrides: unknown = {}): Result<DecimalContext, ValidationError> {
	return map(
		validate(overridesSchema, overrides, "Invalid decimal context"),
		(valid): DecimalContext =>
			Object.freeze({
				precision: valid.precision ?? DEFAULT_CONTEXT.precision,
				rounding: valid.rounding ?? DEFAULT_CONTEXT.rounding,
				capitals: valid.capitals ?? DEFAULT_CONTEXT.capitals,
				eMin: valid.eMin ?? DEFAULT_CONTEXT.eMin,
				eMax: valid.eMax ?? DEFAULT_CONTEXT.eMax,
				clamp: valid.clamp ?? DEFAULT_CONTEXT.clamp,
			}),
	);
}

/** Lowest exponent a subnormal result may reach. */
export function eTiny(context: DecimalContext): number {
	return context.eMin - context.precision + 1;
}

/** Highest exponent once precision digits are used. */
export function eTop(context: DecimalContext): number {
	return context.eMax - context.precision + 1;
}

// ── Environment ─────────────────────────────────────────────────────

/** Mutable builder shape for constructing Partial<DecimalContext>. */
interface MutableDecimalContext {
	precision?: number;
	rounding?: RoundingMode;
	capitals?: boolean;
	eMin?: number;
	eMax?: number;
	clamp?: boolean;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Reads context overrides from environment variables.
 * Supported: DECIMAL_PRECISION, DECIMAL_ROUNDING, DECIMAL_CAPITALS,
 * DECIMAL_EMIN, DECIMAL_EMAX, DECIMAL_CLAMP.
 * @throws ConfigError if a variable holds a malformed value
 */
export function contextFromEnv(
	env: Env = process.env,
	logger: Logger = defaultLogger,
): Partial<DecimalContext> {
	const result: MutableDecimalContext = {};

	const precision = parseIntEnv(env, "DECIMAL_PRECISION");
	if (precision !== undefined) {
		if (precision <= 0) {
			throw new ConfigError(`Invalid DECIMAL_PRECISION: "${precision}" must be a positive integer`);
		}
		result.precision = precision;
	}

	const rounding = env["DECIMAL_ROUNDING"]?.trim().toLowerCase();
	if (rounding) {
		const mode = ROUNDING_MODES.find((m) => m === rounding);
		if (mode === undefined) {
			throw new ConfigError(
				`Invalid DECIMAL_ROUNDING: "${rounding}" must be one of ${ROUNDING_MODES.join(", ")}`,
			);
		}
		result.rounding = mode;
	}

	const capitals = parseBoolEnv(env, "DECIMAL_CAPITALS");
	if (capitals !== undefined) result.capitals = capitals;

	const clamp = parseBoolEnv(env, "DECIMAL_CLAMP");
	if (clamp !== undefined) result.clamp = clamp;

	const eMin = parseIntEnv(env, "DECIMAL_EMIN");
	if (eMin !== undefined) result.eMin = eMin;

	const eMax = parseIntEnv(env, "DECIMAL_EMAX");
	if (eMax !== undefined) result.eMax = eMax;

	if (eMin !== undefined || eMax !== undefined || clamp !== undefined) {
		logger.warn(
			{ eMin, eMax, clamp },
			"Exponent bounds are recorded on the context but not enforced",
		);
	}

	return result;
}

/**
 * Defaults, then environment overrides, validated together.
 * @throws ConfigError if the environment is malformed or out of range
 */
export function resolveContext(
	env: Env = process.env,
	logger: Logger = defaultLogger,
): DecimalContext {
	const result = createContext(contextFromEnv(env, logger));
	if (!result.ok) {
		throw new ConfigError(result.error.message, {
			cause: result.error,
			fields: result.error.issues.map((i) => i.path.join(".")),
		});
	}
	logger.debug({ context: result.value }, "Decimal context resolved");
	return result.value;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(env: Env, key: string): number | undefined {
	const raw = env[key];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed)) {
		throw new ConfigError(`Invalid ${key}: "${raw}" must be an integer`);
	}
	return parsed;
}

function parseBoolEnv(env: Env, key: string): boolean | undefined {
	const raw = env[key]?.trim().toLowerCase();
	if (!raw) return undefined;
	if (raw === "true" || raw === "1") return true;
	if (raw === "false" || raw === "0") return false;
	throw new ConfigError(`Invalid ${key}: "${raw}" must be true or false`);
}
