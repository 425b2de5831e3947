/**
 * Quantize Demo — one amount under every rounding mode, plus the three layouts.
 *
 * Run: npx tsx examples/quantize-demo.ts
 */

import { Decimal, ROUNDING_MODES, createLogger, resolveContext } from "../src/index.js";

const logger = createLogger({ level: "info", bindings: { example: "quantize-demo" } });
const ctx = resolveContext(process.env, logger);

const cents = Decimal.from("0.01");

console.log("Rounding -2.675 and 2.665 to cents:");
for (const mode of ROUNDING_MODES) {
	const a = Decimal.from("-2.675").quantize(cents, mode);
	const b = Decimal.from("2.665").quantize(cents, mode);
	console.log(`  ${mode.padEnd(13)} ${a.toString().padStart(6)} ${b.toString().padStart(6)}`);
}

console.log(`\nDefault mode from context: ${ctx.rounding}`);
console.log(`  2.665 -> ${Decimal.from("2.665").quantize(cents, ctx).toString(ctx)}`);

console.log("\nLayouts:");
for (const literal of ["123456e2", "0.0000001234", "-0E+5", "1_000.50"]) {
	const value = Decimal.from(literal);
	console.log(
		`  ${literal.padEnd(14)} sci=${value.toString(ctx)} eng=${value.toEngString(ctx)}`,
	);
}

const ordered = Decimal.max(Decimal.from("1E2"), Decimal.from("99.999"));
if (ordered.ok) {
	logger.info({ max: ordered.value.toString() }, "Compared by value");
}
