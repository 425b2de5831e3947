import { bench, describe } from "vitest";
import { Decimal } from "../src/shared/decimal.js";
import { ROUNDING_MODES } from "../src/rounding/types.js";

describe("rescale", () => {
	const short = Decimal.from("2.675");
	const long = Decimal.from(`${"9".repeat(60)}.${"5".repeat(20)}`);
	const cents = Decimal.from("0.01");

	bench("quantize to cents 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			short.quantize(cents);
		}
	});

	bench("every mode, 80-digit carry 100x", () => {
		for (let i = 0; i < 100; i++) {
			for (const mode of ROUNDING_MODES) {
				long.rescale(0, mode);
			}
		}
	});

	bench("widen by 30 places 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			short.rescale(-30);
		}
	});
});
