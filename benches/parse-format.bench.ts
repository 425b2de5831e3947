import { bench, describe } from "vitest";
import { compare } from "../src/number/compare.js";
import { format } from "../src/number/format.js";
import { parse } from "../src/number/parse.js";
import type { DecimalValue } from "../src/number/types.js";

const LITERALS = ["0", "123.456", "-1_000_000.25", "1.5e-12", "9999999999999999999999.9", "-Infinity"];

function parsed(text: string): DecimalValue {
	const result = parse(text);
	if (!result.ok) throw result.error;
	return result.value;
}

describe("parse and format", () => {
	const values = LITERALS.map(parsed);

	bench("parse 6 literals 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			for (const text of LITERALS) parse(text);
		}
	});

	bench("format scientific 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			for (const value of values) format(value);
		}
	});

	bench("format engineering 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			for (const value of values) format(value, { engineering: true });
		}
	});

	bench("compare adjacent pairs 1000x", () => {
		const finite = values.slice(0, 5);
		for (let i = 0; i < 1000; i++) {
			for (let j = 1; j < finite.length; j++) {
				const a = finite[j - 1];
				const b = finite[j];
				if (a && b) compare(a, b);
			}
		}
	});
});
