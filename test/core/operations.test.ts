import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	DEFAULT_OPERATION,
	OPERATIONS,
	resolveOperation,
} from "../../src/core/operations.js";

const apply = (name: string, value: number): number | string =>
	Either.match(resolveOperation(name), {
		onLeft: (error) => `missing ${error.name}`,
		onRight: (op) => op.apply(value),
	});

describe("resolveOperation", () => {
	it("resolves every registered operation", () => {
		expect(apply("double", 21)).toBe(42);
		expect(apply("increment", 41)).toBe(42);
		expect(apply("negate", 42)).toBe(-42);
		expect(apply("square", 7)).toBe(49);
		expect(apply("show", 42)).toBe("42");
	});

	it("ignores case and surrounding blanks", () => {
		expect(apply("  Double ", 2)).toBe(4);
	});

	it("returns UnknownOperation with the known names", () => {
		const result = resolveOperation("cube");
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("UnknownOperation");
			expect(result.left.name).toBe("cube");
			expect(result.left.known).toEqual([
				"double",
				"increment",
				"negate",
				"square",
				"show",
			]);
		}
	});

	it("has a registered default", () => {
		expect(OPERATIONS.some((op) => op.name === DEFAULT_OPERATION)).toBe(true);
	});
});
