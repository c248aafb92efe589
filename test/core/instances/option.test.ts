import { Option } from "effect";
import { describe, expect, it } from "vitest";

import { Functor, map } from "../../../src/core/instances/option.js";

describe("Option functor", () => {
	it("maps the value inside Some", () => {
		const result = map(Option.some(21), (x) => x * 2);
		expect(Option.getOrThrow(result)).toBe(42);
	});

	it("keeps None without calling f", () => {
		let calls = 0;
		const result = Functor.map(Option.none<number>(), (x) => {
			calls += 1;
			return x;
		});
		expect(Option.isNone(result)).toBe(true);
		expect(calls).toBe(0);
	});
});
