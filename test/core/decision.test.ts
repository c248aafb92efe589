import { describe, expect, it } from "vitest";

import { computeExitCode, lawRunState } from "../../src/core/decision.js";
import type { LawOutcome } from "../../src/core/types/index.js";

const outcome = (passed: boolean): LawOutcome => ({
	instance: "tree",
	law: "identity",
	passed,
	numRuns: 10,
	seed: 1,
});

describe("computeExitCode", () => {
	it("is 0 when nothing failed", () => {
		expect(computeExitCode({ failed: false, lawViolations: 0 })).toBe(0);
	});

	it("is 1 on a failed command or any violated law", () => {
		expect(computeExitCode({ failed: true, lawViolations: 0 })).toBe(1);
		expect(computeExitCode({ failed: false, lawViolations: 2 })).toBe(1);
	});
});

describe("lawRunState", () => {
	it("counts failed outcomes", () => {
		expect(lawRunState([outcome(true), outcome(false), outcome(false)])).toEqual({
			failed: false,
			lawViolations: 2,
		});
	});
});
