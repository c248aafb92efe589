// CHANGE: Seeded law sampling over every bundled instance
// INVARIANT: Lawful instances pass every sampled law

import { Effect, Equivalence } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { computeExitCode, lawRunState } from "../../../src/core/decision.js";
import { makeFunctor } from "../../../src/core/functor.js";
import type { ReadonlyArrayTypeLambda } from "../../../src/core/hkt.js";
import { depth } from "../../../src/core/instances/tree.js";
import { compositionLaw, identityLaw } from "../../../src/core/laws.js";
import type { LawSettings } from "../../../src/core/types/index.js";
import { smallInt, treeArbitrary } from "../../../src/shell/laws/arbitraries.js";
import {
	checkInstanceLaws,
	checkLawsEffect,
	type LawSubject,
	runSubject,
} from "../../../src/shell/laws/runner.js";

const settings: LawSettings = { numRuns: 25, maxDepth: 4, seed: 42 };

describe("treeArbitrary", () => {
	it("never exceeds the requested depth", () => {
		fc.assert(
			fc.property(treeArbitrary(smallInt, 3), (tree) => depth(tree) <= 3),
			{ seed: 1, numRuns: 200 },
		);
	});
});

describe("checkInstanceLaws", () => {
	it("checks identity, composition and structure for tree", () => {
		const outcomes = checkInstanceLaws("tree", settings);
		expect(outcomes).toEqual([
			{ instance: "tree", law: "identity", passed: true, numRuns: 25, seed: 42 },
			{ instance: "tree", law: "composition", passed: true, numRuns: 25, seed: 42 },
			{ instance: "tree", law: "structure", passed: true, numRuns: 25, seed: 42 },
		]);
	});

	it.each(["array", "option", "either", "function"] as const)(
		"checks identity and composition for %s",
		(instance) => {
			const outcomes = checkInstanceLaws(instance, settings);
			expect(outcomes.map((outcome) => outcome.law)).toEqual([
				"identity",
				"composition",
			]);
			expect(outcomes.every((outcome) => outcome.passed)).toBe(true);
		},
	);
});

describe("checkLawsEffect", () => {
	it("runs every instance in declaration order for 'all'", async () => {
		const outcomes = await Effect.runPromise(
			checkLawsEffect("all", { numRuns: 5, maxDepth: 3, seed: 7 }),
		);
		expect(outcomes.map((outcome) => outcome.instance)).toEqual([
			"tree",
			"tree",
			"tree",
			"array",
			"array",
			"option",
			"option",
			"either",
			"either",
			"function",
			"function",
		]);
		expect(outcomes.every((outcome) => outcome.passed)).toBe(true);
	});

	it("runs a single selected instance", async () => {
		const outcomes = await Effect.runPromise(
			checkLawsEffect("either", { numRuns: 5, maxDepth: 3 }),
		);
		expect(outcomes).toHaveLength(2);
		expect(outcomes.map((outcome) => outcome.numRuns)).toEqual([5, 5]);
	});
});

// Maps, then reverses: breaks identity on any array with two distinct elements.
const reversingFunctor = makeFunctor<ReadonlyArrayTypeLambda>(
	<A, B>(self: ReadonlyArray<A>, f: (a: A) => B): ReadonlyArray<B> =>
		self.map((a) => f(a)).reverse(),
);

const arrayEq = Equivalence.array(Equivalence.number);

const reversingSubject: LawSubject<ReadonlyArray<number>> = {
	name: "array",
	arbitrary: () => fc.constant<ReadonlyArray<number>>([1, 2]),
	identity: identityLaw<
		ReadonlyArrayTypeLambda,
		unknown,
		unknown,
		unknown,
		number
	>(reversingFunctor, arrayEq),
	composition: compositionLaw<
		ReadonlyArrayTypeLambda,
		unknown,
		unknown,
		unknown,
		number
	>(reversingFunctor, arrayEq),
};

describe("runSubject", () => {
	it("reports a violated law with its counterexample", () => {
		const [identity] = runSubject(reversingSubject, settings);
		expect(identity).toMatchObject({
			instance: "array",
			law: "identity",
			passed: false,
			seed: 42,
			counterexample: "[[1,2]]",
		});
	});

	it("turns a violated law into exit code 1", () => {
		const outcomes = runSubject(reversingSubject, settings);
		expect(lawRunState(outcomes).lawViolations).toBeGreaterThanOrEqual(1);
		expect(computeExitCode(lawRunState(outcomes))).toBe(1);
	});
});
