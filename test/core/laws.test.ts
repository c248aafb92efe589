// CHANGE: Specs for the law predicates, including instances that break them
// FORMAT THEOREM: a lawful instance satisfies every predicate; a child-swapping one fails identity

import { Equivalence } from "effect";
import { describe, expect, it } from "vitest";

import { makeFunctor } from "../../src/core/functor.js";
import type { TreeTypeLambda } from "../../src/core/hkt.js";
import {
	branch,
	fold,
	Functor as TreeFunctor,
	getEquivalence,
	leaf,
	type Tree,
} from "../../src/core/instances/tree.js";
import {
	compositionLaw,
	identityLaw,
	treeStructureLaw,
} from "../../src/core/laws.js";
import { sampleTree } from "../utils/builders.js";

const treeEq = getEquivalence(Equivalence.number);

const swappingFunctor = makeFunctor<TreeTypeLambda>(
	<A, B>(self: Tree<A>, f: (a: A) => B): Tree<B> =>
		fold<A, Tree<B>>(
			self,
			(value) => leaf(f(value)),
			(left, right) => branch(right, left),
		),
);

describe("identityLaw", () => {
	it("holds for the Tree instance", () => {
		const law = identityLaw<TreeTypeLambda, unknown, unknown, unknown, number>(
			TreeFunctor,
			treeEq,
		);
		expect(law(sampleTree())).toBe(true);
		expect(law(leaf(5))).toBe(true);
	});

	it("fails for an instance that swaps children", () => {
		const law = identityLaw<TreeTypeLambda, unknown, unknown, unknown, number>(
			swappingFunctor,
			treeEq,
		);
		expect(law(leaf(5))).toBe(true);
		expect(law(branch(leaf(1), leaf(2)))).toBe(false);
	});
});

describe("compositionLaw", () => {
	const f = (x: number): number => x + 1;
	const g = (x: number): number => x * 3;

	it("holds for the Tree instance", () => {
		const law = compositionLaw<TreeTypeLambda, unknown, unknown, unknown, number>(
			TreeFunctor,
			treeEq,
		);
		expect(law(sampleTree(), f, g)).toBe(true);
	});

	it("fails for an instance that swaps children", () => {
		const law = compositionLaw<TreeTypeLambda, unknown, unknown, unknown, number>(
			swappingFunctor,
			treeEq,
		);
		// Two swaps cancel out on the left side, one swap remains on the right.
		expect(law(branch(leaf(1), leaf(2)), f, g)).toBe(false);
	});
});

describe("treeStructureLaw", () => {
	it("holds whatever the mapper returns", () => {
		expect(treeStructureLaw(sampleTree(), (n) => ({ n }))).toBe(true);
		expect(treeStructureLaw(leaf("a"), () => undefined)).toBe(true);
	});
});
