// CHANGE: fast-check arbitraries for every bundled Functor instance
// WHY: Law sampling needs random containers of bounded size
// PURITY: SHELL (random generation is driven by the fast-check runner)
// INVARIANT: depth(tree) ≤ maxDepth for every generated tree

import { Either, Option } from "effect";
import fc from "fast-check";

import { branch, leaf, type Tree } from "../../core/instances/tree.js";

/**
 * Integers kept small so doubled/squared values stay exact.
 */
export const smallInt: fc.Arbitrary<number> = fc.integer({
	min: -10_000,
	max: 10_000,
});

export const intFunction: fc.Arbitrary<(n: number) => number> =
	fc.func(smallInt);

export const treeArbitrary = <A>(
	value: fc.Arbitrary<A>,
	maxDepth: number,
): fc.Arbitrary<Tree<A>> => {
	const tree: fc.Memo<Tree<A>> = fc.memo((remaining) =>
		remaining <= 1
			? value.map((a) => leaf(a))
			: fc.oneof(
					value.map((a) => leaf(a)),
					fc
						.tuple(tree(remaining - 1), tree(remaining - 1))
						.map(([left, right]) => branch(left, right)),
				),
	);
	return tree(maxDepth);
};

export const arrayArbitrary = <A>(
	value: fc.Arbitrary<A>,
): fc.Arbitrary<ReadonlyArray<A>> => fc.array(value, { maxLength: 20 });

export const optionArbitrary = <A>(
	value: fc.Arbitrary<A>,
): fc.Arbitrary<Option.Option<A>> =>
	fc.oneof(
		fc.constant(Option.none<A>()),
		value.map((a): Option.Option<A> => Option.some(a)),
	);

export const eitherArbitrary = <A>(
	value: fc.Arbitrary<A>,
): fc.Arbitrary<Either.Either<A, string>> =>
	fc.oneof(
		value.map((a): Either.Either<A, string> => Either.right(a)),
		fc.string().map((e): Either.Either<A, string> => Either.left(e)),
	);
