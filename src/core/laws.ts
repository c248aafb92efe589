// CHANGE: Executable Functor laws as pure predicates
// WHY: The shell samples them with fast-check; tests reuse them as property bodies
// FORMAT THEOREM: identity: F.map(fa, id) ≡ fa; composition: F.map(F.map(fa, f), g) ≡ F.map(fa, g ∘ f)
// PURITY: CORE
// INVARIANT: Predicates never throw unless the supplied functions do
// COMPLEXITY: O(cost of two F.map calls + one equivalence check)

import type { Equivalence } from "effect";

import type { Functor } from "./functor.js";
import type { Kind, TypeLambda } from "./hkt.js";
import { map, sameShape, type Tree } from "./instances/tree.js";

/**
 * Identity law for a given instance.
 *
 * @pure true
 * @example
 * ```ts
 * const law = identityLaw(Tree.Functor, Tree.getEquivalence(Equivalence.number));
 * law(Tree.leaf(1)); // true
 * ```
 */
export const identityLaw =
	<F extends TypeLambda, R, O, E, A>(
		F: Functor<F>,
		eq: Equivalence.Equivalence<Kind<F, R, O, E, A>>,
	) =>
	(self: Kind<F, R, O, E, A>): boolean =>
		eq(
			F.map<R, O, E, A, A>(self, (a) => a),
			self,
		);

/**
 * Composition law for a given instance, with both mappers kept in A → A.
 *
 * @pure true
 */
export const compositionLaw =
	<F extends TypeLambda, R, O, E, A>(
		F: Functor<F>,
		eq: Equivalence.Equivalence<Kind<F, R, O, E, A>>,
	) =>
	(
		self: Kind<F, R, O, E, A>,
		f: (a: A) => A,
		g: (a: A) => A,
	): boolean =>
		eq(
			F.map<R, O, E, A, A>(F.map<R, O, E, A, A>(self, f), g),
			F.map<R, O, E, A, A>(self, (a) => g(f(a))),
		);

/**
 * Topology is preserved whatever `f` returns.
 *
 * @pure true
 * @invariant treeStructureLaw(t, f) ⇔ sameShape(map(t, f), t)
 */
export const treeStructureLaw = <A, B>(self: Tree<A>, f: (a: A) => B): boolean =>
	sameShape(map(self, f), self);
