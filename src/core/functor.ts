// CHANGE: Functor type class over effect/HKT type lambdas with derived operations
// WHY: Instances are plain records passed explicitly at the call site (no implicit registry)
// SOURCE: https://effect.website/docs (Covariant in @effect/typeclass)
// FORMAT THEOREM: ∀F, fa: F.map(fa, id) ≡ fa ∧ F.map(F.map(fa, f), g) ≡ F.map(fa, g ∘ f)
// PURITY: CORE
// INVARIANT: Derived operations are defined only through F.map
// COMPLEXITY: Same as the underlying F.map

import type { Kind, TypeLambda } from "./hkt.js";

/**
 * Type class of type constructors that can be mapped over.
 *
 * @remarks
 * - @pure true
 * - @invariant map preserves the shape of `self`; only the held values change
 *
 * @example
 * ```ts
 * import { Tree } from "functor-kit";
 *
 * Tree.Functor.map(Tree.branch(Tree.leaf(10), Tree.leaf(20)), (n) => n * 2);
 * // => branch(leaf(20), leaf(40))
 * ```
 */
export interface Functor<F extends TypeLambda> {
	readonly map: <R, O, E, A, B>(
		self: Kind<F, R, O, E, A>,
		f: (a: A) => B,
	) => Kind<F, R, O, E, B>;
}

/**
 * Builds an instance from its map function.
 *
 * @pure true
 * @complexity O(1)
 */
export const makeFunctor = <F extends TypeLambda>(
	map: Functor<F>["map"],
): Functor<F> => ({ map });

/**
 * Lifts `f` into a function between containers.
 *
 * @pure true
 */
export const lift =
	<F extends TypeLambda>(F: Functor<F>) =>
	<A, B>(f: (a: A) => B) =>
	<R, O, E>(self: Kind<F, R, O, E, A>): Kind<F, R, O, E, B> =>
		F.map<R, O, E, A, B>(self, f);

/**
 * Replaces every held value with `b`.
 */
export const as =
	<F extends TypeLambda>(F: Functor<F>) =>
	<R, O, E, A, B>(self: Kind<F, R, O, E, A>, b: B): Kind<F, R, O, E, B> =>
		F.map<R, O, E, A, B>(self, () => b);

export const asVoid =
	<F extends TypeLambda>(F: Functor<F>) =>
	<R, O, E, A>(self: Kind<F, R, O, E, A>): Kind<F, R, O, E, void> =>
		F.map<R, O, E, A, void>(self, (): void => undefined);

/**
 * Applies every held function to the same argument.
 */
export const flap =
	<F extends TypeLambda>(F: Functor<F>) =>
	<R, O, E, A, B>(
		self: Kind<F, R, O, E, (a: A) => B>,
		a: A,
	): Kind<F, R, O, E, B> =>
		F.map<R, O, E, (a: A) => B, B>(self, (f) => f(a));

export const tupleLeft =
	<F extends TypeLambda>(F: Functor<F>) =>
	<R, O, E, A, B>(
		self: Kind<F, R, O, E, A>,
		b: B,
	): Kind<F, R, O, E, readonly [B, A]> =>
		F.map<R, O, E, A, readonly [B, A]>(self, (a) => [b, a]);

export const tupleRight =
	<F extends TypeLambda>(F: Functor<F>) =>
	<R, O, E, A, B>(
		self: Kind<F, R, O, E, A>,
		b: B,
	): Kind<F, R, O, E, readonly [A, B]> =>
		F.map<R, O, E, A, readonly [A, B]>(self, (a) => [a, b]);

/**
 * Maps through two nested functors: F<G<A>> → F<G<B>>.
 *
 * @pure true
 * @invariant mapComposition(F, G)(fga, f) ≡ F.map(fga, ga => G.map(ga, f))
 * @complexity O(|F| · |G|)
 */
export const mapComposition =
	<F extends TypeLambda, G extends TypeLambda>(F: Functor<F>, G: Functor<G>) =>
	<FR, FO, FE, GR, GO, GE, A, B>(
		self: Kind<F, FR, FO, FE, Kind<G, GR, GO, GE, A>>,
		f: (a: A) => B,
	): Kind<F, FR, FO, FE, Kind<G, GR, GO, GE, B>> =>
		F.map<FR, FO, FE, Kind<G, GR, GO, GE, A>, Kind<G, GR, GO, GE, B>>(
			self,
			(ga) => G.map<GR, GO, GE, A, B>(ga, f),
		);
