// CHANGE: Binary tree data model (Leaf / Branch) as a tagged union
// WHY: The Tree functor instance, codec and formatter share one immutable shape
// PURITY: CORE
// INVARIANT: Trees are finite and acyclic; each Branch owns both children exclusively

/**
 * Terminal node holding exactly one value.
 */
export interface Leaf<A> {
	readonly _tag: "Leaf";
	readonly value: A;
}

/**
 * Recursive node holding two sub-trees of the same element type.
 */
export interface Branch<A> {
	readonly _tag: "Branch";
	readonly left: Tree<A>;
	readonly right: Tree<A>;
}

/**
 * Binary tree with values at the leaves.
 *
 * @remarks
 * - @pure true
 * - @invariant `_tag` ∈ {"Leaf", "Branch"}
 */
export type Tree<A> = Leaf<A> | Branch<A>;
