// CHANGE: Functor instance and structural operations for the binary Tree
// WHY: map must preserve topology exactly while transforming every Leaf value
// FORMAT THEOREM: map(leaf(v), f) = leaf(f(v)) ∧ map(branch(l, r), f) = branch(map(l, f), map(r, f))
// PURITY: CORE
// INVARIANT: Inputs are never mutated; every node returned is a fresh frozen object
// COMPLEXITY: O(n) time / O(d) auxiliary space where n = |nodes|, d = depth

import { Equivalence } from "effect";
import type { NonEmptyReadonlyArray } from "effect/Array";

import { InvariantViolation } from "../errors.js";
import { type Functor as FunctorClass, makeFunctor } from "../functor.js";
import type { TreeTypeLambda } from "../hkt.js";
import type { Branch, Leaf, Tree } from "../types/tree.js";

export type { Branch, Leaf, Tree };

/**
 * Creates a Leaf typed as the whole union.
 *
 * @pure true
 * @complexity O(1)
 */
export const leaf = <A>(value: A): Tree<A> => {
	const node: Leaf<A> = { _tag: "Leaf", value };
	return Object.freeze(node);
};

/**
 * Creates a Branch typed as the whole union.
 *
 * @pure true
 * @complexity O(1)
 */
export const branch = <A>(left: Tree<A>, right: Tree<A>): Tree<A> => {
	const node: Branch<A> = { _tag: "Branch", left, right };
	return Object.freeze(node);
};

export const isLeaf = <A>(self: Tree<A>): self is Leaf<A> =>
	self._tag === "Leaf";

export const isBranch = <A>(self: Tree<A>): self is Branch<A> =>
	self._tag === "Branch";

/**
 * Builds a balanced tree whose leaves are `values` in order.
 *
 * @pure true
 * @invariant leaves(balanced(xs)) = xs ∧ depth(balanced(xs)) = ⌈log2 |xs|⌉ + 1
 * @complexity O(n) nodes, O(log n) recursion depth
 */
export const balanced = <A>(values: NonEmptyReadonlyArray<A>): Tree<A> => {
	const nodes: readonly Tree<A>[] = values.map((value) => leaf(value));
	const build = (from: number, to: number): Tree<A> => {
		if (to - from > 1) {
			const middle = from + Math.ceil((to - from) / 2);
			return branch(build(from, middle), build(middle, to));
		}
		const node = nodes[from];
		if (node === undefined) {
			throw new InvariantViolation({
				where: "Tree.balanced",
				detail: `no value at index ${from}`,
			});
		}
		return node;
	};
	return build(0, nodes.length);
};

type Frame<A> =
	| { readonly kind: "visit"; readonly node: Tree<A> }
	| { readonly kind: "combine" };

interface Box<B> {
	readonly value: B;
}

function popResult<B>(results: Box<B>[]): B {
	const box = results.pop();
	if (box === undefined) {
		throw new InvariantViolation({
			where: "Tree.fold",
			detail: "result stack underflow",
		});
	}
	return box.value;
}

/**
 * Catamorphism over the tree, driven by an explicit work stack.
 *
 * @remarks
 * - @pure true (as long as onLeaf/onBranch are)
 * - @invariant onLeaf is called once per Leaf, left to right
 * - @invariant onBranch receives (left, right) results in that order
 * - @postcondition an exception from onLeaf/onBranch propagates unchanged
 * - @complexity O(n) time, O(d) frames where d = depth
 */
export const fold = <A, B>(
	self: Tree<A>,
	onLeaf: (value: A) => B,
	onBranch: (left: B, right: B) => B,
): B => {
	const frames: Frame<A>[] = [{ kind: "visit", node: self }];
	const results: Box<B>[] = [];

	for (let frame = frames.pop(); frame !== undefined; frame = frames.pop()) {
		if (frame.kind === "combine") {
			const right = popResult(results);
			const left = popResult(results);
			results.push({ value: onBranch(left, right) });
			continue;
		}
		const node = frame.node;
		switch (node._tag) {
			case "Leaf":
				results.push({ value: onLeaf(node.value) });
				break;
			case "Branch":
				// Stack is LIFO: left is visited first, combine runs last.
				frames.push(
					{ kind: "combine" },
					{ kind: "visit", node: node.right },
					{ kind: "visit", node: node.left },
				);
				break;
			default: {
				const unreachable: never = node;
				return unreachable;
			}
		}
	}

	const result = popResult(results);
	if (results.length > 0) {
		throw new InvariantViolation({
			where: "Tree.fold",
			detail: `${results.length} dangling results`,
		});
	}
	return result;
};

/**
 * Applies `f` to every Leaf value and rebuilds the same topology.
 *
 * @pure true
 * @invariant sameShape(map(t, f), t)
 * @complexity O(n)
 */
export const map = <A, B>(self: Tree<A>, f: (a: A) => B): Tree<B> =>
	fold<A, Tree<B>>(self, (value) => leaf(f(value)), branch);

/** Number of leaves. */
export const size = <A>(self: Tree<A>): number =>
	fold(
		self,
		() => 1,
		(left, right) => left + right,
	);

/**
 * Longest root-to-leaf path counted in nodes; a lone Leaf has depth 1.
 */
export const depth = <A>(self: Tree<A>): number =>
	fold(
		self,
		() => 1,
		(left, right) => Math.max(left, right) + 1,
	);

/**
 * Leaf values in left-to-right order.
 *
 * @complexity O(n)
 */
export const leaves = <A>(self: Tree<A>): readonly A[] => {
	const out: A[] = [];
	fold<A, void>(
		self,
		(value) => {
			out.push(value);
		},
		() => undefined,
	);
	return out;
};

/**
 * Pairwise walk of two trees; `onLeaves` decides leaf equality.
 *
 * @complexity O(min(|a|, |b|)) time, explicit stack
 */
function zipWalk<A, B>(
	a: Tree<A>,
	b: Tree<B>,
	onLeaves: (x: A, y: B) => boolean,
): boolean {
	const pending: (readonly [Tree<A>, Tree<B>])[] = [[a, b]];
	for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
		const [x, y] = pair;
		if (x._tag === "Leaf" && y._tag === "Leaf") {
			if (!onLeaves(x.value, y.value)) return false;
		} else if (x._tag === "Branch" && y._tag === "Branch") {
			pending.push([x.right, y.right], [x.left, y.left]);
		} else {
			return false;
		}
	}
	return true;
}

/**
 * Topology equality, ignoring values.
 *
 * @pure true
 */
export const sameShape = <A, B>(a: Tree<A>, b: Tree<B>): boolean =>
	zipWalk(a, b, () => true);

/**
 * Structural equivalence from an element equivalence.
 *
 * @pure true
 * @invariant getEquivalence(E)(t, t) for every t when E is reflexive
 */
export const getEquivalence = <A>(
	item: Equivalence.Equivalence<A>,
): Equivalence.Equivalence<Tree<A>> =>
	Equivalence.make<Tree<A>>((self, that) => zipWalk(self, that, item));

/**
 * Functor instance for Tree.
 *
 * @example
 * ```ts
 * Functor.map(leaf(100), (n) => n * 2); // => leaf(200)
 * ```
 */
export const Functor: FunctorClass<TreeTypeLambda> = makeFunctor<TreeTypeLambda>(
	map,
);
