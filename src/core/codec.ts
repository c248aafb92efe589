// CHANGE: JSON codec for trees: a scalar is a Leaf, a [left, right] pair is a Branch
// WHY: The CLI receives trees as text; decoding errors must name the offending JSON path
// FORMAT THEOREM: ∀t: decodeNumberTree(treeToJSON(t)) = Right(t) for finite-number trees
// PURITY: CORE
// INVARIANT: Decoding never throws; failures are TreeDecodeError values
// COMPLEXITY: O(n) where n = |JSON nodes|

import { Either } from "effect";
import { match, P } from "ts-pattern";

import { InvariantViolation, TreeDecodeError } from "./errors.js";
import { branch, fold, leaf, type Tree } from "./instances/tree.js";

/**
 * JSON encoding of a tree.
 *
 * @example `[[1, 2], 3]` is branch(branch(leaf(1), leaf(2)), leaf(3))
 */
export type TreeJSON<A> = A | readonly [TreeJSON<A>, TreeJSON<A>];

const NOT_A_TREE = "expected a finite number or a [left, right] pair";

type Decoded = Either.Either<Tree<number>, TreeDecodeError>;

/**
 * Encodes a tree; stack-safe through fold.
 *
 * @pure true
 */
export const treeToJSON = <A>(self: Tree<A>): TreeJSON<A> =>
	fold<A, TreeJSON<A>>(
		self,
		(value) => value,
		(left, right) => [left, right],
	);

/**
 * Encodes a tree of scalars straight to JSON text, matching
 * `JSON.stringify(treeToJSON(self))` without its nesting limit.
 *
 * @pure true
 */
export const treeToJSONText = <A extends number | string>(
	self: Tree<A>,
): string =>
	fold<A, string>(
		self,
		(value) => JSON.stringify(value),
		(left, right) => `[${left},${right}]`,
	);

/** One step from a parent JSON node into its left (0) or right (1) child. */
interface PathStep {
	readonly parent: PathStep | undefined;
	readonly index: 0 | 1;
}

const renderPath = (at: PathStep | undefined): string => {
	const indices: string[] = [];
	for (let step = at; step !== undefined; step = step.parent) {
		indices.push(`[${step.index}]`);
	}
	return `$${indices.reverse().join("")}`;
};

type NodeShape =
	| { readonly kind: "leaf"; readonly value: number }
	| { readonly kind: "pair"; readonly left: unknown; readonly right: unknown }
	| { readonly kind: "invalid"; readonly reason: string };

const classify = (json: unknown): NodeShape =>
	match<unknown, NodeShape>(json)
		.with(P.number, (value) =>
			Number.isFinite(value)
				? { kind: "leaf", value }
				: { kind: "invalid", reason: NOT_A_TREE },
		)
		.with([P._, P._], ([left, right]) => ({ kind: "pair", left, right }))
		.with(P.array(P._), (items) => ({
			kind: "invalid",
			reason: `a branch needs exactly 2 elements, got ${items.length}`,
		}))
		.otherwise(() => ({ kind: "invalid", reason: NOT_A_TREE }));

type DecodeFrame =
	| {
			readonly kind: "visit";
			readonly json: unknown;
			readonly at: PathStep | undefined;
	  }
	| { readonly kind: "combine" };

function popBuilt(built: Tree<number>[]): Tree<number> {
	const tree = built.pop();
	if (tree === undefined) {
		throw new InvariantViolation({
			where: "decodeNumberTree",
			detail: "result stack underflow",
		});
	}
	return tree;
}

/**
 * Decodes an already-parsed JSON value into a tree of numbers.
 *
 * Nodes are visited in pre-order from an explicit work stack; paths are
 * parent links rendered only when a node is rejected.
 *
 * @pure true
 * @invariant Left(e) ⇒ e.path locates the first invalid node in left-to-right order
 */
export const decodeNumberTree = (json: unknown): Decoded => {
	const frames: DecodeFrame[] = [{ kind: "visit", json, at: undefined }];
	const built: Tree<number>[] = [];

	for (let frame = frames.pop(); frame !== undefined; frame = frames.pop()) {
		if (frame.kind === "combine") {
			const right = popBuilt(built);
			const left = popBuilt(built);
			built.push(branch(left, right));
			continue;
		}
		const { at } = frame;
		const shape = classify(frame.json);
		switch (shape.kind) {
			case "leaf":
				built.push(leaf(shape.value));
				break;
			case "pair":
				frames.push(
					{ kind: "combine" },
					{ kind: "visit", json: shape.right, at: { parent: at, index: 1 } },
					{ kind: "visit", json: shape.left, at: { parent: at, index: 0 } },
				);
				break;
			case "invalid":
				return Either.left(
					new TreeDecodeError({ path: renderPath(at), reason: shape.reason }),
				);
		}
	}

	return Either.right(popBuilt(built));
};

/**
 * Parses and decodes tree text such as `[[1, 2], 3]`.
 *
 * @pure true
 */
export const parseNumberTree = (text: string): Decoded =>
	Either.try({
		try: (): unknown => JSON.parse(text),
		catch: (error) =>
			new TreeDecodeError({
				path: "$",
				reason: `malformed JSON (${error instanceof Error ? error.message : String(error)})`,
			}),
	}).pipe(Either.flatMap(decodeNumberTree));
