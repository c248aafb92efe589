// CHANGE: Render trees as ASCII with box-drawing connectors
// WHY: The CLI prints mapped trees; rendering stays pure so it can be asserted line by line
// FORMAT THEOREM: ∀t: |formatTree(t)| = |nodes(t)|
// PURITY: CORE
// INVARIANT: Connectors maintain tree structure (├── / └── / │); left child listed first
// COMPLEXITY: O(n · d) characters where d = depth

import type { Tree } from "./types/tree.js";

/** Label used for Branch nodes. */
export const BRANCH_LABEL = "*";

interface PendingLine<A> {
	readonly node: Tree<A>;
	readonly prefix: string;
	readonly connector: string;
}

/**
 * Formats a tree, one line per node.
 *
 * @pure true
 * @example
 * ```ts
 * formatTree(branch(leaf(1), leaf(2)), String);
 * // ["*", "├── 1", "└── 2"]
 * ```
 */
export function formatTree<A>(
	self: Tree<A>,
	show: (value: A) => string,
): readonly string[] {
	const lines: string[] = [];
	const pending: PendingLine<A>[] = [{ node: self, prefix: "", connector: "" }];

	for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
		const { node, prefix, connector } = item;
		if (node._tag === "Leaf") {
			lines.push(`${prefix}${connector}${show(node.value)}`);
			continue;
		}
		lines.push(`${prefix}${connector}${BRANCH_LABEL}`);
		const childPrefix =
			connector === "" ? prefix : `${prefix}${connector === "└── " ? "    " : "│   "}`;
		pending.push(
			{ node: node.right, prefix: childPrefix, connector: "└── " },
			{ node: node.left, prefix: childPrefix, connector: "├── " },
		);
	}

	return lines;
}
