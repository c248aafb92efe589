// CHANGE: Pure line builders for everything the CLI prints
// WHY: Printer effects stay one-liners; text is asserted directly in tests
// PURITY: CORE-like (no I/O), kept beside the printer that consumes it

import { treeToJSONText } from "../../core/codec.js";
import { formatTree } from "../../core/format.js";
import { OPERATIONS, type Scalar } from "../../core/operations.js";
import type { LawOutcome, Tree } from "../../core/types/index.js";

/** Numbers print bare; strings print JSON-quoted to stay distinguishable. */
export const showScalar = (value: Scalar): string =>
	typeof value === "string" ? JSON.stringify(value) : String(value);

/**
 * Lines for a mapped tree: ASCII drawing, or one JSON line.
 */
export function mappedTreeLines(
	tree: Tree<Scalar>,
	json: boolean,
): readonly string[] {
	return json ? [treeToJSONText(tree)] : formatTree(tree, showScalar);
}

export function lawOutcomeLine(outcome: LawOutcome): string {
	const mark = outcome.passed ? "✅" : "❌";
	const head = `${mark} ${outcome.instance}/${outcome.law} (${outcome.numRuns} runs, seed ${outcome.seed})`;
	return outcome.counterexample === undefined
		? head
		: `${head}: counterexample ${outcome.counterexample}`;
}

export function lawSummaryLine(outcomes: readonly LawOutcome[]): string {
	const passed = outcomes.filter((outcome) => outcome.passed).length;
	return `${passed}/${outcomes.length} laws hold`;
}

export const usageLines = (): readonly string[] => [
	"Usage: functor-kit <command> [options]",
	"",
	"Commands:",
	"  map <tree-json>   Map an operation over a tree such as '[[1, 2], 3]'",
	"      --op <name>   Operation to apply (default: double)",
	"      --json        Print the result as JSON instead of a drawing",
	"  laws              Sample the Functor laws for the bundled instances",
	"      --instance <tree|array|option|either|function|all>",
	"      --runs <n>    Samples per law",
	"      --seed <n>    Fixed random seed",
	"      --max-depth <n>  Upper bound on generated tree depth",
	"  help              Show this text",
	"",
	"Options:",
	"  --config <path>   Config file (default: ./functor-kit.config.json)",
	"",
	"Operations:",
	...OPERATIONS.map((op) => `  ${op.name.padEnd(10)} ${op.description}`),
];
