// CHANGE: Console printing for CLI results
// WHY: All terminal output is an Effect so APP composes it with the rest of the run
// PURITY: SHELL (console I/O)
// EFFECT: Effect<void>

import { Effect } from "effect";

import { type AppError, describeAppError } from "../../core/errors.js";
import type { Scalar } from "../../core/operations.js";
import type { LawOutcome, Tree } from "../../core/types/index.js";
import {
	lawOutcomeLine,
	lawSummaryLine,
	mappedTreeLines,
	usageLines,
} from "./printer-helpers.js";

const printLines = (lines: readonly string[]): Effect.Effect<void> =>
	Effect.sync(() => {
		for (const line of lines) {
			console.log(line);
		}
	});

export const printMappedTree = (
	tree: Tree<Scalar>,
	json: boolean,
): Effect.Effect<void> => printLines(mappedTreeLines(tree, json));

/**
 * Prints one line per outcome followed by a summary.
 *
 * @pure false (console output)
 */
export const printLawReport = (
	outcomes: readonly LawOutcome[],
): Effect.Effect<void> =>
	printLines([...outcomes.map(lawOutcomeLine), "", lawSummaryLine(outcomes)]);

export const printUsage = (): Effect.Effect<void> => printLines(usageLines());

export const printError = (error: AppError): Effect.Effect<void> =>
	Effect.sync(() => {
		console.error(`Error: ${describeAppError(error)}`);
	});
