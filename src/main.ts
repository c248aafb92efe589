// CHANGE: Make main.ts a thin APP delegator
// WHY: main reads process arguments and delegates orchestration to app/runCli
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runCli } from "./app/runCli.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 * @invariant ExitCode ∈ {0,1}
 */
export async function main(
	argv: readonly string[] = process.argv.slice(2),
	cwd: string = process.cwd(),
): Promise<ExitCode> {
	return Effect.runPromise(runCli(argv, cwd));
}
