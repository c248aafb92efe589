#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process.
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { Effect } from "effect";

import { runCli } from "../app/runCli.js";

/**
 * CLI entry point for functor-kit.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(
			runCli(process.argv.slice(2), process.cwd()),
		);
		process.exit(code);
	} catch (error) {
		// Only defects reach here; typed errors are handled inside runCli.
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
