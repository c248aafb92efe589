// CHANGE: Application layer orchestration (APP) separated from SHELL and CORE
// WHY: APP composes pure CORE logic with SHELL integrations and returns an exit code value
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode>
// INVARIANT: Every AppError is printed once and mapped to exit code 1
// COMPLEXITY: O(n) for map (n = tree nodes); O(numRuns · instances) for laws

import { Effect, Either } from "effect";

import { mergeLawSettings } from "../core/config.js";
import { parseNumberTree } from "../core/codec.js";
import { computeExitCode, lawRunState } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import { map } from "../core/instances/tree.js";
import type { ExitCode } from "../core/models.js";
import { resolveOperation } from "../core/operations.js";
import type { CLICommand } from "../core/types/index.js";
import { loadConfig, parseCLIArgs } from "../shell/config/index.js";
import { checkLawsEffect } from "../shell/laws/runner.js";
import {
	printError,
	printLawReport,
	printMappedTree,
	printUsage,
} from "../shell/output/index.js";

const OK: ExitCode = computeExitCode({ failed: false, lawViolations: 0 });

type MapCommand = Extract<CLICommand, { readonly kind: "map" }>;
type LawsCommand = Extract<CLICommand, { readonly kind: "laws" }>;

/**
 * Decode the tree, resolve the operation, print the mapped tree.
 *
 * @effect Effect<ExitCode, AppError>
 */
function runMap(
	command: MapCommand,
	cwd: string,
): Effect.Effect<ExitCode, AppError> {
	return Effect.gen(function* () {
		// A broken config file fails every command, map included.
		yield* loadConfig(cwd, command.configPath);
		const operation = yield* resolveOperation(command.operation);
		const tree = yield* parseNumberTree(command.tree);
		yield* printMappedTree(map(tree, operation.apply), command.json);
		return OK;
	});
}

/**
 * Sample the laws with file settings overlaid by CLI flags.
 *
 * @effect Effect<ExitCode, AppError>
 */
function runLaws(
	command: LawsCommand,
	cwd: string,
): Effect.Effect<ExitCode, AppError> {
	return Effect.gen(function* () {
		const config = yield* loadConfig(cwd, command.configPath);
		const settings = mergeLawSettings(config.laws, command.overrides);
		const outcomes = yield* checkLawsEffect(command.instance, settings);
		yield* printLawReport(outcomes);
		return computeExitCode(lawRunState(outcomes));
	});
}

function runCommand(
	command: CLICommand,
	cwd: string,
): Effect.Effect<ExitCode, AppError> {
	switch (command.kind) {
		case "help":
			return printUsage().pipe(Effect.as(OK));
		case "map":
			return runMap(command, cwd);
		case "laws":
			return runLaws(command, cwd);
	}
}

/**
 * Run one CLI invocation.
 *
 * @param argv Arguments without the node binary and script path
 * @param cwd Directory used to resolve the config file
 * @returns ExitCode (0 = success, 1 = usage/config/input error or a violated law)
 *
 * @pure false (console output, filesystem, random sampling)
 * @invariant never fails; errors become exit code 1
 */
export function runCli(
	argv: readonly string[],
	cwd: string,
): Effect.Effect<ExitCode> {
	return Either.match(parseCLIArgs(argv), {
		onLeft: (error): Effect.Effect<ExitCode, AppError> => Effect.fail(error),
		onRight: (command) => runCommand(command, cwd),
	}).pipe(
		Effect.catchAll((error) =>
			printError(error).pipe(
				Effect.as(computeExitCode({ failed: true, lawViolations: 0 })),
			),
		),
	);
}
