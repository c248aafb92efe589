// CHANGE: Command line parsing for `map`, `laws` and `help`
// WHY: Flags are dispatched through lookup tables instead of nested branching
// PURITY: SHELL (reads process.argv only when no argv is passed)
// INVARIANT: Returns exactly one command or a UsageError; never throws
// COMPLEXITY: O(n) where n = |argv|

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import { DEFAULT_OPERATION } from "../../core/operations.js";
import {
	type CLICommand,
	INSTANCE_NAMES,
	type InstanceName,
	type LawOverrides,
} from "../../core/types/index.js";

/**
 * Accumulated flag values; the command decides which of them it accepts.
 */
interface ArgState {
	readonly positionals: readonly string[];
	readonly operation?: string;
	readonly json: boolean;
	readonly help: boolean;
	readonly configPath?: string;
	readonly instance?: string;
	readonly numRuns?: number;
	readonly maxDepth?: number;
	readonly seed?: number;
}

type ValueFlagHandler = (
	value: string,
	state: ArgState,
) => Either.Either<ArgState, UsageError>;

const INTEGER = /^-?\d+$/u;

function parseInteger(
	flag: string,
	value: string,
	positive: boolean,
): Either.Either<number, UsageError> {
	const parsed = INTEGER.test(value) ? Number.parseInt(value, 10) : Number.NaN;
	if (!Number.isSafeInteger(parsed) || (positive && parsed <= 0)) {
		return Either.left(
			new UsageError({
				detail: `${flag} expects ${positive ? "a positive integer" : "an integer"}, got "${value}"`,
			}),
		);
	}
	return Either.right(parsed);
}

const valueFlags: ReadonlyMap<string, ValueFlagHandler> = new Map<
	string,
	ValueFlagHandler
>([
	["--op", (value, state) => Either.right({ ...state, operation: value })],
	["--config", (value, state) => Either.right({ ...state, configPath: value })],
	["--instance", (value, state) => Either.right({ ...state, instance: value })],
	[
		"--runs",
		(value, state) =>
			Either.map(parseInteger("--runs", value, true), (numRuns) => ({
				...state,
				numRuns,
			})),
	],
	[
		"--max-depth",
		(value, state) =>
			Either.map(parseInteger("--max-depth", value, true), (maxDepth) => ({
				...state,
				maxDepth,
			})),
	],
	[
		"--seed",
		(value, state) =>
			Either.map(parseInteger("--seed", value, false), (seed) => ({
				...state,
				seed,
			})),
	],
]);

const booleanFlags: ReadonlyMap<string, (state: ArgState) => ArgState> =
	new Map<string, (state: ArgState) => ArgState>([
		["--json", (state) => ({ ...state, json: true })],
		["--help", (state) => ({ ...state, help: true })],
		["-h", (state) => ({ ...state, help: true })],
	]);

function collectArgs(
	args: readonly string[],
): Either.Either<ArgState, UsageError> {
	let state: ArgState = { positionals: [], json: false, help: false };

	for (let i = 0; i < args.length; i++) {
		const arg = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const booleanFlag = booleanFlags.get(arg);
		if (booleanFlag !== undefined) {
			state = booleanFlag(state);
			continue;
		}

		const valueFlag = valueFlags.get(arg);
		if (valueFlag !== undefined) {
			const value = args.at(i + 1);
			if (value === undefined) {
				return Either.left(
					new UsageError({ detail: `option ${arg} needs a value` }),
				);
			}
			const next = valueFlag(value, state);
			if (Either.isLeft(next)) return next;
			state = next.right;
			i++;
			continue;
		}

		if (arg.startsWith("--")) {
			return Either.left(new UsageError({ detail: `unknown option "${arg}"` }));
		}
		state = { ...state, positionals: [...state.positionals, arg] };
	}

	return Either.right(state);
}

const isInstanceSelection = (
	value: string,
): value is InstanceName | "all" =>
	value === "all" || INSTANCE_NAMES.some((name) => name === value);

function rejectExtra(
	positionals: readonly string[],
	allowed: number,
): UsageError | undefined {
	const extra = positionals.at(allowed);
	return extra === undefined
		? undefined
		: new UsageError({ detail: `unexpected argument "${extra}"` });
}

function toMapCommand(state: ArgState): Either.Either<CLICommand, UsageError> {
	const tree = state.positionals.at(1);
	if (tree === undefined) {
		return Either.left(
			new UsageError({ detail: "map needs a tree, e.g. '[[1, 2], 3]'" }),
		);
	}
	const extra = rejectExtra(state.positionals, 2);
	if (extra !== undefined) return Either.left(extra);
	const command: Extract<CLICommand, { readonly kind: "map" }> = {
		kind: "map",
		tree,
		operation: state.operation ?? DEFAULT_OPERATION,
		json: state.json,
	};
	return Either.right<CLICommand>(
		state.configPath === undefined
			? command
			: { ...command, configPath: state.configPath },
	);
}

function toLawsCommand(state: ArgState): Either.Either<CLICommand, UsageError> {
	const extra = rejectExtra(state.positionals, 1);
	if (extra !== undefined) return Either.left(extra);
	const instance = state.instance ?? "all";
	if (!isInstanceSelection(instance)) {
		return Either.left(
			new UsageError({
				detail: `unknown instance "${instance}" (known: ${[...INSTANCE_NAMES, "all"].join(", ")})`,
			}),
		);
	}
	const overrides: LawOverrides = {
		...(state.numRuns === undefined ? {} : { numRuns: state.numRuns }),
		...(state.maxDepth === undefined ? {} : { maxDepth: state.maxDepth }),
		...(state.seed === undefined ? {} : { seed: state.seed }),
	};
	return Either.right<CLICommand>(
		state.configPath === undefined
			? { kind: "laws", instance, overrides }
			: { kind: "laws", instance, overrides, configPath: state.configPath },
	);
}

type CommandBuilder = (
	state: ArgState,
) => Either.Either<CLICommand, UsageError>;

const commands: ReadonlyMap<string, CommandBuilder> = new Map<
	string,
	CommandBuilder
>([
	["map", toMapCommand],
	["laws", toLawsCommand],
	["help", () => Either.right<CLICommand>({ kind: "help" })],
]);

/**
 * Parses command line arguments.
 *
 * @param args Arguments without the node binary and script path
 * @returns The command to run, or a UsageError
 *
 * @example
 * ```ts
 * parseCLIArgs(["map", "[[1, 2], 3]", "--op", "square"]);
 * // Right({ kind: "map", tree: "[[1, 2], 3]", operation: "square", json: false })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLICommand, UsageError> {
	return Either.flatMap(
		collectArgs(args),
		(state): Either.Either<CLICommand, UsageError> => {
			const name = state.positionals.at(0);
			if (state.help || name === undefined) {
				return Either.right<CLICommand>({ kind: "help" });
			}
			const build = commands.get(name);
			return build === undefined
				? Either.left(new UsageError({ detail: `unknown command "${name}"` }))
				: build(state);
		},
	);
}
