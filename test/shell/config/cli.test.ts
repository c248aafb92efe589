// CHANGE: Unit tests for CLI argument parsing
// WHY: Commands and flags are parsed deterministically; every rejection carries its message

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { CLICommand } from "../../../src/core/types/index.js";
import { parseCLIArgs } from "../../../src/shell/config/index.js";

/**
 * Safely set process.argv for the duration of a test and restore afterwards.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		process.argv = [original[0] ?? "node", original[1] ?? "script.js", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

const parsed = (args: readonly string[]): CLICommand =>
	Either.getOrThrowWith(parseCLIArgs(args), (error) => error);

const usage = (args: readonly string[]): string =>
	Either.match(parseCLIArgs(args), {
		onLeft: (error) => error.detail,
		onRight: (command) => `parsed ${command.kind}`,
	});

describe("parseCLIArgs: help", () => {
	it("shows help without arguments", () => {
		expect(parsed([])).toEqual({ kind: "help" });
	});

	it("reads process.argv by default", () => {
		const command = withArgv(["laws"], () => parseCLIArgs());
		expect(Either.getOrThrow(command)).toEqual({
			kind: "laws",
			instance: "all",
			overrides: {},
		});
	});

	it("lets --help and -h win over any command", () => {
		expect(parsed(["map", "[1, 2]", "--help"])).toEqual({ kind: "help" });
		expect(parsed(["laws", "-h"])).toEqual({ kind: "help" });
	});
});

describe("parseCLIArgs: map", () => {
	it("defaults to the double operation and drawn output", () => {
		expect(parsed(["map", "[[1, 2], 3]"])).toEqual({
			kind: "map",
			tree: "[[1, 2], 3]",
			operation: "double",
			json: false,
		});
	});

	it("accepts --op, --json and --config in any position", () => {
		expect(
			parsed(["--json", "map", "--op", "square", "[1, 2]", "--config", "c.json"]),
		).toEqual({
			kind: "map",
			tree: "[1, 2]",
			operation: "square",
			json: true,
			configPath: "c.json",
		});
	});

	it("treats a negative number as the tree", () => {
		expect(parsed(["map", "-5"])).toEqual({
			kind: "map",
			tree: "-5",
			operation: "double",
			json: false,
		});
	});

	it("requires exactly one tree", () => {
		expect(usage(["map"])).toBe("map needs a tree, e.g. '[[1, 2], 3]'");
		expect(usage(["map", "1", "2"])).toBe('unexpected argument "2"');
	});
});

describe("parseCLIArgs: laws", () => {
	it("selects every instance by default", () => {
		expect(parsed(["laws"])).toEqual({
			kind: "laws",
			instance: "all",
			overrides: {},
		});
	});

	it("collects only the overrides that were given", () => {
		expect(
			parsed([
				"laws",
				"--instance",
				"tree",
				"--runs",
				"50",
				"--seed",
				"-3",
				"--max-depth",
				"4",
			]),
		).toEqual({
			kind: "laws",
			instance: "tree",
			overrides: { numRuns: 50, seed: -3, maxDepth: 4 },
		});
	});

	it("rejects malformed numbers", () => {
		expect(usage(["laws", "--runs", "0"])).toBe(
			'--runs expects a positive integer, got "0"',
		);
		expect(usage(["laws", "--max-depth", "2.5"])).toBe(
			'--max-depth expects a positive integer, got "2.5"',
		);
		expect(usage(["laws", "--seed", "x"])).toBe(
			'--seed expects an integer, got "x"',
		);
	});

	it("rejects an unknown instance", () => {
		expect(usage(["laws", "--instance", "list"])).toBe(
			'unknown instance "list" (known: tree, array, option, either, function, all)',
		);
	});

	it("rejects positional arguments", () => {
		expect(usage(["laws", "tree"])).toBe('unexpected argument "tree"');
	});
});

describe("parseCLIArgs: errors", () => {
	it("reports a flag without its value", () => {
		expect(usage(["laws", "--runs"])).toBe("option --runs needs a value");
	});

	it("reports unknown options and commands", () => {
		expect(usage(["map", "1", "--verbose"])).toBe('unknown option "--verbose"');
		expect(usage(["frobnicate"])).toBe('unknown command "frobnicate"');
	});
});
