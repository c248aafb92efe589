// CHANGE: Configuration and CLI option types
// WHY: Shell parses argv and config files into these immutable shapes; app consumes them
// PURITY: CORE (types only)

import type { InstanceName } from "./laws.js";

/**
 * Settings for sampling the functor laws.
 *
 * @property numRuns Samples per law (positive integer)
 * @property maxDepth Upper bound on generated tree depth (positive integer)
 * @property seed Fixed fast-check seed for reproducible runs
 */
export interface LawSettings {
	readonly numRuns: number;
	readonly maxDepth: number;
	readonly seed?: number;
}

/**
 * Contents of functor-kit.config.json after validation.
 */
export interface FunctorKitConfig {
	readonly laws: LawSettings;
}

/**
 * Partial law settings given on the command line; each present field wins over the file.
 */
export interface LawOverrides {
	readonly numRuns?: number;
	readonly maxDepth?: number;
	readonly seed?: number;
}

/**
 * Parsed command line.
 *
 * @invariant exactly one command per invocation
 */
export type CLICommand =
	| { readonly kind: "help" }
	| {
			readonly kind: "map";
			readonly tree: string;
			readonly operation: string;
			readonly json: boolean;
			readonly configPath?: string;
	  }
	| {
			readonly kind: "laws";
			readonly instance: InstanceName | "all";
			readonly overrides: LawOverrides;
			readonly configPath?: string;
	  };
