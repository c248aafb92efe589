// CHANGE: Typed domain error ADT for the functional core using Effect.Data
// WHY: Decoding, configuration and usage failures are values, not thrown exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Tree JSON did not describe a well-formed tree.
 *
 * @pure true (Data class)
 * @invariant path starts with "$"
 */
export class TreeDecodeError extends Data.TaggedError("TreeDecodeError")<{
	readonly path: string;
	readonly reason: string;
}> {}

/**
 * Operation name not present in the registry.
 *
 * @pure true (Data class)
 */
export class UnknownOperation extends Data.TaggedError("UnknownOperation")<{
	readonly name: string;
	readonly known: readonly string[];
}> {}

/**
 * Command line could not be interpreted.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Configuration file unreadable or invalid.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Invariant violation - an internal guarantee was broken
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Union of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| TreeDecodeError
	| UnknownOperation
	| UsageError
	| ConfigError
	| InvariantViolation;

/**
 * Human-readable one-line description of an application error.
 *
 * @pure true
 * @complexity O(k) where k = |known operations|
 */
export const describeAppError = (error: AppError): string => {
	switch (error._tag) {
		case "TreeDecodeError":
			return `invalid tree at ${error.path}: ${error.reason}`;
		case "UnknownOperation":
			return `unknown operation "${error.name}" (known: ${error.known.join(", ")})`;
		case "UsageError":
			return error.detail;
		case "ConfigError":
			return `config ${error.path}: ${error.detail}`;
		case "InvariantViolation":
			return `invariant violated in ${error.where}: ${error.detail}`;
	}
};
