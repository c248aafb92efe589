// CHANGE: Named numeric operations that the CLI maps over trees
// WHY: Mapping functions on the command line are chosen by name from a closed registry
// PURITY: CORE
// INVARIANT: Every registered operation is total on finite numbers
// COMPLEXITY: O(1) lookup

import { Either } from "effect";

import { UnknownOperation } from "./errors.js";

export type Scalar = number | string;

export interface Operation {
	readonly name: string;
	readonly description: string;
	readonly apply: (value: number) => Scalar;
}

export const OPERATIONS: readonly Operation[] = [
	{ name: "double", description: "x * 2", apply: (x) => x * 2 },
	{ name: "increment", description: "x + 1", apply: (x) => x + 1 },
	{ name: "negate", description: "-x", apply: (x) => -x },
	{ name: "square", description: "x * x", apply: (x) => x * x },
	{ name: "show", description: "x as a string", apply: (x) => String(x) },
];

export const DEFAULT_OPERATION = "double";

/**
 * Looks an operation up by name (case-insensitive).
 *
 * @pure true
 */
export const resolveOperation = (
	name: string,
): Either.Either<Operation, UnknownOperation> => {
	const wanted = name.trim().toLowerCase();
	const found = OPERATIONS.find((op) => op.name === wanted);
	return found === undefined
		? Either.left(
				new UnknownOperation({
					name,
					known: OPERATIONS.map((op) => op.name),
				}),
			)
		: Either.right(found);
};
