// CHANGE: Public API entry point for library consumers
// WHY: Export CORE (type class, instances, laws, codec) and the APP entry; hide SHELL internals
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces, or the APP runner
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Functor type class and operations derived from any instance.
 *
 * @example
 * ```typescript
 * import { Tree, lift } from "functor-kit";
 *
 * const doubleAll = lift(Tree.Functor)((n: number) => n * 2);
 * doubleAll(Tree.branch(Tree.leaf(10), Tree.leaf(20)));
 * // => branch(leaf(20), leaf(40))
 * ```
 */
export {
	as,
	asVoid,
	flap,
	type Functor,
	lift,
	makeFunctor,
	mapComposition,
	tupleLeft,
	tupleRight,
} from "./core/functor.js";
export type {
	EitherTypeLambda,
	FunctionTypeLambda,
	Kind,
	OptionTypeLambda,
	ReadonlyArrayTypeLambda,
	TreeTypeLambda,
	TypeLambda,
} from "./core/hkt.js";

// ═══════════════════════════════════════════════════════════════════════════════
// INSTANCES
// ═══════════════════════════════════════════════════════════════════════════════

export * as ReadonlyArray from "./core/instances/array.js";
export * as Either from "./core/instances/either.js";
export * as Function from "./core/instances/function.js";
export * as Option from "./core/instances/option.js";
export * as Tree from "./core/instances/tree.js";

// ═══════════════════════════════════════════════════════════════════════════════
// LAWS, CODEC, FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export {
	compositionLaw,
	identityLaw,
	treeStructureLaw,
} from "./core/laws.js";
export {
	decodeNumberTree,
	parseNumberTree,
	type TreeJSON,
	treeToJSON,
	treeToJSONText,
} from "./core/codec.js";
export { formatTree } from "./core/format.js";
export {
	type AppError,
	ConfigError,
	InvariantViolation,
	TreeDecodeError,
	UnknownOperation,
	UsageError,
} from "./core/errors.js";
export type {
	InstanceName,
	LawName,
	LawOutcome,
	LawSettings,
} from "./core/types/index.js";
export { checkInstanceLaws } from "./shell/laws/runner.js";

// ═══════════════════════════════════════════════════════════════════════════════
// APP
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Programmatic CLI run; resolves to the exit code instead of exiting.
 *
 * @pure false - console output, config file, random sampling
 */
export { main } from "./main.js";
export type { ExitCode } from "./core/models.js";
