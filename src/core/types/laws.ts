// CHANGE: Law vocabulary shared by the core predicates and the shell sampler
// PURITY: CORE (types only)

export type LawName = "identity" | "composition" | "structure";

export type InstanceName = "tree" | "array" | "option" | "either" | "function";

export const INSTANCE_NAMES: readonly InstanceName[] = [
	"tree",
	"array",
	"option",
	"either",
	"function",
];

/**
 * Result of sampling one law for one instance.
 *
 * @invariant passed = false ⇒ counterexample is defined
 */
export interface LawOutcome {
	readonly instance: InstanceName;
	readonly law: LawName;
	readonly passed: boolean;
	readonly numRuns: number;
	readonly seed: number;
	readonly counterexample?: string;
}
