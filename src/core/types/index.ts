// CHANGE: Central export file for all type definitions
// WHY: Provides a single import point for types used across core, shell and app

export type {
	CLICommand,
	FunctorKitConfig,
	LawOverrides,
	LawSettings,
} from "./config.js";
export type { InstanceName, LawName, LawOutcome } from "./laws.js";
export { INSTANCE_NAMES } from "./laws.js";
export type { Branch, Leaf, Tree } from "./tree.js";
