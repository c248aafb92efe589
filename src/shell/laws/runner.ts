// CHANGE: Sample the Functor laws for every bundled instance with fast-check
// WHY: `functor-kit laws` reports which instance/law pairs hold on random inputs
// PURITY: SHELL (randomness; Effect wrapper for APP composition)
// EFFECT: Effect<readonly LawOutcome[]>
// INVARIANT: One LawOutcome per (instance, law) pair that applies to the instance
// COMPLEXITY: O(numRuns · cost(map)) per law

import { Effect, Either, Equivalence, Option } from "effect";
import fc from "fast-check";

import * as ArrayInstance from "../../core/instances/array.js";
import * as EitherInstance from "../../core/instances/either.js";
import * as FunctionInstance from "../../core/instances/function.js";
import * as OptionInstance from "../../core/instances/option.js";
import * as TreeInstance from "../../core/instances/tree.js";
import {
	compositionLaw,
	identityLaw,
	treeStructureLaw,
} from "../../core/laws.js";
import type {
	EitherTypeLambda,
	FunctionTypeLambda,
	OptionTypeLambda,
	ReadonlyArrayTypeLambda,
	TreeTypeLambda,
} from "../../core/hkt.js";
import {
	INSTANCE_NAMES,
	type InstanceName,
	type LawName,
	type LawOutcome,
	type LawSettings,
} from "../../core/types/index.js";
import {
	arrayArbitrary,
	eitherArbitrary,
	intFunction,
	optionArbitrary,
	smallInt,
	treeArbitrary,
} from "./arbitraries.js";

/**
 * Inputs on which two unary functions are compared extensionally.
 */
export const FUNCTION_PROBES: readonly number[] = [-7, -1, 0, 1, 2, 42, 1000];

const functionEquivalence: Equivalence.Equivalence<(n: number) => number> =
	Equivalence.make<(n: number) => number>((f, g) =>
		FUNCTION_PROBES.every((x) => f(x) === g(x)),
	);

/**
 * Everything needed to sample the laws for one instance over numbers.
 */
export interface LawSubject<T> {
	readonly name: InstanceName;
	readonly arbitrary: (settings: LawSettings) => fc.Arbitrary<T>;
	readonly identity: (self: T) => boolean;
	readonly composition: (
		self: T,
		f: (n: number) => number,
		g: (n: number) => number,
	) => boolean;
	readonly structure?: (self: T, f: (n: number) => string) => boolean;
}

function toOutcome<Ts>(
	instance: InstanceName,
	law: LawName,
	details: fc.RunDetails<Ts>,
): LawOutcome {
	const base = {
		instance,
		law,
		passed: !details.failed,
		numRuns: details.numRuns,
		seed: details.seed,
	};
	if (!details.failed) return base;
	const counterexample =
		details.counterexample === null
			? "no counterexample recorded"
			: fc.stringify(details.counterexample);
	return { ...base, counterexample };
}

function parametersFor<Ts>(settings: LawSettings): fc.Parameters<Ts> {
	return settings.seed === undefined
		? { numRuns: settings.numRuns }
		: { numRuns: settings.numRuns, seed: settings.seed };
}

/**
 * Samples identity, composition and, when present, structure for one subject.
 *
 * @invariant a failed law carries a counterexample
 */
export function runSubject<T>(
	subject: LawSubject<T>,
	settings: LawSettings,
): readonly LawOutcome[] {
	const arbitrary = subject.arbitrary(settings);

	const outcomes: LawOutcome[] = [
		toOutcome(
			subject.name,
			"identity",
			fc.check(
				fc.property(arbitrary, subject.identity),
				parametersFor<[T]>(settings),
			),
		),
		toOutcome(
			subject.name,
			"composition",
			fc.check(
				fc.property(arbitrary, intFunction, intFunction, subject.composition),
				parametersFor<[T, (n: number) => number, (n: number) => number]>(
					settings,
				),
			),
		),
	];

	const structure = subject.structure;
	if (structure !== undefined) {
		outcomes.push(
			toOutcome(
				subject.name,
				"structure",
				fc.check(
					fc.property(arbitrary, stringFunction, structure),
					parametersFor<[T, (n: number) => string]>(settings),
				),
			),
		);
	}
	return outcomes;
}

const numberEq = Equivalence.number;

const stringFunction: fc.Arbitrary<(n: number) => string> = fc.func(
	fc.string(),
);

const treeSubject: LawSubject<TreeInstance.Tree<number>> = {
	name: "tree",
	arbitrary: (settings) => treeArbitrary(smallInt, settings.maxDepth),
	identity: identityLaw<TreeTypeLambda, unknown, unknown, unknown, number>(
		TreeInstance.Functor,
		TreeInstance.getEquivalence(numberEq),
	),
	composition: compositionLaw<
		TreeTypeLambda,
		unknown,
		unknown,
		unknown,
		number
	>(TreeInstance.Functor, TreeInstance.getEquivalence(numberEq)),
	structure: treeStructureLaw,
};

const arraySubject: LawSubject<ReadonlyArray<number>> = {
	name: "array",
	arbitrary: () => arrayArbitrary(smallInt),
	identity: identityLaw<
		ReadonlyArrayTypeLambda,
		unknown,
		unknown,
		unknown,
		number
	>(ArrayInstance.Functor, Equivalence.array(numberEq)),
	composition: compositionLaw<
		ReadonlyArrayTypeLambda,
		unknown,
		unknown,
		unknown,
		number
	>(ArrayInstance.Functor, Equivalence.array(numberEq)),
};

const optionSubject: LawSubject<Option.Option<number>> = {
	name: "option",
	arbitrary: () => optionArbitrary(smallInt),
	identity: identityLaw<OptionTypeLambda, unknown, unknown, unknown, number>(
		OptionInstance.Functor,
		Option.getEquivalence(numberEq),
	),
	composition: compositionLaw<
		OptionTypeLambda,
		unknown,
		unknown,
		unknown,
		number
	>(OptionInstance.Functor, Option.getEquivalence(numberEq)),
};

const eitherEq = Either.getEquivalence({
	left: Equivalence.string,
	right: numberEq,
});

const eitherSubject: LawSubject<Either.Either<number, string>> = {
	name: "either",
	arbitrary: () => eitherArbitrary(smallInt),
	identity: identityLaw<EitherTypeLambda, unknown, unknown, string, number>(
		EitherInstance.Functor,
		eitherEq,
	),
	composition: compositionLaw<
		EitherTypeLambda,
		unknown,
		unknown,
		string,
		number
	>(EitherInstance.Functor, eitherEq),
};

const functionSubject: LawSubject<(n: number) => number> = {
	name: "function",
	arbitrary: () => intFunction,
	identity: identityLaw<FunctionTypeLambda, number, unknown, unknown, number>(
		FunctionInstance.Functor,
		functionEquivalence,
	),
	composition: compositionLaw<
		FunctionTypeLambda,
		number,
		unknown,
		unknown,
		number
	>(FunctionInstance.Functor, functionEquivalence),
};

const runners: Readonly<
	Record<InstanceName, (settings: LawSettings) => readonly LawOutcome[]>
> = {
	tree: (settings) => runSubject(treeSubject, settings),
	array: (settings) => runSubject(arraySubject, settings),
	option: (settings) => runSubject(optionSubject, settings),
	either: (settings) => runSubject(eitherSubject, settings),
	function: (settings) => runSubject(functionSubject, settings),
};

/**
 * Samples every law that applies to one instance.
 *
 * @pure false (random sampling unless settings.seed is fixed)
 * @invariant result.length ∈ {2, 3}; "structure" only for tree
 */
export const checkInstanceLaws = (
	instance: InstanceName,
	settings: LawSettings,
): readonly LawOutcome[] => runners[instance](settings);

/**
 * Samples the laws for the requested instances as an Effect.
 *
 * @effect Effect<readonly LawOutcome[]>
 * @invariant outcomes are grouped by instance in INSTANCE_NAMES order
 */
export const checkLawsEffect = (
	selection: InstanceName | "all",
	settings: LawSettings,
): Effect.Effect<readonly LawOutcome[]> =>
	Effect.sync(() => {
		const names = selection === "all" ? INSTANCE_NAMES : [selection];
		return names.flatMap((name) => checkInstanceLaws(name, settings));
	});
