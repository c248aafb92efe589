// CHANGE: Type lambdas for every type constructor that has a Functor instance
// WHY: Higher-kinded polymorphism is encoded with effect/HKT; instances are passed explicitly
// SOURCE: https://effect.website/docs (HKT encoding used by @effect/typeclass)
// PURITY: CORE (types only, erased at runtime)
// INVARIANT: Kind<XTypeLambda, In, Out2, Out1, A> resolves to the concrete container of A

import type { Either, Option } from "effect";
import type { Kind, TypeLambda } from "effect/HKT";

import type { Tree } from "./types/tree.js";

export type { Kind, TypeLambda };

export interface TreeTypeLambda extends TypeLambda {
	readonly type: Tree<this["Target"]>;
}

export interface ReadonlyArrayTypeLambda extends TypeLambda {
	readonly type: ReadonlyArray<this["Target"]>;
}

export interface OptionTypeLambda extends TypeLambda {
	readonly type: Option.Option<this["Target"]>;
}

/**
 * Either with the error fixed in `Out1`; `map` only touches the right side.
 */
export interface EitherTypeLambda extends TypeLambda {
	readonly type: Either.Either<this["Target"], this["Out1"]>;
}

/**
 * Functions from `In`; mapping post-composes on the result.
 */
export interface FunctionTypeLambda extends TypeLambda {
	readonly type: (input: this["In"]) => this["Target"];
}
