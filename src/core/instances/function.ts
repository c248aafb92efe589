// CHANGE: Functor instance for unary functions
// WHY: Mapping over a function is post-composition: map(f, g) = g ∘ f
// PURITY: CORE
// INVARIANT: map(f, g)(x) = g(f(x)) for every x
// COMPLEXITY: O(1) to build, O(cost f + cost g) per call

import { flow } from "effect";

import { type Functor as FunctorClass, makeFunctor } from "../functor.js";
import type { FunctionTypeLambda } from "../hkt.js";

export const map = <I, A, B>(
	self: (input: I) => A,
	f: (a: A) => B,
): ((input: I) => B) => flow(self, f);

export const Functor: FunctorClass<FunctionTypeLambda> =
	makeFunctor<FunctionTypeLambda>(map);
