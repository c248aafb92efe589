// CHANGE: Functor instance for effect's Either (right-biased)
// PURITY: CORE
// INVARIANT: map(Left(e), f) = Left(e); map(Right(a), f) = Right(f(a))
// COMPLEXITY: O(1)

import { Either } from "effect";

import { type Functor as FunctorClass, makeFunctor } from "../functor.js";
import type { EitherTypeLambda } from "../hkt.js";

export const map = <A, E, B>(
	self: Either.Either<A, E>,
	f: (a: A) => B,
): Either.Either<B, E> => Either.map(self, f);

export const Functor: FunctorClass<EitherTypeLambda> =
	makeFunctor<EitherTypeLambda>(map);
