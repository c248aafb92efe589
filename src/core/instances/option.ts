// CHANGE: Functor instance for effect's Option
// PURITY: CORE
// INVARIANT: map(None, f) = None; map(Some(a), f) = Some(f(a))
// COMPLEXITY: O(1)

import { Option } from "effect";

import { type Functor as FunctorClass, makeFunctor } from "../functor.js";
import type { OptionTypeLambda } from "../hkt.js";

export const map = <A, B>(
	self: Option.Option<A>,
	f: (a: A) => B,
): Option.Option<B> => Option.map(self, f);

export const Functor: FunctorClass<OptionTypeLambda> =
	makeFunctor<OptionTypeLambda>(map);
