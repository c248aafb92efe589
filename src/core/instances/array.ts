// CHANGE: Functor instance for read-only arrays
// PURITY: CORE
// INVARIANT: Output length = input length; f sees elements in index order
// COMPLEXITY: O(n)

import { type Functor as FunctorClass, makeFunctor } from "../functor.js";
import type { ReadonlyArrayTypeLambda } from "../hkt.js";

/**
 * Element-wise map. The index is not forwarded to `f`, so a mapper with an
 * optional second parameter cannot observe it.
 *
 * @pure true
 */
export const map = <A, B>(
	self: ReadonlyArray<A>,
	f: (a: A) => B,
): ReadonlyArray<B> => self.map((a) => f(a));

export const Functor: FunctorClass<ReadonlyArrayTypeLambda> =
	makeFunctor<ReadonlyArrayTypeLambda>(map);
