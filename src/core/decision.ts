// CHANGE: Pure decision function computing the exit code
// WHY: Centralize termination logic in the Functional Core
// FORMAT THEOREM: ∀s: (s.failed ∨ s.lawViolations > 0) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { LawOutcome } from "./types/index.js";
import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes process exit code from a command's outcome.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition (state.failed ∨ state.lawViolations > 0) → result = 1
 *
 * @example
 * ```ts
 * computeExitCode({ failed: false, lawViolations: 2 }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.failed || s.lawViolations > 0,
		(hasErrors): ExitCode => (hasErrors ? 1 : 0),
	);

/**
 * Decision state for a finished law run.
 *
 * @pure true
 * @complexity O(n) where n = |outcomes|
 */
export const lawRunState = (
	outcomes: readonly LawOutcome[],
): DecisionState => ({
	failed: false,
	lawViolations: outcomes.filter((outcome) => !outcome.passed).length,
});
