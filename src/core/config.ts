// CHANGE: Pure validation of functor-kit.config.json and CLI override merging
// WHY: The shell only reads bytes; every rule about what a valid config is lives in CORE
// PURITY: CORE
// INVARIANT: numRuns > 0 ∧ maxDepth > 0 ∧ seed ∈ ℤ for every accepted config
// COMPLEXITY: O(k) where k = |keys in file|

import { Either } from "effect";

import { ConfigError } from "./errors.js";
import type {
	FunctorKitConfig,
	LawOverrides,
	LawSettings,
} from "./types/index.js";

export const CONFIG_FILE_NAME = "functor-kit.config.json";

export const DEFAULT_LAW_SETTINGS: LawSettings = {
	numRuns: 100,
	maxDepth: 6,
};

export const DEFAULT_CONFIG: FunctorKitConfig = { laws: DEFAULT_LAW_SETTINGS };

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue | undefined): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

const LAW_KEYS: readonly string[] = ["numRuns", "maxDepth", "seed"];

function readInteger(
	source: JSONObject,
	key: "numRuns" | "maxDepth" | "seed",
	positive: boolean,
): Either.Either<number | undefined, string> {
	const value = source[key];
	if (value === undefined) return Either.right(undefined);
	if (typeof value !== "number" || !Number.isSafeInteger(value)) {
		return Either.left(`laws.${key} must be an integer`);
	}
	if (positive && value <= 0) {
		return Either.left(`laws.${key} must be positive`);
	}
	return Either.right(value);
}

function validateLaws(section: JSONObject): Either.Either<LawOverrides, string> {
	const unknownKey = Object.keys(section).find((key) => !LAW_KEYS.includes(key));
	if (unknownKey !== undefined) {
		return Either.left(`unknown key laws.${unknownKey}`);
	}
	return Either.all({
		numRuns: readInteger(section, "numRuns", true),
		maxDepth: readInteger(section, "maxDepth", true),
		seed: readInteger(section, "seed", false),
	}).pipe(Either.map(compactOverrides));
}

function compactOverrides(values: {
	readonly numRuns: number | undefined;
	readonly maxDepth: number | undefined;
	readonly seed: number | undefined;
}): LawOverrides {
	return {
		...(values.numRuns === undefined ? {} : { numRuns: values.numRuns }),
		...(values.maxDepth === undefined ? {} : { maxDepth: values.maxDepth }),
		...(values.seed === undefined ? {} : { seed: values.seed }),
	};
}

/**
 * Overlays overrides on settings; present fields win.
 *
 * @pure true
 * @invariant mergeLawSettings(s, {}) = s
 */
export const mergeLawSettings = (
	base: LawSettings,
	overrides: LawOverrides,
): LawSettings => ({ ...base, ...overrides });

/**
 * Validates parsed config JSON.
 *
 * @param json Parsed file contents
 * @param path File path, echoed in errors
 * @returns Config with defaults filled in, or ConfigError
 *
 * @pure true
 * @example
 * ```ts
 * validateConfig({ laws: { numRuns: 500 } }, "functor-kit.config.json");
 * // Right({ laws: { numRuns: 500, maxDepth: 6 } })
 * ```
 */
export const validateConfig = (
	json: JSONValue,
	path: string,
): Either.Either<FunctorKitConfig, ConfigError> => {
	if (!isJSONObject(json)) {
		return Either.left(
			new ConfigError({ path, detail: "top level must be an object" }),
		);
	}
	const laws = json["laws"];
	if (laws === undefined) return Either.right(DEFAULT_CONFIG);
	if (!isJSONObject(laws)) {
		return Either.left(new ConfigError({ path, detail: "laws must be an object" }));
	}
	return validateLaws(laws).pipe(
		Either.map(
			(overrides): FunctorKitConfig => ({
				laws: mergeLawSettings(DEFAULT_LAW_SETTINGS, overrides),
			}),
		),
		Either.mapLeft((detail) => new ConfigError({ path, detail })),
	);
};
