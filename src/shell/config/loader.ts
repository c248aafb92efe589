// CHANGE: Load functor-kit.config.json from disk
// WHY: Reading the file is the only effect; validation is delegated to CORE
// PURITY: SHELL (filesystem)
// EFFECT: Effect<FunctorKitConfig, ConfigError>
// INVARIANT: A missing default file yields DEFAULT_CONFIG; a missing explicit file is an error

import { Effect, Either } from "effect";

import {
	CONFIG_FILE_NAME,
	DEFAULT_CONFIG,
	type JSONValue,
	validateConfig,
} from "../../core/config.js";
import { ConfigError } from "../../core/errors.js";
import type { FunctorKitConfig } from "../../core/types/index.js";
import { fs, path } from "../../utils/node-mods.js";

const readText = (file: string): Effect.Effect<string, ConfigError> =>
	Effect.try({
		try: () => fs.readFileSync(file, "utf8"),
		catch: (error) =>
			new ConfigError({
				path: file,
				detail: `cannot read file (${error instanceof Error ? error.message : String(error)})`,
			}),
	});

const parseJSON = (
	file: string,
	text: string,
): Effect.Effect<JSONValue, ConfigError> =>
	Effect.try({
		try: (): JSONValue => JSON.parse(text),
		catch: () => new ConfigError({ path: file, detail: "malformed JSON" }),
	});

/**
 * Loads and validates the configuration.
 *
 * @param cwd Directory searched for functor-kit.config.json
 * @param explicitPath Path given with --config, resolved against cwd
 *
 * @pure false (reads filesystem)
 * @effect Effect<FunctorKitConfig, ConfigError>
 */
export function loadConfig(
	cwd: string,
	explicitPath?: string,
): Effect.Effect<FunctorKitConfig, ConfigError> {
	const file = path.resolve(cwd, explicitPath ?? CONFIG_FILE_NAME);
	if (explicitPath === undefined && !fs.existsSync(file)) {
		return Effect.succeed(DEFAULT_CONFIG);
	}
	return readText(file).pipe(
		Effect.flatMap((text) => parseJSON(file, text)),
		Effect.flatMap((json) =>
			Either.match(validateConfig(json, file), {
				onLeft: (error) => Effect.fail(error),
				onRight: (config) => Effect.succeed(config),
			}),
		),
	);
}
