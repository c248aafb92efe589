// CHANGE: Test helper creating isolated temporary directories with config files
// WHY: Config loading is validated against real files instead of mocked fs

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary project.
 *
 * Postconditions:
 * - cwd points to the root directory of the temporary project
 * - cleanup() removes the temporary directory recursively
 */
export interface TempProject {
	readonly cwd: string;
	readonly write: (relativePath: string, contents: string) => string;
	readonly cleanup: () => void;
}

export function createTempProject(): TempProject {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "functor-kit-"));
	return {
		cwd,
		write: (relativePath, contents) => {
			const file = path.join(cwd, relativePath);
			fs.mkdirSync(path.dirname(file), { recursive: true });
			fs.writeFileSync(file, contents, "utf8");
			return file;
		},
		cleanup: () => {
			fs.rmSync(cwd, { recursive: true, force: true });
		},
	};
}
