/**
 * CHANGE: Centralized re-exports of Node built-ins used by the shell
 * WHY: One import block for fs/path across shell modules and test helpers
 *
 * Invariant: re-exported through constants, since node:path and node:fs use `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export const fs = fsNS;
export const path = pathNS;
