// CHANGE: Central export file for the config shell module

export { parseCLIArgs } from "./cli.js";
export { loadConfig } from "./loader.js";
