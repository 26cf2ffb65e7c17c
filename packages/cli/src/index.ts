export { createProgram, run, setupGlobalOptions, EXIT_CODES, CLI_NAME, CLI_VERSION } from "./cli.js";
export type { GlobalOptions } from "./cli.js";
export { createImportCommand, executeImportCommand, exitCodeForFailure } from "./commands/import.js";
export type { ImportOptions, ImportCommandRuntime } from "./commands/import.js";
export { createParseIdCommand, executeParseIdCommand } from "./commands/parse-id.js";
export { CliError, isCliError } from "./errors.js";
export type { ExitCode } from "./types.js";
export * from "./utils/index.js";
