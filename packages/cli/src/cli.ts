/**
 * Main CLI setup using Commander.js
 *
 * Creates the main program with global options and registers all command modules
 */
import { Command, Option } from "commander";
import { configureLogger, error as logError } from "./utils/logger.js";
import { ConfigError, loadConfig } from "./utils/config.js";
import { isCliError } from "./errors.js";
import { createImportCommand, type ImportCommandRuntime } from "./commands/import.js";
import { createParseIdCommand } from "./commands/parse-id.js";

/**
 * CLI version - should match package.json
 */
export const CLI_VERSION = "0.1.0";

/**
 * CLI name
 */
export const CLI_NAME = "kubeimport";

/**
 * Global CLI options
 */
export interface GlobalOptions {
  /** Enable verbose output */
  verbose?: boolean;
  /** Minimize output */
  quiet?: boolean;
  /** Configuration file path */
  config?: string;
  /** Disable color output */
  color?: boolean;
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  CONFIG_ERROR: 3,
  VALIDATION_ERROR: 4,
  NETWORK_ERROR: 5,
  USER_INTERRUPT: 130,
} as const;

/**
 * Create the main CLI program
 */
export function createProgram(runtime: ImportCommandRuntime = {}): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Import live Kubernetes objects into typed, managed state")
    .version(CLI_VERSION, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .addHelpText(
      "after",
      `
Examples:
  $ kubeimport import "apps/v1#Deployment#default#web"   Import a Deployment
  $ kubeimport parse-id "v1#Namespace#team-a"            Show how an ID is read`
    );

  // Global options
  program
    .addOption(
      new Option("-v, --verbose", "Enable verbose output").default(false)
    )
    .addOption(
      new Option("-q, --quiet", "Minimize output (only errors)").default(false)
    )
    .addOption(
      new Option("-c, --config <path>", "Configuration file path")
    )
    .addOption(
      new Option("--no-color", "Disable color output")
    )
    .addOption(
      new Option("--json", "Output in JSON format").default(false)
    );

  program.hook("preAction", async (_thisCommand, actionCommand) => {
    await setupGlobalOptions(actionCommand, runtime);
  });

  program.addCommand(createImportCommand(runtime));
  program.addCommand(createParseIdCommand());

  return program;
}

/**
 * Setup global options before command execution. The log level and color
 * settings of the configuration apply unless a flag overrides them.
 */
export async function setupGlobalOptions(
  command: Command,
  runtime: ImportCommandRuntime = {}
): Promise<GlobalOptions> {
  const opts = command.optsWithGlobals<GlobalOptions>();
  const config = await loadConfig({
    configPath: opts.config,
    globalConfigPath: runtime.globalConfigPath,
  });

  configureLogger({
    verbose: opts.verbose === true || config.logLevel === "debug",
    quiet: opts.quiet,
    noColor: opts.color === false || config.color === false,
    json: opts.json,
    level: config.logLevel,
  });

  return opts;
}

/**
 * Run the CLI program
 */
export async function run(args?: string[]): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args ?? process.argv);
  } catch (err) {
    if (isCliError(err)) {
      logError(err.message);
      if (err.suggestion) {
        logError(err.suggestion);
      }
      process.exitCode = err.exitCode;
    } else if (err instanceof Error) {
      logError(err.message);
      process.exitCode = err instanceof ConfigError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.GENERAL_ERROR;
    } else {
      console.error("Unknown error:", err);
      process.exitCode = EXIT_CODES.GENERAL_ERROR;
    }
  }
}
