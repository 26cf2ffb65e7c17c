/**
 * kubeimport import command
 *
 * Reads one live object from the API server and prints the imported state.
 */

import { writeFile } from "node:fs/promises";
import { Command, Option } from "commander";
import ora from "ora";
import {
  MANIFEST_RESOURCE_TYPE,
  importResourceState,
  listResourceTypes,
  type ImportDependencies,
  type ImportFailureKind,
  type ImportResult,
} from "@kubeimport/core";
import type { Diagnostic } from "@kubeimport/types";
import { CliError, isCliError } from "../errors.js";
import type { ExitCode } from "../types.js";
import {
  ConfigError,
  loadConfig,
  parseTimeoutMs,
  type KubeimportConfig,
} from "../utils/config.js";
import {
  createCoreConsole,
  getLoggerOptions,
  json,
  success,
  warn,
  error as logError,
} from "../utils/logger.js";
import { createImportDependencies } from "../services/dependencies.js";

/**
 * Import command options
 */
export interface ImportOptions {
  typeName: string;
  server?: string;
  token?: string;
  schemaFile?: string;
  timeout?: string;
  output?: string;
}

/**
 * Hooks replaced in tests
 */
export interface ImportCommandRuntime {
  createDependencies?: (config: KubeimportConfig, logger?: Console) => ImportDependencies;
  /** Global config file path, ~/.kubeimportrc by default */
  globalConfigPath?: string;
}

/**
 * Exit code of a failed import
 */
export function exitCodeForFailure(failure: ImportFailureKind): ExitCode {
  switch (failure) {
    case "parse":
    case "resource-type":
      return 2; // INVALID_ARGUMENT
    case "resolution":
    case "fetch":
      return 5; // NETWORK_ERROR
    case "schema":
    case "conversion":
      return 4; // VALIDATION_ERROR
    case "canceled":
      return 130; // USER_INTERRUPT
    case "assembly":
    case "unexpected":
      return 1;
  }
}

function reportDiagnostic(diagnostic: Diagnostic): void {
  const text = `${diagnostic.summary}: ${diagnostic.detail}`;
  if (diagnostic.severity === "error") {
    logError(text);
  } else {
    warn(text);
  }
}

function toCliConfig(options: ImportOptions): KubeimportConfig {
  const config: KubeimportConfig = {};
  if (options.server) config.server = options.server;
  if (options.token) config.token = options.token;
  if (options.schemaFile) config.schemaFile = options.schemaFile;
  if (options.timeout !== undefined) config.timeoutMs = parseTimeoutMs(options.timeout, "--timeout");
  return config;
}

async function resolveDependencies(
  options: ImportOptions,
  configPath: string | undefined,
  runtime: ImportCommandRuntime,
): Promise<ImportDependencies> {
  try {
    const config = await loadConfig({
      configPath,
      globalConfigPath: runtime.globalConfigPath,
      cli: toCliConfig(options),
    });
    const create = runtime.createDependencies ?? createImportDependencies;
    return create(config, createCoreConsole());
  } catch (err) {
    if (isCliError(err)) {
      throw err;
    }
    if (err instanceof ConfigError) {
      throw new CliError({ code: "CONFIG_ERROR", message: err.message, exitCode: 3 }, { cause: err });
    }
    throw err;
  }
}

/**
 * Execute the import command
 *
 * @returns the process exit code, also stored in `process.exitCode`
 */
export async function executeImportCommand(
  id: string,
  options: ImportOptions,
  context: { configPath?: string; runtime?: ImportCommandRuntime } = {},
): Promise<ExitCode> {
  const loggerOptions = getLoggerOptions();
  const showSpinner = !loggerOptions.json && !loggerOptions.quiet;

  let dependencies: ImportDependencies;
  try {
    dependencies = await resolveDependencies(options, context.configPath, context.runtime ?? {});
  } catch (err) {
    const cliError = isCliError(err)
      ? err
      : new CliError({ code: "INTERNAL_ERROR", message: String(err), exitCode: 1 }, { cause: err });
    logError(cliError.message);
    if (cliError.suggestion) {
      logError(cliError.suggestion);
    }
    process.exitCode = cliError.exitCode;
    return cliError.exitCode;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  const spinner = ora({ stream: process.stderr, isSilent: !showSpinner });
  spinner.start(`Importing ${id}...`);

  let result: ImportResult;
  try {
    result = await importResourceState(
      { typeName: options.typeName, id },
      dependencies,
      { signal: controller.signal, logger: createCoreConsole() },
    );
  } finally {
    process.off("SIGINT", onInterrupt);
  }

  if (result.failure) {
    spinner.fail("Import failed");
  } else {
    spinner.stop();
  }

  for (const diagnostic of result.diagnostics) {
    reportDiagnostic(diagnostic);
  }

  if (result.failure) {
    const exitCode = exitCodeForFailure(result.failure);
    process.exitCode = exitCode;
    return exitCode;
  }

  const [imported] = result.importedResources;
  if (imported) {
    if (options.output) {
      await writeFile(options.output, `${JSON.stringify(imported, null, 2)}\n`, "utf-8");
      success(`Imported ${id} into ${options.output}`);
    } else {
      json(imported);
    }
  }

  return 0;
}

/**
 * Create the import command
 *
 * @returns Commander command for 'kubeimport import'
 */
export function createImportCommand(runtime: ImportCommandRuntime = {}): Command {
  const command = new Command("import")
    .description("Import a live object into managed state")
    .addHelpText(
      "after",
      `
ID format:
  apiVersion#Kind#namespace#name   namespaced objects
  apiVersion#Kind#name             cluster-scoped objects

Examples:
  $ kubeimport import "apps/v1#Deployment#default#web"
  $ kubeimport import "v1#Namespace#team-a" --output state.json
  $ kubeimport import "v1#Secret#default#db" --server https://127.0.0.1:6443`
    )
    .argument("<id>", "Import ID")
    .addOption(
      new Option("--type-name <name>", "Resource type receiving the state")
        .choices(listResourceTypes())
        .default(MANIFEST_RESOURCE_TYPE)
    )
    .addOption(new Option("--server <url>", "API server URL"))
    .addOption(new Option("--token <token>", "Bearer token"))
    .addOption(new Option("--schema-file <path>", "Schema document (YAML or JSON)"))
    .addOption(new Option("--timeout <ms>", "Per-request timeout in milliseconds"))
    .addOption(new Option("-o, --output <file>", "Write the imported state to a file"))
    .action(async (id: string, options: ImportOptions, cmd: Command) => {
      const globalOpts = cmd.optsWithGlobals<{ config?: string }>();
      await executeImportCommand(id, options, { configPath: globalOpts.config, runtime });
    });

  return command;
}

export default createImportCommand;
