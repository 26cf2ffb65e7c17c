/**
 * kubeimport parse-id command
 */

import { Command } from "commander";
import { ParseError, formatImportId, parseImportId } from "@kubeimport/core";
import { formatGroupVersion } from "@kubeimport/types";
import { getLoggerOptions, info, json, error as logError } from "../utils/logger.js";
import type { ExitCode } from "../types.js";

/**
 * Parses the ID and prints its parts. Offline: no API server is contacted.
 */
export function executeParseIdCommand(id: string): ExitCode {
  try {
    const identity = parseImportId(id);

    if (getLoggerOptions().json) {
      json({ ...identity, canonical: formatImportId(identity) });
      return 0;
    }

    info(`apiVersion: ${formatGroupVersion(identity)}`);
    info(`kind:       ${identity.kind}`);
    info(`namespace:  ${identity.namespace.length > 0 ? identity.namespace : "(none)"}`);
    info(`name:       ${identity.name}`);
    return 0;
  } catch (err) {
    if (err instanceof ParseError) {
      logError(err.message);
      if (err.suggestion) {
        logError(err.suggestion);
      }
      process.exitCode = 2;
      return 2;
    }
    throw err;
  }
}

export function createParseIdCommand(): Command {
  return new Command("parse-id")
    .description("Show how an import ID is interpreted")
    .argument("<id>", "Import ID")
    .action((id: string) => {
      executeParseIdCommand(id);
    });
}

export default createParseIdCommand;
