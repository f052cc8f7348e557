#!/usr/bin/env node

/**
 * Strata CLI
 * Loads definitions and records and inspects them from the command line
 */

import { Command } from "commander";
import chalk from "chalk";
import { dumpCommand, type DumpOptions } from "./commands/dump.js";
import { schemaCommand, type SchemaOptions } from "./commands/schema.js";
import { checkCommand } from "./commands/check.js";
import type { GlobalOptions } from "./commands/shared.js";
import { renderError } from "./diagnostics.js";
import { wrapError } from "../core/errors.js";
import { CONFIG_FILE, createLogger } from "../utils/index.js";

const logger = createLogger("cli");

// Create the main program
const program = new Command();

program
  .name("strata")
  .description("Versioned personal records, queryable as a graph")
  .version("0.1.0")
  .option("-c, --config <path>", "Configuration file", CONFIG_FILE)
  .option("-r, --root-folder <dir>", "Folder holding the record documents (overrides root_folder)")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

// =============================================================================
// Commands
// =============================================================================

program
  .command("dump")
  .description("Print every record")
  .option("--json", "Print records as JSON")
  .action((options: DumpOptions) => dumpCommand(globals(), options));

program
  .command("schema")
  .description("Print the schema synthesized from the definitions")
  .option("--namespaced", "Print the schema as routed through the backend namespace")
  .action((options: SchemaOptions) => schemaCommand(globals(), options));

program
  .command("check")
  .description("Load definitions and records and report per-kind counts")
  .action(() => checkCommand(globals()));

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  logger.debug({ err: wrapError(error).toJSON() }, "CLI error occurred");
  console.error(renderError(error));
  if (error instanceof Error && (process.env.DEBUG || process.env.NODE_ENV === "development")) {
    console.error(chalk.dim(error.stack));
  }
  process.exit(1);
}

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Signal Handlers
// =============================================================================

function shutdown(signal: string): void {
  logger.info({ signal }, "Received shutdown signal");
  process.exit(0);
}

// Handle SIGINT (Ctrl+C)
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle SIGTERM (kill command)
process.on("SIGTERM", () => shutdown("SIGTERM"));

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
