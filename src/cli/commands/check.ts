/**
 * check command - Load everything and report what was found
 */

import chalk from "chalk";
import ora from "ora";
import { loadStore, type LoadedStore } from "../../core/runtime.js";
import { createLogger } from "../../utils/index.js";
import { resolveConfig, type GlobalOptions } from "./shared.js";

const logger = createLogger("check");

export interface KindSummary {
  kind: string;
  versions: number;
  records: number;
}

export function summarizeStore(store: LoadedStore): KindSummary[] {
  const counts = new Map<string, number>();
  for (const record of store.records) {
    counts.set(record.kind, (counts.get(record.kind) ?? 0) + 1);
  }

  return store.definitions.kinds().map((kind) => ({
    kind,
    versions: store.definitions.versions(kind).length,
    records: counts.get(kind) ?? 0,
  }));
}

export async function checkCommand(globals: GlobalOptions): Promise<void> {
  const spinner = ora("Reading configuration...").start();

  try {
    const config = await resolveConfig(globals);

    spinner.text = "Loading definitions and records...";
    const store = await loadStore(config);
    spinner.succeed(chalk.green("Everything loaded"));

    const summary = summarizeStore(store);
    console.log();
    console.log(chalk.white.bold("Kinds"));
    for (const entry of summary) {
      console.log(
        `  ${chalk.cyan(entry.kind.padEnd(20))} ${String(entry.versions).padStart(3)} versions ${String(entry.records).padStart(6)} records`
      );
    }
    console.log();
    console.log(chalk.dim(`Root folder: ${config.rootFolder}`));
    console.log(chalk.dim(`Paperless:   ${config.paperless ? config.paperless.url : "not configured"}`));

    logger.info({ kinds: summary.length, records: store.records.length }, "Check complete");
  } catch (error) {
    spinner.fail(chalk.red("Loading failed"));
    throw error;
  }
}
