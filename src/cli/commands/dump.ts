/**
 * dump command - Print every loaded record
 */

import chalk from "chalk";
import { formatTimestamp } from "../../core/definitions/index.js";
import { scalarToPrimitive, type KindRecord } from "../../core/records/index.js";
import { loadStore } from "../../core/runtime.js";
import type { KdlPrimitive } from "../../core/documents/index.js";
import { createLogger } from "../../utils/index.js";
import { resolveConfig, type GlobalOptions } from "./shared.js";

const logger = createLogger("dump");

export interface DumpOptions {
  json?: boolean;
}

export interface RecordJson {
  kind: string;
  at: string;
  fields: Record<string, KdlPrimitive>;
}

export function recordToJson(record: KindRecord): RecordJson {
  const fields: Record<string, KdlPrimitive> = {};
  for (const [name, value] of record.fields) {
    fields[name] = scalarToPrimitive(value);
  }
  return { kind: record.kind, at: formatTimestamp(record.at), fields };
}

/**
 * One record as text: a header line, then one indented line per field
 */
export function formatRecord(record: KindRecord): string {
  const lines = [`${chalk.cyan(record.kind)} ${chalk.dim("@")} ${formatTimestamp(record.at)}`];
  for (const [name, value] of record.fields) {
    lines.push(`  ${name}: ${JSON.stringify(scalarToPrimitive(value))}`);
  }
  return lines.join("\n");
}

export async function dumpCommand(globals: GlobalOptions, options: DumpOptions): Promise<void> {
  const config = await resolveConfig(globals);
  const { records } = await loadStore(config);
  logger.debug({ records: records.length }, "Dumping records");

  if (options.json) {
    console.log(JSON.stringify(records.map(recordToJson), null, 2));
    return;
  }

  for (const record of records) {
    console.log(formatRecord(record));
  }
}
