/**
 * Record Loader
 *
 * Reads every record document directly inside the root folder.
 *
 * @module
 */

import { DiagnosticError } from "../errors.js";
import { CONFIG_FILE, createLogger, readDocuments } from "../../utils/index.js";
import type { DefinitionStore } from "../definitions/index.js";
import { parseRecordDocument } from "./record-parser.js";
import type { KindRecord } from "./types.js";

const logger = createLogger("records");

/**
 * Returns one flat list of records, files in enumeration order and records in
 * document order. The first error aborts the load and carries the file's source.
 */
export async function loadRecords(rootFolder: string, store: DefinitionStore): Promise<KindRecord[]> {
  const records: KindRecord[] = [];
  let files = 0;

  for await (const document of readDocuments(rootFolder, { ignore: [CONFIG_FILE] })) {
    try {
      const parsed = parseRecordDocument(document.text, store, document.path);
      logger.debug({ file: document.path, records: parsed.length }, "Parsed record document");
      records.push(...parsed);
      files++;
    } catch (error) {
      if (error instanceof DiagnosticError) {
        throw error.withSource({ name: document.path, text: document.text });
      }
      throw error;
    }
  }

  logger.info({ rootFolder, files, records: records.length }, "Loaded records");
  return records;
}
