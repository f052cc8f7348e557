import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { createRuntime, loadStore } from "../runtime.js";
import { SchemaCell } from "../schema/index.js";
import { DiagnosticError, ErrorCode } from "../errors.js";
import type { StrataConfig } from "../config.js";
import type { RoutedVertex } from "../router/index.js";

const TASK_DEFINITION = `define since="2020-01-01" {
    fields {
        title is="string"
        attachment is="path"
    }
}
`;

const TASK_RECORDS = `task "2021-06-01" {
    title "Write report"
}
task "2021-07-01" {
    title "File taxes"
}
`;

async function* stream<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) result.push(item);
  return result;
}

describe("runtime", () => {
  let tempDir: string;
  let config: StrataConfig;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "runtime-test-"));
    await fs.mkdir(path.join(tempDir, "definitions"));
    await fs.writeFile(path.join(tempDir, "definitions", "task.kdl"), TASK_DEFINITION);
    await fs.writeFile(path.join(tempDir, "tasks.kdl"), TASK_RECORDS);
    await fs.writeFile(path.join(tempDir, "strata.kdl"), `root_folder "."\n`);

    config = {
      configPath: path.join(tempDir, "strata.kdl"),
      rootFolder: tempDir,
      definitionsFolder: path.join(tempDir, "definitions"),
      paperless: null,
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should load definitions before records", async () => {
    const store = await loadStore(config);

    expect(store.definitions.kinds()).toEqual(["task"]);
    expect(store.records).toHaveLength(2);
    expect(Object.isFrozen(store.records)).toBe(true);
  });

  it("should stop at the first invalid record document", async () => {
    await fs.writeFile(path.join(tempDir, "broken.kdl"), `task "2021-06-01" {\n    owner "me"\n}\n`);

    await expect(loadStore(config)).rejects.toBeInstanceOf(DiagnosticError);
  });

  it("should store the synthesized schema in the schema cell", async () => {
    const schemaCell = new SchemaCell();
    const runtime = await createRuntime(config, { schemaCell, documents: null });

    expect(schemaCell.get()).toBe(runtime.schema);
    expect(runtime.schema.text).toBe(runtime.schemaText);
    expect(runtime.schema.entryPoints()).toEqual(["Records", "Document"]);
  });

  it("should serve records through the router under the Strata namespace", async () => {
    const runtime = await createRuntime(config, { schemaCell: new SchemaCell(), documents: null });

    expect(runtime.router.backendNames()).toEqual(["Strata"]);
    expect(runtime.router.schemaText()).toContain("  Strata__Records: [Strata__Record!]!\n");

    const vertices = await collect(runtime.router.resolveStartingVertices("Strata__Records"));
    const contexts = vertices.map((activeVertex: RoutedVertex) => ({ activeVertex }));
    const titles = await collect(runtime.router.resolveProperty(stream(contexts), "Strata__rec_task", "title"));
    const typenames = await collect(runtime.router.resolveProperty(stream(contexts), "Strata__Record", "__typename"));

    expect(titles.map(([, value]) => value)).toEqual(["Write report", "File taxes"]);
    expect(typenames.map(([, value]) => value)).toEqual(["Strata__rec_task", "Strata__rec_task"]);
  });

  it("should refuse to reinitialize a cell with a different schema", async () => {
    const schemaCell = new SchemaCell();
    await createRuntime(config, { schemaCell, documents: null });

    await fs.writeFile(path.join(tempDir, "definitions", "note.kdl"), `define since="2020-01-01" {\n    fields\n}\n`);

    await expect(createRuntime(config, { schemaCell, documents: null })).rejects.toMatchObject({
      code: ErrorCode.SCHEMA_ALREADY_INITIALIZED,
    });
  });
});
