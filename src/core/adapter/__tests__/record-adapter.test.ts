import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";
import { RecordAdapter } from "../record-adapter.js";
import { directoryVertex, documentVertex, fileVertex, pathVertex, recordVertex, type Vertex } from "../vertex.js";
import { DefinitionStore, parseDefinitionDocument } from "../../definitions/index.js";
import { parseRecordDocument, type KindRecord } from "../../records/index.js";
import { QuerySchema, renderSchema, synthesizeSchema } from "../../schema/index.js";
import { NodeFileSystem } from "../../sources/index.js";
import { ConfigurationError, ContractViolationError } from "../../errors.js";
import { err, ok, type Result } from "../../../types/result.js";
import type { ExternalDocument, IDocumentService, IFileSystem } from "../../interfaces/index.js";

// =============================================================================
// Fixtures
// =============================================================================

const store = DefinitionStore.fromDefinitions([
  [
    "task",
    parseDefinitionDocument(
      "task",
      `define since="2020-01-01" {
    fields {
        title is="string"
        status {
            oneOf "open" "done"
        }
        attachment is="path"
    }
}
`
    ),
  ],
  [
    "note",
    parseDefinitionDocument(
      "note",
      `define since="2020-01-01" {
    fields {
        body is="string"
    }
}
`
    ),
  ],
]);

const records: KindRecord[] = parseRecordDocument(
  `task "2021-06-01" {
    title "Write report"
    status "open"
    attachment "/scans/report.pdf"
}
note "2021-06-02T08:30:00Z" {
    body "Call back"
}
task "2022-01-01" {
    title "File taxes"
}
`,
  store
);

const schema = QuerySchema.parse(renderSchema(synthesizeSchema(store)));

class MemoryFileSystem implements IFileSystem {
  constructor(private readonly directories: Map<string, string[]>) {}

  async exists(target: string): Promise<boolean> {
    return this.directories.has(target) || [...this.directories.values()].some((entries) => entries.includes(target));
  }

  async listChildren(target: string): Promise<Result<string[], Error>> {
    const entries = this.directories.get(target);
    return entries ? ok(entries) : err(new Error(`ENOENT: ${target}`));
  }

  basename(target: string): string | null {
    return target.split("/").pop() || null;
  }

  extension(target: string): string | null {
    const name = this.basename(target) ?? "";
    const dot = name.lastIndexOf(".");
    return dot > 0 ? name.slice(dot + 1) : null;
  }
}

const RECEIPT: ExternalDocument = {
  id: 7,
  title: "Receipt",
  content: "Total 12.00",
  created: "2021-06-01T00:00:00Z",
  added: null,
  archiveSerialNumber: 42,
};

class FakeDocuments implements IDocumentService {
  readonly requested: number[] = [];

  async fetch(id: number): Promise<ExternalDocument> {
    this.requested.push(id);
    return { ...RECEIPT, id };
  }
}

interface TestContext {
  id: number;
  activeVertex: Vertex | null;
}

async function* stream<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}

async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) result.push(item);
  return result;
}

function contexts(...vertices: Array<Vertex | null>): TestContext[] {
  return vertices.map((activeVertex, id) => ({ id, activeVertex }));
}

function requireRecord(index: number): KindRecord {
  const record = records[index];
  if (!record) throw new Error(`fixture record ${index} is missing`);
  return record;
}

function createAdapter(options: { fileSystem?: IFileSystem; documents?: IDocumentService | null } = {}): RecordAdapter {
  return new RecordAdapter({
    store,
    records,
    schema,
    fileSystem: options.fileSystem ?? new MemoryFileSystem(new Map([["/data", ["/data/a.txt", "/data/b"]]])),
    documents: options.documents,
  });
}

// =============================================================================
// Tests
// =============================================================================

describe("RecordAdapter", () => {
  describe("resolveStartingVertices", () => {
    it("should yield every loaded record in load order", async () => {
      const vertices = await collect(createAdapter().resolveStartingVertices("Records"));

      expect(vertices.map((vertex) => (vertex.kind === "Record" ? vertex.record.kind : vertex.kind))).toEqual([
        "task",
        "note",
        "task",
      ]);
    });

    it("should fetch the requested document lazily", async () => {
      const documents = new FakeDocuments();
      const vertices = createAdapter({ documents }).resolveStartingVertices("Document", { id: 7 });

      expect(documents.requested).toEqual([]);
      expect(await collect(vertices)).toEqual([documentVertex(RECEIPT)]);
      expect(documents.requested).toEqual([7]);
    });

    it("should require a document service for the Document entry point", () => {
      expect(() => createAdapter({ documents: null }).resolveStartingVertices("Document", { id: 7 })).toThrow(
        ConfigurationError
      );
    });

    it("should require an integer id", () => {
      const adapter = createAdapter({ documents: new FakeDocuments() });
      expect(() => adapter.resolveStartingVertices("Document", { id: "7" })).toThrow(ContractViolationError);
      expect(() => adapter.resolveStartingVertices("Document", { id: 7.5 })).toThrow(ContractViolationError);
      expect(() => adapter.resolveStartingVertices("Document")).toThrow(ContractViolationError);
    });

    it("should reject unknown entry points", () => {
      expect(() => createAdapter().resolveStartingVertices("Tasks")).toThrow(ContractViolationError);
    });
  });

  describe("resolveProperty", () => {
    it("should read record fields, timestamps and kinds", async () => {
      const adapter = createAdapter();
      const batch = contexts(recordVertex(requireRecord(0)), recordVertex(requireRecord(2)));

      const titles = await collect(adapter.resolveProperty(stream(batch), "rec_task", "title"));
      const times = await collect(adapter.resolveProperty(stream(batch), "Record", "_at"));
      const kinds = await collect(adapter.resolveProperty(stream(batch), "Record", "_kind"));

      expect(titles.map(([, value]) => value)).toEqual(["Write report", "File taxes"]);
      expect(times.map(([, value]) => value)).toEqual(["2021-06-01T00:00:00Z", "2022-01-01T00:00:00Z"]);
      expect(kinds.map(([, value]) => value)).toEqual(["task", "task"]);
    });

    it("should hand back the same context objects in input order", async () => {
      const batch = contexts(recordVertex(requireRecord(2)), null, recordVertex(requireRecord(0)));
      const outcomes = await collect(createAdapter().resolveProperty(stream(batch), "rec_task", "title"));

      expect(outcomes).toHaveLength(3);
      outcomes.forEach(([context], index) => expect(context).toBe(batch[index]));
      expect(outcomes.map(([, value]) => value)).toEqual(["File taxes", null, "Write report"]);
    });

    it("should report each vertex's concrete type name", async () => {
      const batch = contexts(
        recordVertex(requireRecord(1)),
        pathVertex("/data"),
        fileVertex("/data/a.txt"),
        directoryVertex("/data"),
        documentVertex(RECEIPT)
      );
      const outcomes = await collect(createAdapter().resolveProperty(stream(batch), "Record", "__typename"));

      expect(outcomes.map(([, value]) => value)).toEqual(["rec_note", "Path", "File", "Directory", "PaperlessDocument"]);
    });

    it("should probe the filesystem for path properties", async () => {
      const adapter = createAdapter();
      const batch = contexts(fileVertex("/data/a.txt"), fileVertex("/data/missing.txt"));

      const exists = await collect(adapter.resolveProperty(stream(batch), "File", "exists"));
      const basenames = await collect(adapter.resolveProperty(stream(batch), "File", "basename"));
      const extensions = await collect(adapter.resolveProperty(stream(batch), "File", "extension"));

      expect(exists.map(([, value]) => value)).toEqual([true, false]);
      expect(basenames.map(([, value]) => value)).toEqual(["a.txt", "missing.txt"]);
      expect(extensions.map(([, value]) => value)).toEqual(["txt", "txt"]);
    });

    it("should read path properties of any filesystem vertex through the Path interface", async () => {
      const batch = contexts(pathVertex("/data/b"), directoryVertex("/data"), fileVertex("/data/a.txt"));
      const outcomes = await collect(createAdapter().resolveProperty(stream(batch), "Path", "path"));

      expect(outcomes.map(([, value]) => value)).toEqual(["/data/b", "/data", "/data/a.txt"]);
    });

    it("should read document properties", async () => {
      const adapter = createAdapter();
      const batch = contexts(documentVertex(RECEIPT));

      const serial = await collect(adapter.resolveProperty(stream(batch), "PaperlessDocument", "archive_serial_number"));
      const added = await collect(adapter.resolveProperty(stream(batch), "PaperlessDocument", "added"));

      expect(serial.map(([, value]) => value)).toEqual([42]);
      expect(added.map(([, value]) => value)).toEqual([null]);
    });

    it("should fail when a record lacks a declared field", async () => {
      const batch = contexts(recordVertex(requireRecord(2)));
      await expect(collect(createAdapter().resolveProperty(stream(batch), "rec_task", "status"))).rejects.toThrow(
        ContractViolationError
      );
    });

    it("should reject undeclared properties before iterating", () => {
      const adapter = createAdapter();
      const batch = stream(contexts(recordVertex(requireRecord(0))));

      expect(() => adapter.resolveProperty(batch, "rec_task", "priority")).toThrow(ContractViolationError);
      expect(() => adapter.resolveProperty(batch, "rec_task", "attachment")).toThrow(ContractViolationError);
      expect(() => adapter.resolveProperty(batch, "Path", "extension")).toThrow(ContractViolationError);
      expect(() => adapter.resolveProperty(batch, "rec_missing", "title")).toThrow(ContractViolationError);
    });

    it("should fail when a vertex does not match the requested type", async () => {
      const batch = contexts(pathVertex("/data"));
      await expect(collect(createAdapter().resolveProperty(stream(batch), "rec_task", "title"))).rejects.toThrow(
        'Vertex of type "Path" was resolved as "rec_task"'
      );
    });

    it("should resolve every declared property of every type", async () => {
      const adapter = createAdapter({ documents: new FakeDocuments() });
      const samples: Record<string, Vertex> = {
        Directory: directoryVertex("/data"),
        File: fileVertex("/data/a.txt"),
        PaperlessDocument: documentVertex(RECEIPT),
        Path: pathVertex("/data/b"),
        Record: recordVertex(requireRecord(1)),
        rec_note: recordVertex(requireRecord(1)),
        rec_task: recordVertex(requireRecord(0)),
      };

      expect(schema.vertexTypes()).toEqual(Object.keys(samples));

      for (const typeName of schema.vertexTypes()) {
        const vertex = samples[typeName];
        if (!vertex) throw new Error(`no sample vertex for ${typeName}`);
        const { properties, edges } = schema.vertexFields(typeName);

        for (const property of properties) {
          const outcomes = await collect(adapter.resolveProperty(stream(contexts(vertex)), typeName, property));
          expect(outcomes).toHaveLength(1);
        }
        for (const edge of edges) {
          const outcomes = await collect(adapter.resolveNeighbors(stream(contexts(vertex)), typeName, edge));
          expect(outcomes).toHaveLength(1);
        }
      }
    });
  });

  describe("resolveNeighbors", () => {
    it("should list directory entries as Path vertices", async () => {
      const batch = contexts(directoryVertex("/data"));
      const [outcome] = await collect(createAdapter().resolveNeighbors(stream(batch), "Directory", "Children"));

      expect(outcome).toBeDefined();
      if (outcome) {
        expect(await collect(outcome[1])).toEqual([pathVertex("/data/a.txt"), pathVertex("/data/b")]);
      }
    });

    it("should yield no children for a directory that cannot be listed", async () => {
      const batch = contexts(directoryVertex("/nowhere"));
      const [outcome] = await collect(createAdapter().resolveNeighbors(stream(batch), "Directory", "Children"));

      expect(outcome && (await collect(outcome[1]))).toEqual([]);
    });

    it("should follow path fields to one Path vertex", async () => {
      const batch = contexts(recordVertex(requireRecord(0)), recordVertex(requireRecord(2)), null);
      const outcomes = await collect(createAdapter().resolveNeighbors(stream(batch), "rec_task", "attachment"));
      const neighbors = await Promise.all(outcomes.map(([, vertices]) => collect(vertices)));

      expect(neighbors).toEqual([[pathVertex("/scans/report.pdf")], [], []]);
    });

    it("should reject edges the type does not declare", () => {
      const adapter = createAdapter();
      const batch = stream(contexts(recordVertex(requireRecord(0))));

      expect(() => adapter.resolveNeighbors(batch, "rec_task", "title")).toThrow(
        'Only path fields can be used as edges, "title" is not one'
      );
      expect(() => adapter.resolveNeighbors(batch, "rec_task", "Children")).toThrow(ContractViolationError);
      expect(() => adapter.resolveNeighbors(batch, "File", "Children")).toThrow(ContractViolationError);
      expect(() => adapter.resolveNeighbors(batch, "PaperlessDocument", "Children")).toThrow(ContractViolationError);
    });
  });

  describe("resolveCoercion", () => {
    it("should coerce every vertex to its own type", async () => {
      const adapter = createAdapter();
      const samples: Array<[Vertex, string]> = [
        [recordVertex(requireRecord(0)), "rec_task"],
        [recordVertex(requireRecord(1)), "rec_note"],
        [pathVertex("/data"), "Path"],
        [fileVertex("/data/a.txt"), "File"],
        [directoryVertex("/data"), "Directory"],
        [documentVertex(RECEIPT), "PaperlessDocument"],
      ];

      for (const [vertex, typeName] of samples) {
        const [outcome] = await collect(adapter.resolveCoercion(stream(contexts(vertex)), typeName, typeName));
        expect(outcome?.[1]).toBe(true);
      }
    });

    it("should follow the declared subtype relation", async () => {
      const adapter = createAdapter();
      const batch = contexts(
        recordVertex(requireRecord(0)),
        recordVertex(requireRecord(1)),
        fileVertex("/data/a.txt"),
        null
      );

      const asTask = await collect(adapter.resolveCoercion(stream(batch), "Record", "rec_task"));
      const asRecord = await collect(adapter.resolveCoercion(stream(batch), "Record", "Record"));
      const asPath = await collect(adapter.resolveCoercion(stream(batch), "Path", "Path"));

      expect(asTask.map(([, value]) => value)).toEqual([true, false, false, false]);
      expect(asRecord.map(([, value]) => value)).toEqual([true, true, false, false]);
      expect(asPath.map(([, value]) => value)).toEqual([false, false, true, false]);
    });

    it("should not narrow a generic Path to a File or Directory", async () => {
      const batch = contexts(pathVertex("/data/a.txt"));
      const outcomes = await collect(createAdapter().resolveCoercion(stream(batch), "Path", "File"));

      expect(outcomes.map(([, value]) => value)).toEqual([false]);
    });

    it("should reject unknown target types", () => {
      const batch = stream(contexts(pathVertex("/data")));
      expect(() => createAdapter().resolveCoercion(batch, "Path", "Symlink")).toThrow(ContractViolationError);
    });
  });

  describe("with the Node file system", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "adapter-test-"));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("should yield one Path vertex per directory entry, whatever its type", async () => {
      await fs.writeFile(path.join(tempDir, "a.txt"), "a");
      await fs.mkdir(path.join(tempDir, "b"));

      const adapter = createAdapter({ fileSystem: new NodeFileSystem() });
      const [outcome] = await collect(adapter.resolveNeighbors(stream(contexts(directoryVertex(tempDir))), "Directory", "Children"));
      const children = outcome ? await collect(outcome[1]) : [];

      expect(children).toHaveLength(2);
      expect(children.map((child) => (child.kind === "Path" ? child.path : "")).sort()).toEqual([
        path.join(tempDir, "a.txt"),
        path.join(tempDir, "b"),
      ]);
    });

    it("should yield no children for a missing directory", async () => {
      const adapter = createAdapter({ fileSystem: new NodeFileSystem() });
      const missing = path.join(tempDir, "missing");
      const [outcome] = await collect(adapter.resolveNeighbors(stream(contexts(directoryVertex(missing))), "Directory", "Children"));

      expect(outcome && (await collect(outcome[1]))).toEqual([]);
    });
  });
});
