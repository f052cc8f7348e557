import { describe, it, expect } from "vitest";
import { synthesizeSchema, kindTypeName, kindFromTypeName } from "../schema-synthesizer.js";
import { renderNamespacedSchema, renderSchema } from "../schema-renderer.js";
import { DefinitionStore, parseDefinitionDocument } from "../../definitions/index.js";

const TASK = `define since="2020-01-01" {
    fields {
        title is="string"
        status {
            oneOf "open" "done"
        }
        attachment is="path"
    }
}

define since="2023-01-01" {
    fields {
        title is="string"
        priority is="string"
    }
}
`;

function createStore(): DefinitionStore {
  return DefinitionStore.fromDefinitions([["task", parseDefinitionDocument("task", TASK)]]);
}

describe("synthesizeSchema", () => {
  it("should shape each kind type by its first version", () => {
    const text = renderSchema(synthesizeSchema(createStore()));

    expect(text).toContain(
      [
        "type rec_task implements Record {",
        "  _at: String!",
        "  _kind: String!",
        "  title: String!",
        "  status: String!",
        "  attachment: Path",
        "}",
      ].join("\n")
    );
    expect(text).not.toContain("priority");
  });

  it("should expose the entry points on the root type", () => {
    const text = renderSchema(synthesizeSchema(createStore()));

    expect(text).toContain(
      ["type RootSchemaQuery {", "  Records: [Record!]!", "  Document(id: Int!): PaperlessDocument", "}"].join("\n")
    );
    expect(text).toContain("schema {\n  query: RootSchemaQuery\n}");
  });

  it("should render the built-in types", () => {
    const text = renderSchema(synthesizeSchema(createStore()));

    expect(text).toContain("interface Record {\n  _at: String!\n  _kind: String!\n}");
    expect(text).toContain("interface Path {\n  path: String!\n  exists: Boolean!\n  basename: String\n}");
    expect(text).toContain(
      "type File implements Path {\n  path: String!\n  exists: Boolean!\n  basename: String\n  extension: String\n}"
    );
    expect(text).toContain(
      "type Directory implements Path {\n  path: String!\n  exists: Boolean!\n  basename: String\n  Children: [Path!]\n}"
    );
  });

  it("should start with the directive vocabulary", () => {
    const text = renderSchema(synthesizeSchema(createStore()));
    expect(text.startsWith("directive @filter(op: String!, value: [String!]) repeatable on FIELD | INLINE_FRAGMENT\n")).toBe(
      true
    );
    expect(text.endsWith("}\n")).toBe(true);
  });

  it("should give identical text for equal stores", () => {
    expect(renderSchema(synthesizeSchema(createStore()))).toBe(renderSchema(synthesizeSchema(createStore())));
  });

  it("should order types by name", () => {
    const text = renderSchema(synthesizeSchema(createStore()));
    const order = ["type Directory", "type File", "type PaperlessDocument", "interface Path", "interface Record", "type rec_task"];
    const positions = order.map((header) => text.indexOf(`${header} `));

    expect(positions.every((position) => position >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("should map kind names to type names and back", () => {
    expect(kindTypeName("task")).toBe("rec_task");
    expect(kindFromTypeName("rec_task")).toBe("task");
    expect(kindFromTypeName("File")).toBeNull();
  });
});

describe("renderNamespacedSchema", () => {
  it("should prefix entry points, types and type references", () => {
    const text = renderNamespacedSchema([{ prefix: "Strata__", description: synthesizeSchema(createStore()) }]);

    expect(text).toContain(
      [
        "type RootSchemaQuery {",
        "  Strata__Records: [Strata__Record!]!",
        "  Strata__Document(id: Int!): Strata__PaperlessDocument",
        "}",
      ].join("\n")
    );
    expect(text).toContain("type Strata__rec_task implements Strata__Record {");
    expect(text).toContain("  attachment: Strata__Path\n");
    expect(text).toContain("  Children: [Strata__Path!]\n");
  });

  it("should merge several backends under one root type", () => {
    const description = synthesizeSchema(createStore());
    const text = renderNamespacedSchema([
      { prefix: "A__", description },
      { prefix: "B__", description },
    ]);

    expect(text.match(/type RootSchemaQuery/g)).toHaveLength(1);
    expect(text).toContain("  A__Records: [A__Record!]!\n");
    expect(text).toContain("  B__Records: [B__Record!]!\n");
  });
});
