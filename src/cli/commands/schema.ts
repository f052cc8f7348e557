/**
 * schema command - Print the synthesized schema
 */

import { DefinitionStore } from "../../core/definitions/index.js";
import { renderNamespacedSchema, renderSchema, synthesizeSchema } from "../../core/schema/index.js";
import { NAMESPACE_SEPARATOR } from "../../core/router/index.js";
import { BACKEND_NAME } from "../../core/runtime.js";
import { resolveConfig, type GlobalOptions } from "./shared.js";

export interface SchemaOptions {
  /** Print the schema as the query engine sees it through the router */
  namespaced?: boolean;
}

export async function schemaCommand(globals: GlobalOptions, options: SchemaOptions): Promise<void> {
  const config = await resolveConfig(globals);
  const store = await DefinitionStore.load(config.definitionsFolder);
  const description = synthesizeSchema(store);

  const text = options.namespaced
    ? renderNamespacedSchema([{ prefix: `${BACKEND_NAME}${NAMESPACE_SEPARATOR}`, description }])
    : renderSchema(description);

  process.stdout.write(text);
}
