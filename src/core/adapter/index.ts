/**
 * Adapter Module
 *
 * @module
 */

export { RecordAdapter, type RecordAdapterOptions } from "./record-adapter.js";
export {
  vertexTypename,
  asFilesystemPath,
  asFile,
  asDirectory,
  asDocument,
  asRecord,
  isVertex,
  pathVertex,
  fileVertex,
  directoryVertex,
  documentVertex,
  recordVertex,
  type Vertex,
  type VertexKind,
} from "./vertex.js";
export { emptyVertices, resolvePropertyWith, resolveNeighborsWith, resolveCoercionWith } from "./resolvers.js";
