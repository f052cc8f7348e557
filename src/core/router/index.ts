/**
 * Router Module
 *
 * @module
 */

export {
  MultiAdapterRouter,
  defineBackend,
  type BackendHandle,
  type BackendRegistration,
  type RoutedVertex,
} from "./multi-adapter-router.js";
export { PairedBatch, type InnerContext } from "./paired-batch.js";
export { NAMESPACE_SEPARATOR, namespaced, splitNamespaced, assertBackendName } from "./namespace.js";
