/**
 * Data Sources Module
 *
 * @module
 */

export { NodeFileSystem, createNodeFileSystem } from "./node-file-system.js";
export { PaperlessClient, createPaperlessClient, type PaperlessClientOptions } from "./paperless-client.js";
