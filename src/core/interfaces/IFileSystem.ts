/**
 * IFileSystem - Filesystem probes used by path vertices
 *
 * Every call goes to the filesystem; nothing is cached between calls.
 *
 * @module
 */

import type { Result } from "../../types/result.js";

export interface IFileSystem {
  /**
   * Whether anything exists at the path right now
   */
  exists(path: string): Promise<boolean>;

  /**
   * Full paths of the direct entries of a directory, in enumeration order
   */
  listChildren(path: string): Promise<Result<string[], Error>>;

  /**
   * Final path segment, or null when the path has none (`/`)
   */
  basename(path: string): string | null;

  /**
   * File name suffix without the dot, or null when there is none
   */
  extension(path: string): string | null;
}
