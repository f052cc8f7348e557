/**
 * Node File System
 *
 * IFileSystem over `node:fs/promises`.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fromPromise, map, type Result } from "../../types/result.js";
import type { IFileSystem } from "../interfaces/index.js";

export class NodeFileSystem implements IFileSystem {
  async exists(target: string): Promise<boolean> {
    try {
      await fs.access(target);
      return true;
    } catch {
      return false;
    }
  }

  async listChildren(target: string): Promise<Result<string[], Error>> {
    const entries = await fromPromise(fs.readdir(target));
    return map(entries, (names) => names.map((name) => path.join(target, name)));
  }

  basename(target: string): string | null {
    const name = path.basename(target);
    return name === "" ? null : name;
  }

  extension(target: string): string | null {
    // path.extname is empty for dotfiles such as `.bashrc`
    const extension = path.extname(target);
    return extension.length > 1 ? extension.slice(1) : null;
  }
}

export function createNodeFileSystem(): NodeFileSystem {
  return new NodeFileSystem();
}
