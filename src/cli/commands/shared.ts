/**
 * Options shared by every command
 */

import * as path from "node:path";
import { loadConfig, type StrataConfig } from "../../core/config.js";

export type GlobalOptions = {
  config: string;
  rootFolder?: string;
};

export function resolveConfig(options: GlobalOptions): Promise<StrataConfig> {
  return loadConfig(path.resolve(options.config), { rootFolder: options.rootFolder });
}
