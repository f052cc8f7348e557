/**
 * Configuration
 *
 * Loads `strata.kdl`:
 *
 * ```kdl
 * root_folder "/home/me/records"
 * definitions_folder "definitions"
 * paperless {
 *     url "https://paperless.example"
 *     token "…"
 * }
 * ```
 *
 * Nodes are read into a plain object (a node's first argument, or its
 * children as a nested object) and validated with zod.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigurationError, DiagnosticError } from "./errors.js";
import { parseKdlDocument, type DocNode, type KdlPrimitive } from "./documents/index.js";
import {
  StrataConfigSchema,
  createLogger,
  fileExists,
  formatZodError,
  getDefinitionsDir,
  readFileWithEncoding,
  safeValidate,
} from "../utils/index.js";

const logger = createLogger("config");

export const PAPERLESS_TOKEN_ENV = "STRATA_PAPERLESS_TOKEN";

export interface PaperlessConfig {
  url: string;
  token: string;
}

export interface StrataConfig {
  /** Absolute path of the file this was read from, null when built in code */
  configPath: string | null;
  rootFolder: string;
  definitionsFolder: string;
  paperless: PaperlessConfig | null;
}

export interface LoadConfigOptions {
  /** Replaces `root_folder` */
  rootFolder?: string;
  env?: NodeJS.ProcessEnv;
}

interface RawObject {
  [key: string]: RawValue;
}
type RawValue = KdlPrimitive | undefined | RawObject;

function nodesToObject(nodes: readonly DocNode[]): RawObject {
  const result: RawObject = {};
  for (const node of nodes) {
    // Later nodes with the same name win
    result[node.name] = node.children ? nodesToObject(node.children) : node.args[0]?.value;
  }
  return result;
}

/**
 * Reads configuration from KDL text.
 *
 * @param configPath - used to resolve a relative `root_folder` and in errors
 * @throws DiagnosticError when the text is not KDL
 * @throws ConfigurationError when the content does not validate
 */
export function parseConfig(text: string, configPath: string, options: LoadConfigOptions = {}): StrataConfig {
  const env = options.env ?? process.env;

  let nodes: DocNode[];
  try {
    nodes = parseKdlDocument(text);
  } catch (error) {
    if (error instanceof DiagnosticError) {
      throw error.withSource({ name: configPath, text });
    }
    throw error;
  }

  const raw = nodesToObject(nodes);
  if (options.rootFolder !== undefined) {
    // An override comes from the command line, so it is relative to the working directory
    raw["root_folder"] = path.resolve(options.rootFolder);
  }

  const validated = safeValidate(StrataConfigSchema, raw);
  if (!validated.success) {
    const issues = formatZodError(validated.error);
    throw new ConfigurationError(`Invalid configuration in ${configPath}: ${issues.join("; ")}`, {
      configPath,
      issues,
    });
  }

  const config = validated.data;
  const baseDir = path.dirname(path.resolve(configPath));
  const rootFolder = path.resolve(baseDir, config.root_folder);

  let paperless: PaperlessConfig | null = null;
  if (config.paperless) {
    const token = env[PAPERLESS_TOKEN_ENV] || config.paperless.token;
    if (!token) {
      throw new ConfigurationError(
        `The paperless block needs a token, or set ${PAPERLESS_TOKEN_ENV}`,
        { configPath }
      );
    }
    paperless = { url: config.paperless.url, token };
  }

  return {
    configPath: path.resolve(configPath),
    rootFolder,
    definitionsFolder: getDefinitionsDir(rootFolder, config.definitions_folder),
    paperless,
  };
}

/**
 * Loads the configuration file.
 *
 * @throws ConfigurationError when the file does not exist
 */
export async function loadConfig(configPath: string, options: LoadConfigOptions = {}): Promise<StrataConfig> {
  if (!(await fileExists(configPath))) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`, { configPath });
  }

  const text = await readFileWithEncoding(configPath);
  const config = parseConfig(text, configPath, options);
  logger.debug(
    { configPath, rootFolder: config.rootFolder, paperless: config.paperless !== null },
    "Loaded configuration"
  );
  return config;
}
