import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { parse } from "yaml";
import {
  CONFIG_FILENAME,
  CorpusIgnores,
  DEFAULT_LIBRARY_NAME,
  DEFAULT_MODEL_NAME_TO_DOC_FILE,
  DefaultExceptions,
  DefaultPaths,
  ModelRules,
  SURFACE_FILENAME,
} from "./constants.js";
import { isFileNotFound } from "./audit/corpus.js";
import type { ModelRulesOptions } from "./audit/models.js";
import type { ExceptionList } from "./audit/types.js";

export interface AuditConfig {
  /** Surface manifest, relative to the repository root */
  library: string;
  libraryName: string;
  paths: { tests: string; docs: string };
  modulePrefix: string;
  baseClasses: string[];
  abstractMarkers: string[];
  ignoreModules: string[];
  ignoreTestFiles: string[];
  ignoreDocFiles: string[];
  ignoreNonTested: string[];
  testFilesWithNoCommonTests: string[];
  ignoreNonDocumented: string[];
  modelNameToDocFile: Record<string, string>;
  /** File the configuration was read from, null when running on defaults */
  source: string | null;
}

type ListKey =
  | "baseClasses"
  | "abstractMarkers"
  | "ignoreModules"
  | "ignoreTestFiles"
  | "ignoreDocFiles"
  | "ignoreNonTested"
  | "testFilesWithNoCommonTests"
  | "ignoreNonDocumented";

const LIST_KEYS: readonly ListKey[] = [
  "baseClasses",
  "abstractMarkers",
  "ignoreModules",
  "ignoreTestFiles",
  "ignoreDocFiles",
  "ignoreNonTested",
  "testFilesWithNoCommonTests",
  "ignoreNonDocumented",
];

function isListKey(key: string): key is ListKey {
  return LIST_KEYS.some(k => k === key);
}

export class ConfigError extends Error {
  constructor(message: string, readonly source: string) {
    super(`${source}: ${message}`);
    this.name = "ConfigError";
  }
}

export function defaultConfig(): AuditConfig {
  return {
    library: SURFACE_FILENAME,
    libraryName: DEFAULT_LIBRARY_NAME,
    paths: { tests: DefaultPaths.tests, docs: DefaultPaths.docs },
    modulePrefix: ModelRules.modulePrefix,
    baseClasses: [...ModelRules.baseClasses],
    abstractMarkers: [...ModelRules.abstractMarkers],
    ignoreModules: [...ModelRules.ignoreModules],
    ignoreTestFiles: [...CorpusIgnores.testFiles],
    ignoreDocFiles: [...CorpusIgnores.docFiles],
    ignoreNonTested: [...DefaultExceptions.ignoreNonTested],
    testFilesWithNoCommonTests: [...DefaultExceptions.testFilesWithNoCommonTests],
    ignoreNonDocumented: [...DefaultExceptions.ignoreNonDocumented],
    modelNameToDocFile: { ...DEFAULT_MODEL_NAME_TO_DOC_FILE },
    source: null,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, key: string, source: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${key} must be a non-empty string`, source);
  }
  return value;
}

function expectStringList(value: unknown, key: string, source: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${key} must be a list of strings`, source);
  }
  return value.map((item, i) => expectString(item, `${key}[${i}]`, source));
}

function expectStringMap(value: unknown, key: string, source: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be a mapping`, source);
  }
  const result: Record<string, string> = {};
  for (const [name, entry] of Object.entries(value)) {
    result[name] = expectString(entry, `${key}.${name}`, source);
  }
  return result;
}

/**
 * Parse configuration YAML over the defaults.
 *
 * List keys replace the default list; `modelNameToDocFile` is merged over
 * the default mapping; `paths` may set either directory.
 */
export function parseConfig(content: string, source: string): AuditConfig {
  let doc: unknown;
  try {
    doc = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid YAML: ${message}`, source);
  }

  const config = defaultConfig();
  config.source = source;

  if (doc === null || doc === undefined) {
    return config;
  }
  if (!isRecord(doc)) {
    throw new ConfigError("configuration must be a mapping", source);
  }

  for (const [key, value] of Object.entries(doc)) {
    if (isListKey(key)) {
      config[key] = expectStringList(value, key, source);
      continue;
    }

    switch (key) {
      case "library":
      case "libraryName":
      case "modulePrefix":
        config[key] = expectString(value, key, source);
        break;
      case "paths": {
        const paths = expectStringMap(value, key, source);
        for (const name of Object.keys(paths)) {
          if (name !== "tests" && name !== "docs") {
            throw new ConfigError(`unknown key paths.${name}`, source);
          }
        }
        config.paths = { ...config.paths, ...paths };
        break;
      }
      case "modelNameToDocFile":
        config.modelNameToDocFile = {
          ...config.modelNameToDocFile,
          ...expectStringMap(value, key, source),
        };
        break;
      default:
        throw new ConfigError(`unknown key ${key}`, source);
    }
  }

  return config;
}

/**
 * Load `modelcheck.yaml` from the repository root, or the explicit file.
 * A missing default file means defaults; a missing explicit file is an error.
 */
export async function loadConfig(root: string, configPath?: string): Promise<AuditConfig> {
  const path = configPath ?? join(root, CONFIG_FILENAME);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (!isFileNotFound(error)) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`cannot read configuration file: ${message}`, path);
    }
    if (configPath !== undefined) {
      throw new ConfigError("configuration file not found", path);
    }
    return defaultConfig();
  }

  return parseConfig(content, path);
}

export function toExceptionList(config: AuditConfig): ExceptionList {
  return {
    ignoreNonTested: new Set(config.ignoreNonTested),
    testFilesWithNoCommonTests: new Set(config.testFilesWithNoCommonTests),
    ignoreNonDocumented: new Set(config.ignoreNonDocumented),
  };
}

export function toModelRules(config: AuditConfig): ModelRulesOptions {
  return {
    modulePrefix: config.modulePrefix,
    ignoreModules: config.ignoreModules,
    baseClasses: config.baseClasses,
    abstractMarkers: config.abstractMarkers,
  };
}
