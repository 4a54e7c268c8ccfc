import { Flags } from "@oclif/core";
import { isAbsolute, join, relative, resolve } from "node:path";
import {
  assertNoFailures,
  collectModelModules,
  CoverageCheckError,
  loadDocCorpus,
  loadSurfaceManifest,
  loadTestCorpus,
  SurfaceError,
  type AuditPass,
  type ModelModule,
  type ReconcileOptions,
  type RepoQualityResult,
  type TextCorpus,
} from "./audit/index.js";
import { ConfigError, loadConfig, toExceptionList, toModelRules, type AuditConfig } from "./config.js";
import { CONFIG_FILENAME } from "./constants.js";
import { Output } from "./output.js";

/**
 * Common flags shared by the audit commands.
 */
export const commonFlags = {
  path: Flags.string({
    char: "p",
    description: "Repository root",
    default: ".",
  }),
  config: Flags.string({
    char: "c",
    description: `Configuration file (default: <path>/${CONFIG_FILENAME})`,
  }),
  library: Flags.string({
    char: "l",
    description: "Library surface manifest (overrides the configured one)",
  }),
};

export interface AuditFlags {
  path: string;
  config?: string;
  library?: string;
}

export interface AuditWorkspace {
  root: string;
  config: AuditConfig;
  modules: ModelModule[];
  testCorpus: TextCorpus;
  docCorpus: TextCorpus;
  options: ReconcileOptions;
}

function resolveFrom(root: string, path: string): string {
  return isAbsolute(path) ? path : join(root, path);
}

/**
 * Load configuration, library surface and both corpora for a repository.
 * Files are read one after another; nothing is audited yet.
 */
export async function prepareAudit(flags: AuditFlags, out: Output): Promise<AuditWorkspace> {
  const root = resolve(flags.path);
  const config = await loadConfig(root, flags.config);
  out.info(config.source ? `Using configuration ${config.source}` : "Using default configuration");

  const libraryPath = flags.library ? resolve(flags.library) : resolveFrom(root, config.library);
  const surface = await loadSurfaceManifest(libraryPath);
  const modules = collectModelModules(surface, toModelRules(config));
  out.info(`Found ${modules.length} model module(s) in ${libraryPath}`);

  const testCorpus = await loadTestCorpus(root, config.paths.tests, config.modulePrefix, config.ignoreTestFiles);
  out.info(`Found ${testCorpus.files.size} test file(s) in ${config.paths.tests}`);
  const docCorpus = await loadDocCorpus(root, config.paths.docs, config.ignoreDocFiles);
  out.info(`Found ${docCorpus.files.size} doc file(s) in ${config.paths.docs}`);

  return {
    root,
    config,
    modules,
    testCorpus,
    docCorpus,
    options: {
      exceptions: toExceptionList(config),
      nameMapping: config.modelNameToDocFile,
      libraryName: config.libraryName,
      configFile: config.source ? relative(root, config.source) : CONFIG_FILENAME,
    },
  };
}

/**
 * Like prepareAudit, but reports configuration and manifest problems and exits.
 */
export async function prepareAuditOrExit(flags: AuditFlags, out: Output): Promise<AuditWorkspace> {
  try {
    return await prepareAudit(flags, out);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof SurfaceError) {
      out.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

const PASS_LABELS: Record<AuditPass, string> = {
  tested: "Checking all models are properly tested.",
  documented: "Checking all models are properly documented.",
};

const PASS_SUCCESS: Record<AuditPass, string> = {
  tested: "All models are tested",
  documented: "All models are documented",
};

/**
 * Print each requested pass in order. Returns true when any pass failed.
 */
export function reportPasses(result: RepoQualityResult, passes: readonly AuditPass[], out: Output): boolean {
  let failed = false;
  for (const pass of passes) {
    out.info(PASS_LABELS[pass]);
    try {
      assertNoFailures(pass, result[pass] ?? []);
      out.success(PASS_SUCCESS[pass]);
    } catch (error) {
      if (!(error instanceof CoverageCheckError)) throw error;
      failed = true;
      out.failures(error.discrepancies);
    }
  }
  return failed;
}

/**
 * Report every pass and the summary, then exit 1 if any pass failed.
 */
export function finishAudit(result: RepoQualityResult, passes: readonly AuditPass[], out: Output): void {
  const failed = reportPasses(result, passes, out);
  out.summary();
  if (failed) {
    process.exit(1);
  }
}
