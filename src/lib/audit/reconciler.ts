import { join } from "node:path";
import { CONFIG_FILENAME, DEFAULT_LIBRARY_NAME } from "../constants.js";
import type { TextCorpus } from "./corpus.js";
import { findDocumentedClasses } from "./doc-coverage.js";
import { docFileForModule, testFileForModule } from "./naming.js";
import { findTestedModels } from "./test-coverage.js";
import type { AuditPass, Discrepancy, ExceptionList, ModelModule, NameMapping } from "./types.js";

export interface ReconcileOptions {
  exceptions: ExceptionList;
  /** Family → doc file overrides */
  nameMapping: NameMapping;
  /** Prefix of the `autoclass` directive */
  libraryName?: string;
  /** Where maintainers edit the exception lists, quoted in remedies */
  configFile?: string;
}

/**
 * Check the model classes defined in `module` are tested in `testFile`.
 * The file is assumed to be in the corpus.
 */
export async function checkModelsAreTested(
  module: ModelModule,
  testFile: string,
  corpus: TextCorpus,
  options: ReconcileOptions
): Promise<Discrepancy[]> {
  const configFile = options.configFile ?? CONFIG_FILENAME;
  const tested = findTestedModels(await corpus.read(testFile));

  if (tested === null) {
    if (options.exceptions.testFilesWithNoCommonTests.has(testFile)) {
      return [];
    }
    return [
      {
        kind: "missing-test-declaration",
        moduleId: module.id,
        file: testFile,
        message:
          `${testFile} should define \`all_model_classes\` to apply common tests to the models it tests. ` +
          `If this is intentional, add the test filename to \`testFilesWithNoCommonTests\` in ${configFile}.`,
      },
    ];
  }

  const declared = new Set(tested);
  const failures: Discrepancy[] = [];
  for (const model of module.classes) {
    if (declared.has(model.name) || options.exceptions.ignoreNonTested.has(model.name)) continue;
    failures.push({
      kind: "untested-class",
      moduleId: module.id,
      file: testFile,
      className: model.name,
      message:
        `${model.name} is defined in ${module.id} but is not tested in ${join(corpus.dir, testFile)}. ` +
        "Add it to the all_model_classes in that file. " +
        `If common tests should not be applied to that model, add its name to \`ignoreNonTested\` in ${configFile}.`,
    });
  }
  return failures;
}

/**
 * Tested-coverage pass over every model module.
 */
export async function checkAllModelsAreTested(
  modules: readonly ModelModule[],
  corpus: TextCorpus,
  options: ReconcileOptions
): Promise<Discrepancy[]> {
  const failures: Discrepancy[] = [];

  for (const module of modules) {
    const testFile = testFileForModule(module.id);
    if (!corpus.files.has(testFile)) {
      failures.push({
        kind: "missing-test-file",
        moduleId: module.id,
        file: testFile,
        message: `${module.id} does not have its corresponding test file ${testFile}.`,
      });
      continue;
    }
    failures.push(...(await checkModelsAreTested(module, testFile, corpus, options)));
  }

  return failures;
}

/**
 * Check the model classes defined in `module` are documented in `docFile`.
 * The file is assumed to be in the corpus.
 */
export async function checkModelsAreDocumented(
  module: ModelModule,
  docFile: string,
  corpus: TextCorpus,
  options: ReconcileOptions
): Promise<Discrepancy[]> {
  const configFile = options.configFile ?? CONFIG_FILENAME;
  const documented = findDocumentedClasses(
    await corpus.read(docFile),
    options.libraryName ?? DEFAULT_LIBRARY_NAME
  );

  const failures: Discrepancy[] = [];
  for (const model of module.classes) {
    if (documented.has(model.name) || options.exceptions.ignoreNonDocumented.has(model.name)) continue;
    failures.push({
      kind: "undocumented-class",
      moduleId: module.id,
      file: docFile,
      className: model.name,
      message:
        `${model.name} is defined in ${module.id} but is not documented in ${join(corpus.dir, docFile)}. ` +
        "Add it to that file. " +
        `If this model should not be documented, add its name to \`ignoreNonDocumented\` in ${configFile}.`,
    });
  }
  return failures;
}

/**
 * Documented-coverage pass over every model module.
 */
export async function checkAllModelsAreDocumented(
  modules: readonly ModelModule[],
  corpus: TextCorpus,
  options: ReconcileOptions
): Promise<Discrepancy[]> {
  const configFile = options.configFile ?? CONFIG_FILENAME;
  const failures: Discrepancy[] = [];

  for (const module of modules) {
    const docFile = docFileForModule(module.id, options.nameMapping);
    if (!corpus.files.has(docFile)) {
      failures.push({
        kind: "missing-doc-file",
        moduleId: module.id,
        file: docFile,
        message:
          `${module.id} does not have its corresponding doc file ${docFile}. ` +
          `If the doc file exists but isn't named ${docFile}, update \`modelNameToDocFile\` in ${configFile}.`,
      });
      continue;
    }
    failures.push(...(await checkModelsAreDocumented(module, docFile, corpus, options)));
  }

  return failures;
}

export const ALL_PASSES: readonly AuditPass[] = ["tested", "documented"];

export interface RepoQualityInput {
  modules: readonly ModelModule[];
  testCorpus: TextCorpus;
  docCorpus: TextCorpus;
  options: ReconcileOptions;
  /** Passes to run, in order (default: both) */
  passes?: readonly AuditPass[];
}

export type RepoQualityResult = Partial<Record<AuditPass, Discrepancy[]>>;

/**
 * Run the requested passes. Every pass runs to completion regardless of
 * what the previous one found.
 */
export async function checkRepoQuality(input: RepoQualityInput): Promise<RepoQualityResult> {
  const result: RepoQualityResult = {};
  for (const pass of input.passes ?? ALL_PASSES) {
    result[pass] =
      pass === "tested"
        ? await checkAllModelsAreTested(input.modules, input.testCorpus, input.options)
        : await checkAllModelsAreDocumented(input.modules, input.docCorpus, input.options);
  }
  return result;
}
