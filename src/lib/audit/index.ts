/**
 * Model library coverage audit.
 * Reconciles model classes against test and documentation declarations.
 */

// Data model
export type {
  ModelClass,
  ModelModule,
  TestDeclaration,
  DocDeclaration,
  ExceptionList,
  NameMapping,
  Discrepancy,
  DiscrepancyKind,
  AuditPass,
} from "./types.js";

// Library surface
export {
  SurfaceError,
  isSubclassOf,
  type LibrarySurface,
  type LibraryMember,
  type LibraryModule,
  type LibraryClass,
  type LibraryValue,
} from "./surface.js";
export { parseSurfaceManifest, loadSurfaceManifest } from "./surface-manifest.js";
export { ModelRegistry, introspectLibrary, isClass, type ClassConstructor } from "./registry.js";

// Enumeration
export {
  getModelModules,
  getModels,
  collectModelModules,
  DEFAULT_MODEL_RULES,
  type ModuleRules,
  type ClassRules,
  type ModelRulesOptions,
} from "./models.js";

// Extraction
export { findTestedModels } from "./test-coverage.js";
export { findDocumentedClasses } from "./doc-coverage.js";
export { resolveFamilyName, docFileForModule, testFileForModule } from "./naming.js";
export { loadTestCorpus, loadDocCorpus, memoryCorpus, isFileNotFound, type TextCorpus } from "./corpus.js";

// Reconciliation
export {
  checkModelsAreTested,
  checkAllModelsAreTested,
  checkModelsAreDocumented,
  checkAllModelsAreDocumented,
  checkRepoQuality,
  ALL_PASSES,
  type ReconcileOptions,
  type RepoQualityInput,
  type RepoQualityResult,
} from "./reconciler.js";

// Reporting
export { failureHeader, formatFailures, assertNoFailures, CoverageCheckError } from "./report.js";
