/**
 * Data model shared by the coverage audit stages.
 */

/**
 * A concrete model class, attributed to the module that defines it.
 */
export interface ModelClass {
  /** Exported name of the class */
  name: string;
  /** Id of the defining module */
  moduleId: string;
}

/**
 * A model implementation module and the model classes it defines.
 */
export interface ModelModule {
  readonly id: string;
  readonly classes: readonly ModelClass[];
}

/**
 * Class names listed in a test file's `all_model_classes`.
 * `null` means the file has no such declaration at all, which is not the
 * same as a declaration that lists nothing.
 */
export type TestDeclaration = string[] | null;

/**
 * Class names a documentation page pulls in through `autoclass`.
 */
export type DocDeclaration = Set<string>;

/**
 * Allow-lists for coverage gaps.
 */
export interface ExceptionList {
  /** Classes exempt from the tested-coverage check */
  ignoreNonTested: ReadonlySet<string>;
  /** Test files exempt from declaring `all_model_classes` */
  testFilesWithNoCommonTests: ReadonlySet<string>;
  /** Classes exempt from the documented-coverage check */
  ignoreNonDocumented: ReadonlySet<string>;
}

/**
 * Family name → doc filename overrides.
 */
export type NameMapping = Readonly<Record<string, string>>;

export type DiscrepancyKind =
  | "missing-test-file"
  | "missing-test-declaration"
  | "untested-class"
  | "missing-doc-file"
  | "undocumented-class";

/**
 * One reported coverage gap.
 */
export interface Discrepancy {
  kind: DiscrepancyKind;
  moduleId: string;
  /** Test or doc file the gap was found against */
  file: string;
  className?: string;
  /** Self-contained description including the remedy */
  message: string;
}

export type AuditPass = "tested" | "documented";
