import { FileConventions } from "../constants.js";
import type { NameMapping } from "./types.js";

/**
 * Resolve the model family a module belongs to.
 *
 * The family is the last `_`-separated token of the module id, except for
 * two families spelled with two tokens:
 * - modeling_transfo_xl → transfo_xl (any id ending in `xl`)
 * - modeling_xlm_roberta → xlm_roberta
 */
export function resolveFamilyName(moduleId: string): string {
  const tokens = moduleId.split("_");
  const last = tokens[tokens.length - 1];
  const previous = tokens.length > 1 ? tokens[tokens.length - 2] : undefined;

  if (last === "xl" && previous !== undefined) {
    return `${previous}_${last}`;
  }
  if (last === "roberta" && previous === "xlm") {
    return `${previous}_${last}`;
  }
  return last;
}

/**
 * Expected doc file for a module: an explicit override for its family,
 * otherwise `<family>.rst`.
 */
export function docFileForModule(moduleId: string, mapping: NameMapping): string {
  const family = resolveFamilyName(moduleId);
  return mapping[family] ?? `${family}${FileConventions.docExtension}`;
}

/**
 * Expected test file for a module (`modeling_bert` → `test_modeling_bert.py`).
 */
export function testFileForModule(moduleId: string): string {
  return `${FileConventions.testPrefix}${moduleId}${FileConventions.testSuffix}`;
}
