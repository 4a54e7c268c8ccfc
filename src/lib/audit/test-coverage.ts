import type { TestDeclaration } from "./types.js";

// `all_model_classes = ((A, B) if cond else ())` style first, then a flat tuple
const NESTED_DECLARATION = /all_model_classes\s+=\s+\(\s*\(([^)]*)\)/;
const FLAT_DECLARATION = /all_model_classes\s+=\s+\(([^)]*)\)/;

/**
 * Parse the content of a test file to detect what's in `all_model_classes`.
 *
 * Returns null when the file has no such declaration. A declaration listing
 * nothing yields an empty array.
 */
export function findTestedModels(content: string): TestDeclaration {
  const match = NESTED_DECLARATION.exec(content) ?? FLAT_DECLARATION.exec(content);
  if (match === null) {
    return null;
  }

  const tested: string[] = [];
  for (const part of match[1].split(",")) {
    const name = part.trim();
    if (name.length > 0) {
      tested.push(name);
    }
  }
  return tested;
}
