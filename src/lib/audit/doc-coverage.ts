import { DEFAULT_LIBRARY_NAME } from "../constants.js";
import type { DocDeclaration } from "./types.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Parse the content of a doc file to detect which classes it documents
 * through `.. autoclass:: <libraryName>.<ClassName>` directives.
 */
export function findDocumentedClasses(
  content: string,
  libraryName: string = DEFAULT_LIBRARY_NAME
): DocDeclaration {
  const directive = new RegExp(`autoclass:: ${escapeRegExp(libraryName)}\\.(\\S+)\\s+`, "g");
  const documented = new Set<string>();

  for (const match of content.matchAll(directive)) {
    documented.add(match[1]);
  }

  return documented;
}
