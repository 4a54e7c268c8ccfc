import { readFile } from "node:fs/promises";
import { join } from "node:path";
import fg from "fast-glob";
import { FileConventions } from "../constants.js";

/**
 * Flat directory of text files scanned for coverage declarations.
 */
export interface TextCorpus {
  /** Directory as shown in reports */
  readonly dir: string;
  /** File names found directly in the directory */
  readonly files: ReadonlySet<string>;
  read(file: string): Promise<string>;
}

/**
 * File name without `extension`; names that do not end with it are kept whole.
 */
function stem(file: string, extension: string): string {
  return file.endsWith(extension) ? file.slice(0, -extension.length) : file;
}

/**
 * True when a read failed because the file does not exist.
 */
export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function listFiles(root: string, dir: string): Promise<string[]> {
  const files = await fg("*", {
    cwd: join(root, dir),
    onlyFiles: true,
    deep: 1,
    dot: false,
  });
  return files.sort();
}

function diskCorpus(root: string, dir: string, files: string[]): TextCorpus {
  return {
    dir,
    files: new Set(files),
    read: file => readFile(join(root, dir, file), "utf-8"),
  };
}

/**
 * Discover model test files: `test_<modulePrefix>*` directly under `dir`,
 * minus ignored stems (e.g. the shared common tester).
 */
export async function loadTestCorpus(
  root: string,
  dir: string,
  modulePrefix: string,
  ignoreStems: readonly string[]
): Promise<TextCorpus> {
  const ignored = new Set(ignoreStems);
  const prefix = `${FileConventions.testPrefix}${modulePrefix}`;
  const files = (await listFiles(root, dir)).filter(
    file => file.startsWith(prefix) && !ignored.has(stem(file, FileConventions.testSuffix))
  );
  return diskCorpus(root, dir, files);
}

/**
 * Discover model doc pages directly under `dir`, minus ignored stems.
 */
export async function loadDocCorpus(
  root: string,
  dir: string,
  ignoreStems: readonly string[]
): Promise<TextCorpus> {
  const ignored = new Set(ignoreStems);
  const files = (await listFiles(root, dir)).filter(
    file => !ignored.has(stem(file, FileConventions.docExtension))
  );
  return diskCorpus(root, dir, files);
}

/**
 * In-memory corpus, for callers that already hold the file contents.
 */
export function memoryCorpus(dir: string, contents: Readonly<Record<string, string>>): TextCorpus {
  return {
    dir,
    files: new Set(Object.keys(contents)),
    read: async file => {
      const content = contents[file];
      if (content === undefined) {
        throw new Error(`${join(dir, file)} is not in the corpus`);
      }
      return content;
    },
  };
}
