import { readFile } from "node:fs/promises";
import { parse } from "yaml";
import { isFileNotFound } from "./corpus.js";
import {
  SurfaceError,
  type LibraryClass,
  type LibraryMember,
  type LibraryModule,
  type LibrarySurface,
} from "./surface.js";

/*
 * Surface manifest format:
 *
 *   classes:                      # top-level classes owned by no module
 *     PreTrainedModel:
 *   modules:
 *     modeling_bert:
 *       classes:
 *         BertPreTrainedModel: { extends: PreTrainedModel }
 *         BertModel: { extends: BertPreTrainedModel }
 *         BertAttention: { extends: torch.nn.Module }
 *       reexports:
 *         apply_chunking: modeling_utils
 *       values: [BERT_PRETRAINED_MODEL_ARCHIVE_LIST]
 *
 * Class names are unique within a module. `extends` may name a class of the
 * same module, a top-level class, or `module.Class` for another module.
 */

interface ClassDeclaration {
  name: string;
  moduleId: string | null;
  parent: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read an optional mapping node; an empty YAML key (`null`) counts as empty.
 */
function recordAt(node: unknown, where: string, source?: string): Record<string, unknown> {
  if (node === undefined || node === null) return {};
  if (!isRecord(node)) {
    throw new SurfaceError(`${where} must be a mapping`, source);
  }
  return node;
}

function stringListAt(node: unknown, where: string, source?: string): string[] {
  if (node === undefined || node === null) return [];
  if (!Array.isArray(node) || !node.every((v): v is string => typeof v === "string")) {
    throw new SurfaceError(`${where} must be a list of names`, source);
  }
  return node;
}

/**
 * Key of a class declaration: the bare name for top-level classes,
 * `module.Class` for classes a module defines.
 */
function declarationKey(moduleId: string | null, name: string): string {
  return moduleId === null ? name : `${moduleId}.${name}`;
}

function collectDeclarations(
  node: unknown,
  moduleId: string | null,
  declarations: Map<string, ClassDeclaration>,
  source?: string
): void {
  const where = moduleId ? `modules.${moduleId}.classes` : "classes";
  for (const [name, body] of Object.entries(recordAt(node, where, source))) {
    const raw = recordAt(body, `${where}.${name}`, source).extends;
    let parent: string | null = null;
    if (typeof raw === "string") {
      parent = raw;
    } else if (raw !== undefined && raw !== null) {
      throw new SurfaceError(`${where}.${name}.extends must be a class name`, source);
    }
    declarations.set(declarationKey(moduleId, name), { name, moduleId, parent });
  }
}

/**
 * Find the declaration an `extends` value refers to, looking in the child's
 * own module, then at top level, then at an explicit `module.Class`. An
 * unqualified name found in exactly one other module resolves there; found
 * in several it is ambiguous. Null means the parent lives outside the library.
 */
function resolveParent(
  parent: string,
  child: ClassDeclaration,
  declarations: Map<string, ClassDeclaration>,
  source?: string
): ClassDeclaration | null {
  if (child.moduleId !== null) {
    const local = declarations.get(declarationKey(child.moduleId, parent));
    if (local) return local;
  }

  const direct = declarations.get(parent);
  if (direct) return direct;
  if (parent.includes(".")) return null;

  const candidates = [...declarations.values()].filter(d => d.name === parent);
  if (candidates.length > 1) {
    const owners = candidates.map(d => d.moduleId ?? "<top level>").join(", ");
    throw new SurfaceError(
      `parent ${parent} of ${declarationKey(child.moduleId, child.name)} is ambiguous (defined in ${owners}); ` +
        `qualify it as <module>.${parent}`,
      source
    );
  }
  return candidates.length === 1 ? candidates[0] : null;
}

/**
 * Walk `extends` links. A parent that is not declared ends the chain (it may
 * live outside the library); its last dotted segment is kept as its name.
 */
function resolveAncestors(
  decl: ClassDeclaration,
  declarations: Map<string, ClassDeclaration>,
  source?: string
): string[] {
  const ancestors: string[] = [];
  const seen = new Set([declarationKey(decl.moduleId, decl.name)]);
  let current = decl;

  while (current.parent !== null) {
    const parent = resolveParent(current.parent, current, declarations, source);
    if (parent === null) {
      ancestors.push(current.parent.slice(current.parent.lastIndexOf(".") + 1));
      break;
    }

    const key = declarationKey(parent.moduleId, parent.name);
    if (seen.has(key)) {
      throw new SurfaceError(`inheritance cycle through ${parent.name}`, source);
    }
    seen.add(key);
    ancestors.push(parent.name);
    current = parent;
  }

  return ancestors;
}

/**
 * Build a library surface from manifest text.
 */
export function parseSurfaceManifest(content: string, source?: string): LibrarySurface {
  let doc: unknown;
  try {
    doc = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SurfaceError(`invalid YAML: ${message}`, source);
  }

  const root = recordAt(doc, "manifest", source);
  const modules = recordAt(root.modules, "modules", source);

  const declarations = new Map<string, ClassDeclaration>();
  collectDeclarations(root.classes, null, declarations, source);
  for (const [moduleId, body] of Object.entries(modules)) {
    collectDeclarations(recordAt(body, `modules.${moduleId}`, source).classes, moduleId, declarations, source);
  }

  const classes = new Map<string, LibraryClass>();
  for (const [key, decl] of declarations) {
    classes.set(key, {
      kind: "class",
      name: decl.name,
      definedIn: decl.moduleId,
      ancestors: resolveAncestors(decl, declarations, source),
    });
  }

  const members = new Map<string, LibraryMember>();

  for (const [moduleId, rawBody] of Object.entries(modules)) {
    const body = recordAt(rawBody, `modules.${moduleId}`, source);
    const moduleMembers = new Map<string, LibraryMember>();

    for (const cls of classes.values()) {
      if (cls.definedIn === moduleId) {
        moduleMembers.set(cls.name, cls);
      }
    }

    for (const [name, from] of Object.entries(recordAt(body.reexports, `modules.${moduleId}.reexports`, source))) {
      const cls = typeof from === "string" ? classes.get(declarationKey(from, name)) : undefined;
      if (cls === undefined) {
        throw new SurfaceError(
          `modules.${moduleId}.reexports.${name} does not name a class defined in ${String(from)}`,
          source
        );
      }
      moduleMembers.set(name, cls);
    }

    for (const name of stringListAt(body.values, `modules.${moduleId}.values`, source)) {
      moduleMembers.set(name, { kind: "value" });
    }

    const module: LibraryModule = { kind: "module", id: moduleId, members: moduleMembers };
    members.set(moduleId, module);
  }

  for (const cls of classes.values()) {
    if (cls.definedIn === null) {
      members.set(cls.name, cls);
    }
  }

  return { members };
}

/**
 * Load a surface manifest from disk.
 */
export async function loadSurfaceManifest(path: string): Promise<LibrarySurface> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (isFileNotFound(error)) {
      throw new SurfaceError("library surface manifest not found", path);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SurfaceError(`cannot read library surface manifest: ${message}`, path);
  }
  return parseSurfaceManifest(content, path);
}
