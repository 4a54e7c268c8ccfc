import type { LibraryClass, LibraryMember, LibrarySurface } from "./surface.js";

export type ClassConstructor = abstract new (...args: never[]) => unknown;

/**
 * Checks if a value is a class (as opposed to a plain function or object).
 */
export function isClass(value: unknown): value is ClassConstructor {
  return (
    typeof value === "function" &&
    /^class[\s{]/.test(Function.prototype.toString.call(value))
  );
}

/**
 * Records which module defines each model class.
 *
 * JavaScript classes do not know the module they were declared in, so model
 * modules register their classes as they declare them:
 *
 *   export const BertModel = registry.define("modeling_bert", class BertModel extends BertPreTrainedModel {});
 *
 * A class exported from several modules is then attributed to the one that
 * registered it.
 */
export class ModelRegistry {
  private owners = new Map<ClassConstructor, string>();

  define<T extends ClassConstructor>(moduleId: string, cls: T): T {
    const owner = this.owners.get(cls);
    if (owner !== undefined && owner !== moduleId) {
      throw new Error(`${cls.name} is already defined in ${owner}`);
    }
    this.owners.set(cls, moduleId);
    return cls;
  }

  ownerOf(cls: ClassConstructor): string | null {
    return this.owners.get(cls) ?? null;
  }
}

function describeClass(cls: ClassConstructor, registry: ModelRegistry): LibraryClass {
  const ancestors: string[] = [];
  let parent: unknown = Object.getPrototypeOf(cls);
  while (isClass(parent)) {
    ancestors.push(parent.name);
    parent = Object.getPrototypeOf(parent);
  }
  return { kind: "class", name: cls.name, definedIn: registry.ownerOf(cls), ancestors };
}

function describeMember(value: unknown, registry: ModelRegistry): LibraryMember {
  return isClass(value) ? describeClass(value, registry) : { kind: "value" };
}

/**
 * Build a library surface from a loaded namespace object.
 *
 * Top-level members that are plain objects are treated as module namespaces
 * (module id → its exports); classes are described through their prototype
 * chain and the registry; everything else is a value.
 */
export function introspectLibrary(
  namespace: Readonly<Record<string, unknown>>,
  registry: ModelRegistry
): LibrarySurface {
  const members = new Map<string, LibraryMember>();

  for (const [name, value] of Object.entries(namespace)) {
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      const moduleMembers = new Map<string, LibraryMember>();
      for (const [exportName, exported] of Object.entries(value)) {
        moduleMembers.set(exportName, describeMember(exported, registry));
      }
      members.set(name, { kind: "module", id: name, members: moduleMembers });
    } else {
      members.set(name, describeMember(value, registry));
    }
  }

  return { members };
}
