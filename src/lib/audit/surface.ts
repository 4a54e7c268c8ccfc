/**
 * Read-only view of a model library's exports.
 *
 * The surface stands in for runtime reflection: for every exported member it
 * records whether it is a module, a class or a plain value, and for classes
 * their ancestry and the module that defines them. It is produced either from
 * a surface manifest (see surface-manifest.ts) or from a ModelRegistry at run
 * time (see registry.ts).
 */

export interface LibraryClass {
  kind: "class";
  /** Declared name of the class (may differ from the name it is exported under) */
  name: string;
  /** Id of the module that defines the class, null when no module owns it */
  definedIn: string | null;
  /** Parent class names, nearest first; the class itself is not included */
  ancestors: readonly string[];
}

export interface LibraryModule {
  kind: "module";
  id: string;
  members: ReadonlyMap<string, LibraryMember>;
}

export interface LibraryValue {
  kind: "value";
}

export type LibraryMember = LibraryModule | LibraryClass | LibraryValue;

export interface LibrarySurface {
  /** Members of the library's top-level namespace */
  members: ReadonlyMap<string, LibraryMember>;
}

/**
 * Raised when a surface cannot be built consistently.
 */
export class SurfaceError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "SurfaceError";
  }
}

/**
 * Whether `cls` is, or descends from, one of `bases`.
 */
export function isSubclassOf(cls: LibraryClass, bases: ReadonlySet<string>): boolean {
  return bases.has(cls.name) || cls.ancestors.some(a => bases.has(a));
}
