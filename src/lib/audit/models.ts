import { ModelRules } from "../constants.js";
import { isSubclassOf, type LibraryModule, type LibrarySurface } from "./surface.js";
import type { ModelClass, ModelModule } from "./types.js";

export interface ModuleRules {
  /** Module ids must start with this */
  modulePrefix: string;
  /** Module ids never audited */
  ignoreModules: readonly string[];
}

export interface ClassRules {
  baseClasses: readonly string[];
  abstractMarkers: readonly string[];
}

export type ModelRulesOptions = ModuleRules & ClassRules;

export const DEFAULT_MODEL_RULES: ModelRulesOptions = {
  modulePrefix: ModelRules.modulePrefix,
  ignoreModules: ModelRules.ignoreModules,
  baseClasses: ModelRules.baseClasses,
  abstractMarkers: ModelRules.abstractMarkers,
};

function byCodePoint(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Get the model modules exposed by the library, sorted by id.
 */
export function getModelModules(
  surface: LibrarySurface,
  rules: ModuleRules = DEFAULT_MODEL_RULES
): LibraryModule[] {
  const ignored = new Set(rules.ignoreModules);
  const modules: LibraryModule[] = [];

  for (const [name, member] of surface.members) {
    if (member.kind !== "module") continue;
    if (!name.startsWith(rules.modulePrefix) || ignored.has(name)) continue;
    modules.push(member);
  }

  return modules.sort((a, b) => byCodePoint(a.id, b.id));
}

/**
 * Get the model classes a module defines, sorted by name.
 *
 * Classes the module only re-exports belong to their defining module and are
 * skipped, as are abstract bases (names carrying an abstract marker).
 */
export function getModels(
  module: LibraryModule,
  rules: ClassRules = DEFAULT_MODEL_RULES
): ModelClass[] {
  const bases = new Set(rules.baseClasses);
  const models: ModelClass[] = [];

  for (const [name, member] of module.members) {
    if (rules.abstractMarkers.some(marker => name.includes(marker))) continue;
    if (member.kind !== "class") continue;
    if (member.definedIn !== module.id || !isSubclassOf(member, bases)) continue;
    models.push({ name, moduleId: module.id });
  }

  return models.sort((a, b) => byCodePoint(a.name, b.name));
}

/**
 * Enumerate model modules together with their model classes.
 */
export function collectModelModules(
  surface: LibrarySurface,
  rules: ModelRulesOptions = DEFAULT_MODEL_RULES
): ModelModule[] {
  return getModelModules(surface, rules).map(module => ({
    id: module.id,
    classes: getModels(module, rules),
  }));
}
