/**
 * Module descriptors and the catalog of loaded modules
 */

import type { TypeInfo } from "./type-info.js";

export type ModuleDefinition = {
  readonly name: string;
  readonly location?: string;
  readonly types: readonly TypeInfo[];
};

/**
 * A named group of type descriptors, looked up by full type name.
 */
export class ModuleInfo {
  readonly name: string;
  readonly location: string;
  private readonly types = new Map<string, TypeInfo>();

  constructor(definition: ModuleDefinition) {
    this.name = definition.name;
    this.location = definition.location ?? definition.name;

    for (const type of definition.types) {
      if (this.types.has(type.fullName)) {
        throw new Error(
          `Module '${this.name}' defines type '${type.fullName}' twice.`
        );
      }
      this.types.set(type.fullName, type);
    }
  }

  getType(fullName: string): TypeInfo | undefined {
    return this.types.get(fullName);
  }

  getTypes(): readonly TypeInfo[] {
    return Array.from(this.types.values());
  }

  toString(): string {
    return this.name;
  }
}

export const defineModule = (definition: ModuleDefinition): ModuleInfo =>
  new ModuleInfo(definition);

/**
 * The set of modules a caller considers loaded.
 *
 * Whole-process type searches take `snapshot()` instead of reading this
 * catalog directly.
 */
export class ModuleCatalog {
  private readonly modules = new Map<string, ModuleInfo>();

  /**
   * Add a module. Module names are unique within a catalog.
   */
  load(module: ModuleInfo): void {
    if (this.modules.has(module.name)) {
      throw new Error(`Module '${module.name}' is already loaded.`);
    }
    this.modules.set(module.name, module);
  }

  unload(name: string): boolean {
    return this.modules.delete(name);
  }

  get(name: string): ModuleInfo | undefined {
    return this.modules.get(name);
  }

  snapshot(): readonly ModuleInfo[] {
    return Array.from(this.modules.values());
  }
}
