/**
 * Locations - named compilation roles (an input root, a library path, an output
 * target), independent of any storage.
 *
 * Locations are immutable values compared by name.
 */

export interface Location {
  readonly name: string;
  readonly isOutput: boolean;
  readonly isModuleOriented: boolean;
}

/**
 * One module inside a module-oriented location.
 */
export interface ModuleLocation {
  readonly parent: Location;
  readonly moduleName: string;
  /** Display name, e.g. `MODULE_SOURCE_PATH[com.example.app]` */
  readonly name: string;
}

/** Anything a container group can be bound to. */
export type GroupLocation = Location | ModuleLocation;

export interface LocationOptions {
  readonly output?: boolean;
  readonly moduleOriented?: boolean;
}

export function defineLocation(name: string, options: LocationOptions = {}): Location {
  return Object.freeze({
    name,
    isOutput: options.output ?? false,
    isModuleOriented: options.moduleOriented ?? false,
  });
}

export function moduleLocation(parent: Location, moduleName: string): ModuleLocation {
  return Object.freeze({
    parent,
    moduleName,
    name: `${parent.name}[${moduleName}]`,
  });
}

export function isModuleLocation(location: GroupLocation): location is ModuleLocation {
  return 'parent' in location;
}

export function sameLocation(a: GroupLocation, b: GroupLocation): boolean {
  return a.name === b.name;
}

export const StandardLocations = {
  SOURCE_PATH: defineLocation('SOURCE_PATH'),
  CLASS_PATH: defineLocation('CLASS_PATH'),
  ANNOTATION_PROCESSOR_PATH: defineLocation('ANNOTATION_PROCESSOR_PATH'),
  PLATFORM_CLASS_PATH: defineLocation('PLATFORM_CLASS_PATH'),
  SOURCE_OUTPUT: defineLocation('SOURCE_OUTPUT', { output: true }),
  CLASS_OUTPUT: defineLocation('CLASS_OUTPUT', { output: true }),
  NATIVE_HEADER_OUTPUT: defineLocation('NATIVE_HEADER_OUTPUT', { output: true }),
  MODULE_SOURCE_PATH: defineLocation('MODULE_SOURCE_PATH', { moduleOriented: true }),
  MODULE_PATH: defineLocation('MODULE_PATH', { moduleOriented: true }),
  UPGRADE_MODULE_PATH: defineLocation('UPGRADE_MODULE_PATH', { moduleOriented: true }),
  SYSTEM_MODULES: defineLocation('SYSTEM_MODULES', { moduleOriented: true }),
  PATCH_MODULE_PATH: defineLocation('PATCH_MODULE_PATH', { moduleOriented: true }),
  ANNOTATION_PROCESSOR_MODULE_PATH: defineLocation('ANNOTATION_PROCESSOR_MODULE_PATH', { moduleOriented: true }),
} as const;

export const STANDARD_LOCATIONS: readonly Location[] = Object.values(StandardLocations);
