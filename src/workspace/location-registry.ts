import { ok, err, type Result } from 'neverthrow';
import type { LocationNotFoundError } from '../core/errors/index.js';
import { Err } from '../core/errors/index.js';
import { FuzzyMatcher } from '../suggestions/index.js';
import type { Location, LocationOptions } from './location.js';
import { STANDARD_LOCATIONS, defineLocation } from './location.js';

export interface LocationDefinition extends Required<LocationOptions> {
  readonly name: string;
}

/**
 * The locations a workspace knows: the standard set plus configured ones.
 */
export class LocationRegistry {
  private readonly byName = new Map<string, Location>();

  constructor(
    definitions: readonly LocationDefinition[],
    private readonly matcher: FuzzyMatcher
  ) {
    for (const location of STANDARD_LOCATIONS) {
      this.byName.set(location.name, location);
    }
    for (const { name, output, moduleOriented } of definitions) {
      this.byName.set(name, defineLocation(name, { output, moduleOriented }));
    }
  }

  get(name: string): Location | null {
    return this.byName.get(name) ?? null;
  }

  find(name: string): Result<Location, LocationNotFoundError> {
    const location = this.byName.get(name);
    if (location !== undefined) return ok(location);
    return err(Err.locationNotFound(name, this.matcher.suggestNames(name, this.byName.keys())));
  }

  /** True when `location` is registered with exactly these flags. */
  has(location: Location): boolean {
    const registered = this.byName.get(location.name);
    return (
      registered !== undefined &&
      registered.isOutput === location.isOutput &&
      registered.isModuleOriented === location.isModuleOriented
    );
  }

  all(): readonly Location[] {
    return [...this.byName.values()];
  }
}
