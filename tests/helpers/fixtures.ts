import { errAsync, type ResultAsync } from 'neverthrow';
import type { StorageError } from '../../src/core/errors/index.js';
import { Err } from '../../src/core/errors/index.js';
import { MemoryContainer, type MemoryFiles } from '../../src/containers/memory-container.js';
import { ContainerGroup } from '../../src/containers/container-group.js';
import { DEFAULT_SUGGESTION_CONFIG } from '../../src/suggestions/index.js';
import { DEFAULT_FILE_KIND_RULES } from '../../src/workspace/file-kind.js';
import type { GroupLocation } from '../../src/workspace/location.js';
import { normalizeRelativePath, type RelativePath } from '../../src/workspace/relative-path.js';
import { FakeLoggerFactory } from './FakeLoggerFactory.js';
import { expectOk } from './result-helpers.js';

export function rel(raw: string): RelativePath {
  return expectOk(normalizeRelativePath(raw), `normalizing ${raw}`);
}

export function text(bytes: Uint8Array | null): string | null {
  return bytes === null ? null : new TextDecoder().decode(bytes);
}

export function memory(name: string, files: MemoryFiles = {}): MemoryContainer {
  return expectOk(MemoryContainer.withFiles(name, files), `seeding ${name}`);
}

export function newGroup(location: GroupLocation, loggers: FakeLoggerFactory = new FakeLoggerFactory()): ContainerGroup {
  return new ContainerGroup({
    location,
    fileKinds: DEFAULT_FILE_KIND_RULES,
    suggestions: DEFAULT_SUGGESTION_CONFIG,
    logger: loggers.create('ContainerGroup'),
  });
}

/**
 * Memory container whose close always fails, for close-aggregation tests.
 */
export class StuckContainer extends MemoryContainer {
  override close(): ResultAsync<void, StorageError> {
    return super.close().andThen(() => errAsync(Err.backingStoreFailed(this.id, '.', 'close', 'lock held')));
  }
}
