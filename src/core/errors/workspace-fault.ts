import type { FatalError } from './app-error.js';

/**
 * Thrown for fatal misuse: configuration misuse, invalid configuration, or use of a
 * resource after it was closed. Carries the error data so callers can still branch
 * on `error._tag`.
 */
export class WorkspaceFault extends Error {
  readonly error: FatalError;

  constructor(error: FatalError) {
    super(error.message);
    this.name = 'WorkspaceFault';
    this.error = error;
  }
}

export function isWorkspaceFault(e: unknown): e is WorkspaceFault {
  return e instanceof WorkspaceFault;
}
