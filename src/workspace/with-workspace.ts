import type { Result } from 'neverthrow';
import type { CloseFailedError } from '../core/errors/index.js';
import type { CompilationWorkspace } from './compilation-workspace.js';

/**
 * Run `fn` with `workspace` and close the workspace on every exit path.
 *
 * When `fn` throws, the workspace is still closed and the original error is
 * rethrown; close failures are then only logged (by `close`).
 */
export async function withWorkspace<T>(
  workspace: CompilationWorkspace,
  fn: (workspace: CompilationWorkspace) => Promise<T> | T
): Promise<Result<T, CloseFailedError>> {
  let value: T;
  try {
    value = await fn(workspace);
  } catch (error) {
    await workspace.close();
    throw error;
  }

  const closed = await workspace.close();
  return closed.map(() => value);
}
