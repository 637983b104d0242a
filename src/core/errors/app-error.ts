/**
 * Error Hierarchy - Discriminated Unions
 *
 * Errors are data, organized by what the caller can do about them:
 * - lookup errors are recoverable misses that carry suggestions
 * - storage errors wrap failures of a backing store
 * - configuration and lifecycle errors are fatal misuse (see WorkspaceFault)
 */

// ============================================================================
// Error Categories
// ============================================================================

export type WorkspaceError =
  | LookupError
  | StorageError
  | ConfigurationError
  | LifecycleError;

/** Errors that indicate a bug in the calling code rather than a runtime condition. */
export type FatalError =
  | ConfigInvalidError
  | ConfigurationMisuseError
  | PostCloseUsageError;

// ============================================================================
// Lookup Errors (misses - the caller decides whether they are fatal)
// ============================================================================

export type LookupError =
  | FileNotFoundError
  | ModuleNotFoundError
  | LocationNotFoundError;

export interface FileNotFoundError {
  readonly _tag: 'FileNotFound';
  readonly location: string;
  readonly path: string;
  readonly suggestions: readonly string[];
  readonly message: string;
}

export interface ModuleNotFoundError {
  readonly _tag: 'ModuleNotFound';
  readonly location: string;
  readonly module: string;
  readonly suggestions: readonly string[];
  readonly message: string;
}

export interface LocationNotFoundError {
  readonly _tag: 'LocationNotFound';
  readonly location: string;
  readonly suggestions: readonly string[];
  readonly message: string;
}

// ============================================================================
// Storage Errors (backing store problems)
// ============================================================================

export type StorageError =
  | BackingStoreFailedError
  | ContainerReadOnlyError
  | InvalidPathError
  | CloseFailedError;

export type StorageOperation = 'open' | 'read' | 'write' | 'list' | 'stat' | 'close';

export interface BackingStoreFailedError {
  readonly _tag: 'BackingStoreFailed';
  readonly containerId: string;
  readonly path: string;
  readonly operation: StorageOperation;
  readonly details: string;
  readonly message: string;
}

export interface ContainerReadOnlyError {
  readonly _tag: 'ContainerReadOnly';
  readonly containerId: string;
  readonly path: string;
  readonly message: string;
}

export interface InvalidPathError {
  readonly _tag: 'InvalidPath';
  readonly path: string;
  readonly reason: string;
  readonly message: string;
}

export interface CloseFailedError {
  readonly _tag: 'CloseFailed';
  readonly resource: string;
  readonly failures: readonly StorageError[];
  readonly message: string;
}

// ============================================================================
// Configuration Errors
// ============================================================================

export type ConfigurationError =
  | ConfigInvalidError
  | ConfigurationMisuseError;

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export interface ConfigInvalidError {
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}

export interface ConfigurationMisuseError {
  readonly _tag: 'ConfigurationMisuse';
  readonly location: string;
  readonly operation: string;
  readonly details: string;
  readonly message: string;
}

// ============================================================================
// Lifecycle Errors
// ============================================================================

export type LifecycleError = PostCloseUsageError;

export interface PostCloseUsageError {
  readonly _tag: 'PostCloseUsage';
  readonly resource: string;
  readonly operation: string;
  readonly message: string;
}
