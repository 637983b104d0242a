/**
 * Error Type Guards
 */

import type {
  WorkspaceError,
  LookupError,
  StorageError,
  ConfigurationError,
  FatalError,
} from './app-error.js';

export function isWorkspaceError(e: unknown): e is WorkspaceError {
  return typeof e === 'object' && e !== null && '_tag' in e && 'message' in e;
}

export function isLookupError(e: WorkspaceError): e is LookupError {
  return e._tag === 'FileNotFound'
    || e._tag === 'ModuleNotFound'
    || e._tag === 'LocationNotFound';
}

export function isStorageError(e: WorkspaceError): e is StorageError {
  return e._tag === 'BackingStoreFailed'
    || e._tag === 'ContainerReadOnly'
    || e._tag === 'InvalidPath'
    || e._tag === 'CloseFailed';
}

export function isConfigurationError(e: WorkspaceError): e is ConfigurationError {
  return e._tag === 'ConfigInvalid' || e._tag === 'ConfigurationMisuse';
}

export function isFatalError(e: WorkspaceError): e is FatalError {
  return e._tag === 'ConfigInvalid'
    || e._tag === 'ConfigurationMisuse'
    || e._tag === 'PostCloseUsage';
}
