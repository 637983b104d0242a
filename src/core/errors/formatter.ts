/**
 * Error formatting for test failure output and logs.
 */

import type { WorkspaceError } from './app-error.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface FormattedError {
  readonly error: string;
  readonly message: string;
  readonly details: Record<string, unknown>;
  readonly suggestions?: readonly string[];
}

export function formatWorkspaceError(error: WorkspaceError): FormattedError {
  switch (error._tag) {
    case 'FileNotFound':
      return {
        error: error._tag,
        message: error.message,
        details: { location: error.location, path: error.path },
        suggestions: error.suggestions,
      };

    case 'ModuleNotFound':
      return {
        error: error._tag,
        message: error.message,
        details: { location: error.location, module: error.module },
        suggestions: error.suggestions,
      };

    case 'LocationNotFound':
      return {
        error: error._tag,
        message: error.message,
        details: { location: error.location },
        suggestions: error.suggestions,
      };

    case 'BackingStoreFailed':
      return {
        error: error._tag,
        message: error.message,
        details: {
          containerId: error.containerId,
          path: error.path,
          operation: error.operation,
          details: error.details,
        },
      };

    case 'ContainerReadOnly':
      return {
        error: error._tag,
        message: error.message,
        details: { containerId: error.containerId, path: error.path },
      };

    case 'InvalidPath':
      return {
        error: error._tag,
        message: error.message,
        details: { path: error.path, reason: error.reason },
      };

    case 'CloseFailed':
      return {
        error: error._tag,
        message: error.message,
        details: {
          resource: error.resource,
          failures: error.failures.map((f) => f.message),
        },
      };

    case 'ConfigInvalid':
      return {
        error: error._tag,
        message: error.message,
        details: { issues: error.issues },
      };

    case 'ConfigurationMisuse':
      return {
        error: error._tag,
        message: error.message,
        details: {
          location: error.location,
          operation: error.operation,
          details: error.details,
        },
      };

    case 'PostCloseUsage':
      return {
        error: error._tag,
        message: error.message,
        details: { resource: error.resource, operation: error.operation },
      };

    default:
      return assertNever(error);
  }
}

export function formatErrorForLogs(error: WorkspaceError): Record<string, unknown> {
  const base: Record<string, unknown> = {
    errorTag: error._tag,
    message: error.message,
  };

  for (const [key, value] of Object.entries(error)) {
    if (key !== '_tag' && key !== 'message') {
      base[key] = value;
    }
  }

  return base;
}
