/**
 * Error Factories - Consistent Error Construction
 *
 * `Err` namespace for all error constructors, so every error carries a message
 * built the same way.
 */

import type {
  FileNotFoundError,
  ModuleNotFoundError,
  LocationNotFoundError,
  BackingStoreFailedError,
  ContainerReadOnlyError,
  InvalidPathError,
  CloseFailedError,
  StorageError,
  ConfigIssue,
  ConfigInvalidError,
  ConfigurationMisuseError,
  PostCloseUsageError,
  StorageOperation,
} from './app-error.js';
import { describeNotFound } from '../../suggestions/not-found-message.js';

export const Err = {
  // ==========================================================================
  // Lookup Errors
  // ==========================================================================

  fileNotFound: (
    location: string,
    path: string,
    suggestions: readonly string[] = []
  ): FileNotFoundError => ({
    _tag: 'FileNotFound',
    location,
    path,
    suggestions,
    message: describeNotFound('file', path, location, suggestions),
  }),

  moduleNotFound: (
    location: string,
    module: string,
    suggestions: readonly string[] = []
  ): ModuleNotFoundError => ({
    _tag: 'ModuleNotFound',
    location,
    module,
    suggestions,
    message: describeNotFound('module', module, location, suggestions),
  }),

  locationNotFound: (
    location: string,
    suggestions: readonly string[] = []
  ): LocationNotFoundError => ({
    _tag: 'LocationNotFound',
    location,
    suggestions,
    message: describeNotFound('location', location, 'this workspace', suggestions),
  }),

  // ==========================================================================
  // Storage Errors
  // ==========================================================================

  backingStoreFailed: (
    containerId: string,
    path: string,
    operation: StorageOperation,
    details: string
  ): BackingStoreFailedError => ({
    _tag: 'BackingStoreFailed',
    containerId,
    path,
    operation,
    details,
    message: `Failed to ${operation} "${path}" in ${containerId}: ${details}`,
  }),

  containerReadOnly: (containerId: string, path: string): ContainerReadOnlyError => ({
    _tag: 'ContainerReadOnly',
    containerId,
    path,
    message: `Cannot write "${path}": ${containerId} is read-only`,
  }),

  invalidPath: (path: string, reason: string): InvalidPathError => ({
    _tag: 'InvalidPath',
    path,
    reason,
    message: `Invalid relative path "${path}": ${reason}`,
  }),

  closeFailed: (resource: string, failures: readonly StorageError[]): CloseFailedError => ({
    _tag: 'CloseFailed',
    resource,
    failures,
    message: `One or more components of ${resource} failed to close:${failures.map(f => `\n  - ${f.message}`).join('')}`,
  }),

  // ==========================================================================
  // Configuration Errors
  // ==========================================================================

  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: `Configuration invalid:\n${issues.map(i => `  - ${i.path}: ${i.message}`).join('\n')}`,
  }),

  configurationMisuse: (
    location: string,
    operation: string,
    details: string
  ): ConfigurationMisuseError => ({
    _tag: 'ConfigurationMisuse',
    location,
    operation,
    details,
    message: `Cannot ${operation} on location ${location}: ${details}`,
  }),

  // ==========================================================================
  // Lifecycle Errors
  // ==========================================================================

  postCloseUsage: (resource: string, operation: string): PostCloseUsageError => ({
    _tag: 'PostCloseUsage',
    resource,
    operation,
    message: `Cannot ${operation}: ${resource} has already been closed`,
  }),
};
