/**
 * Workspace configuration - parse, don't validate.
 *
 * - Single source of truth for the config surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../core/errors/index.js';
import type { ConfigIssue, ConfigInvalidError } from '../core/errors/index.js';
import type { SuggestionConfig } from '../suggestions/index.js';
import { similarity } from '../suggestions/index.js';
import type { FileKindRules } from '../workspace/file-kind.js';
import { STANDARD_LOCATIONS } from '../workspace/location.js';
import type { LocationDefinition } from '../workspace/location-registry.js';
import type { OutputBacking } from '../containers/output-allocator.js';
import type { DiagnosticTraceOptions } from '../diagnostics/diagnostic-trace-collector.js';

export interface WorkspaceConfig {
  /** Locations in addition to the standard ones. */
  readonly locations: readonly LocationDefinition[];
  readonly suggestions: SuggestionConfig;
  readonly snippet: { readonly contextLines: number };
  readonly diagnostics: DiagnosticTraceOptions;
  readonly fileKinds: FileKindRules;
  readonly output: OutputBacking;
}

export type ValidatedWorkspaceConfig = Brand<WorkspaceConfig, 'ValidatedWorkspaceConfig'>;

// =============================================================================
// Schema
// =============================================================================

const STANDARD_NAMES = new Set(STANDARD_LOCATIONS.map((l) => l.name));

const ExtensionSchema = z.string().regex(/^\.[^./]+$/, 'Extension must look like ".ext"');

const LocationSchema = z.object({
  name: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'Location name must start with a letter or underscore and contain no brackets or spaces'),
  output: z.boolean().default(false),
  moduleOriented: z.boolean().default(false),
});

export const WorkspaceConfigSchema = z.object({
  locations: z
    .array(LocationSchema)
    .default([])
    .superRefine((locations, ctx) => {
      const seen = new Set<string>();
      locations.forEach((location, index) => {
        if (STANDARD_NAMES.has(location.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'name'],
            message: `"${location.name}" is a standard location and cannot be redefined`,
          });
        } else if (seen.has(location.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'name'],
            message: `Duplicate location "${location.name}"`,
          });
        }
        seen.add(location.name);
      });
    }),

  suggestions: z
    .object({
      minScore: z.number().min(0, 'minScore must be between 0 and 1').max(1, 'minScore must be between 0 and 1').default(0.75),
      maxResults: z.number().int().min(0, 'maxResults cannot be negative').default(5),
    })
    .default({}),

  snippet: z
    .object({
      contextLines: z.number().int().min(0, 'contextLines cannot be negative').default(2),
    })
    .default({}),

  diagnostics: z
    .object({
      logging: z.boolean().default(false),
      stackTraces: z.boolean().default(false),
      stackDepth: z.number().int().min(0).max(256, 'stackDepth cannot exceed 256').default(32),
    })
    .default({}),

  fileKinds: z
    .object({
      sourceExtensions: z.array(ExtensionSchema).min(1).default(['.java']),
      classExtensions: z.array(ExtensionSchema).min(1).default(['.class']),
    })
    .default({}),

  output: z
    .discriminatedUnion('kind', [
      z.object({ kind: z.literal('memory') }),
      z.object({ kind: z.literal('directory'), root: z.string().min(1, 'Output root cannot be empty') }),
    ])
    .default({ kind: 'memory' }),
});

export type WorkspaceConfigInput = z.input<typeof WorkspaceConfigSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedWorkspaceConfig, ConfigInvalidError>;

export function loadWorkspaceConfig(input: unknown = {}): LoadConfigResult {
  const parsed = WorkspaceConfigSchema.safeParse(input);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  const data = parsed.data;
  return ok(
    createValidatedConfig({
      locations: data.locations,
      suggestions: { minScore: similarity(data.suggestions.minScore), maxResults: data.suggestions.maxResults },
      snippet: data.snippet,
      diagnostics: data.diagnostics,
      fileKinds: data.fileKinds,
      output: data.output,
    })
  );
}

/**
 * Tests and local construction only: brands a config without parsing.
 */
export function createValidatedConfig(value: WorkspaceConfig): ValidatedWorkspaceConfig {
  return value as ValidatedWorkspaceConfig;
}

export const DEFAULT_WORKSPACE_CONFIG: ValidatedWorkspaceConfig = createValidatedConfig({
  locations: [],
  suggestions: { minScore: similarity(0.75), maxResults: 5 },
  snippet: { contextLines: 2 },
  diagnostics: { logging: false, stackTraces: false, stackDepth: 32 },
  fileKinds: { sourceExtensions: ['.java'], classExtensions: ['.class'] },
  output: { kind: 'memory' },
});

// =============================================================================
// Internal
// =============================================================================

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
