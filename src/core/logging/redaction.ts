/**
 * Redaction configuration for pino.
 *
 * File payloads and source text can be large; they are replaced in log output so
 * a debug log of a write or a diagnostic stays one readable line.
 */
export const REDACTION_CONFIG = {
  paths: [
    'bytes',
    'content',
    'sourceText',
    '*.bytes',
    '*.content',
    '*.sourceText',
  ] as string[],
  censor: '[OMITTED]',
};
