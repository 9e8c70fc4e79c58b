/**
 * Error type shared by the chunker pipeline and the CLI.
 */

export const ERROR_HINTS = {
  CHUNKER_INVALID_LIMIT: 'The chunk limit must be a positive integer number of characters',
  CHUNKER_SOURCE_NOT_FOUND: 'Check that the source directory exists and is readable',
  CHUNKER_OUTPUT_UNCREATABLE: 'Check permissions on the output directory and its parents',
  CHUNKER_WRITE_FAILED: 'Output may be incomplete - check disk space and permissions',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

export class ChunkerError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public hint?: string,
    public meta?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ChunkerError';
  }
}

/**
 * Create a ChunkerError with the standard hint for its code
 */
export function createChunkerError(
  code: ErrorCode,
  message: string,
  meta?: Record<string, unknown>
): ChunkerError {
  return new ChunkerError(code, message, ERROR_HINTS[code], meta);
}

/**
 * Maps error codes to CLI exit codes
 */
export function getExitCode(err: ChunkerError): number {
  if (err.code === 'CHUNKER_WRITE_FAILED') {return 1;}
  return 2;
}
