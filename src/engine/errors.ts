/**
 * Error taxonomy. Every fatal condition the pipeline can report has its own class
 * and its own process exit code.
 */

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'PARSE_ERROR'
  | 'CHUNKING_ERROR'
  | 'TRANSLATION_ERROR'
  | 'REASSEMBLY_ERROR';

export abstract class ChunkwiseError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends ChunkwiseError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly exitCode = 2;
}

/** Malformed structural tokens in the source document */
export class ParseError extends ChunkwiseError {
  readonly code = 'PARSE_ERROR';
  readonly exitCode = 3;

  constructor(
    message: string,
    readonly line?: number
  ) {
    super(line === undefined ? message : `${message} (line ${line})`);
  }
}

/** Chunk budget that cannot be satisfied, or a chunk sequence that is out of order */
export class ChunkingError extends ChunkwiseError {
  readonly code = 'CHUNKING_ERROR';
  readonly exitCode = 4;
}

export type TranslationFailureReason = 'exhausted' | 'permanent' | 'cancelled';

export class TranslationError extends ChunkwiseError {
  readonly code = 'TRANSLATION_ERROR';
  readonly exitCode = 5;

  readonly sequenceIndex: number;
  readonly attempts: number;
  readonly reason: TranslationFailureReason;
  readonly completedChunks: number;

  constructor(
    message: string,
    details: {
      sequenceIndex: number;
      attempts: number;
      reason: TranslationFailureReason;
      completedChunks: number;
      cause?: unknown;
    }
  ) {
    super(message, { cause: details.cause });
    this.sequenceIndex = details.sequenceIndex;
    this.attempts = details.attempts;
    this.reason = details.reason;
    this.completedChunks = details.completedChunks;
  }
}

/** Internal consistency violation while stitching translated chunks together */
export class ReassemblyError extends ChunkwiseError {
  readonly code = 'REASSEMBLY_ERROR';
  readonly exitCode = 6;

  constructor(
    message: string,
    readonly sequenceIndex?: number
  ) {
    super(message);
  }
}

export const GENERIC_EXIT_CODE = 1;

export function exitCodeFor(error: unknown): number {
  return error instanceof ChunkwiseError ? error.exitCode : GENERIC_EXIT_CODE;
}

/**
 * One-line description for CLI and HTTP output: kind, chunk index when known, message.
 */
export function describeError(error: unknown): string {
  if (error instanceof TranslationError || error instanceof ReassemblyError) {
    const index = error.sequenceIndex === undefined ? '' : ` [chunk #${error.sequenceIndex}]`;
    return `${error.name}${index}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
