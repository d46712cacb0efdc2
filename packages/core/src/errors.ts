/**
 * @cortex-lens/core — Error taxonomy
 *
 * Only ConfigurationError is ever fatal, and only at startup.
 */

export type LensErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'MALFORMED_SAMPLE'
  | 'SESSION_WRITE_FAILURE'
  | 'CONFIGURATION';

export abstract class LensError extends Error {
  abstract readonly code: LensErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A store adapter call failed or timed out. */
export class SourceUnavailableError extends LensError {
  readonly code = 'SOURCE_UNAVAILABLE' as const;

  constructor(
    readonly source: string,
    cause?: unknown,
  ) {
    super(`Source "${source}" unavailable: ${errorMessage(cause)}`, { cause });
  }
}

/** A single sample (vector or thought record) that cannot be used. */
export class MalformedSampleError extends LensError {
  readonly code = 'MALFORMED_SAMPLE' as const;

  constructor(
    readonly sampleId: string,
    reason: string,
  ) {
    super(`Malformed sample ${sampleId}: ${reason}`);
  }
}

export class SessionWriteError extends LensError {
  readonly code = 'SESSION_WRITE_FAILURE' as const;

  constructor(
    readonly sessionId: string,
    cause?: unknown,
  ) {
    super(`Write to session ${sessionId} failed: ${errorMessage(cause)}`, {
      cause,
    });
  }
}

export class ConfigurationError extends LensError {
  readonly code = 'CONFIGURATION' as const;
}

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly ms: number,
  ) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  if (err === undefined) return 'unknown error';
  return err instanceof Error ? err.message : String(err);
}
