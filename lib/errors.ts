export type PipelineErrorCode =
  | 'INVALID_DOMAIN'
  | 'FETCH_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'CANCELLED'
  | 'INVALID_CONFIG';

/**
 * Base class for every error the pipeline raises on purpose.
 * The CLI prints `message` only; anything else is treated as unexpected.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidDomainError extends PipelineError {
  constructor(readonly input: string) {
    super('INVALID_DOMAIN', `Invalid domain format: ${input}`);
  }
}

export class FetchError extends PipelineError {
  readonly attempts: number;
  readonly status?: number;

  constructor(message: string, opts: { attempts: number; status?: number; cause?: unknown }) {
    super('FETCH_FAILED', message, { cause: opts.cause });
    this.attempts = opts.attempts;
    this.status = opts.status;
  }
}

export class PersistenceError extends PipelineError {
  constructor(readonly format: string, readonly path: string, cause: unknown) {
    super('PERSISTENCE_FAILED', `Failed to save ${format} format to ${path}: ${errorMessage(cause)}`, { cause });
  }
}

export class CancelledError extends PipelineError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Throws `CancelledError` when the signal has already fired. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}
