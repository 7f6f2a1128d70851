/**
 * Engine error taxonomy.
 *
 * - `ProviderError`: the external data feed failed. `transient` failures are
 *   retried by the client; once retries run out the error is rethrown with
 *   `exhausted: true`. `permanent` failures are never retried.
 * - `DataIntegrityError`: a single record is malformed. Fatal to that record
 *   only; batch jobs collect these and keep going.
 * - `JobCancelledError`: the surrounding job was aborted between attempts.
 */

export type ProviderErrorKind = 'transient' | 'permanent';

export interface ProviderErrorOptions {
  kind: ProviderErrorKind;
  status?: number;
  attempts?: number;
  exhausted?: boolean;
  cause?: unknown;
}

export class ProviderError extends Error {
  readonly kind: ProviderErrorKind;
  readonly status: number | null;
  readonly attempts: number;
  readonly exhausted: boolean;

  constructor(message: string, options: ProviderErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ProviderError';
    this.kind = options.kind;
    this.status = options.status ?? null;
    this.attempts = options.attempts ?? 1;
    this.exhausted = options.exhausted ?? false;
  }

  /** Transient failure that survived every retry. */
  get isPermanentAfterRetry(): boolean {
    return this.kind === 'transient' && this.exhausted;
  }

  withAttempts(attempts: number, exhausted: boolean): ProviderError {
    return new ProviderError(this.message, {
      kind: this.kind,
      status: this.status ?? undefined,
      attempts,
      exhausted,
      cause: this.cause,
    });
  }
}

export class DataIntegrityError extends Error {
  constructor(
    message: string,
    public readonly entity: string,
    public readonly reference: string | null = null,
  ) {
    super(message);
    this.name = 'DataIntegrityError';
  }
}

export class JobCancelledError extends Error {
  constructor(message = 'Job cancelled') {
    super(message);
    this.name = 'JobCancelledError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
