import type { PostgrestError } from '@supabase/supabase-js';

/**
 * A failed store query, carrying the PostgREST error and the call context.
 */
export class RepositoryError extends Error {
  constructor(
    message: string,
    public readonly cause: PostgrestError,
    public readonly context: Record<string, unknown> = {},
  ) {
    super(`${message}: ${cause.message}`);
    this.name = 'RepositoryError';
  }
}
