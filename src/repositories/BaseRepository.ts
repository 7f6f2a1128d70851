/**
 * Base Repository
 *
 * Abstract base class for the Supabase-backed repositories. Rows are
 * validated with Zod on the way in and every timestamp column is passed
 * through the clock service's legacy coercion.
 */

import type { SupabaseClient, PostgrestError } from '@supabase/supabase-js';
import type { ZodType } from 'zod';
import { DataIntegrityError, RepositoryError } from '../errors';
import { coerceLegacy } from '../services/clock/clockService';
import { createLogger, type Logger } from '../utils/logger';

/** PostgREST returns at most this many rows per request (db-max-rows). */
export const PAGE_SIZE = 1000;

/** Values per `in.(...)` filter, to keep request URLs short. */
export const IN_FILTER_CHUNK = 100;

/** One ranged request for `chunk`, covering rows `from`..`to` inclusive. */
export type PageRequest = (
  chunk: string[],
  from: number,
  to: number,
) => PromiseLike<{ data: unknown; error: PostgrestError | null }>;

export abstract class BaseRepository {
  protected readonly logger: Logger;

  constructor(
    protected readonly supabase: SupabaseClient,
    protected readonly legacyZone: string,
    loggerName: string,
  ) {
    this.logger = createLogger(loggerName);
  }

  /**
   * Wrap a Supabase error with context for logging.
   */
  protected wrapError(
    message: string,
    error: PostgrestError,
    context: Record<string, unknown> = {},
  ): RepositoryError {
    this.logger.error({ ...context, error: error.message, code: error.code }, message);
    return new RepositoryError(message, error, context);
  }

  protected parseRow<T>(schema: ZodType<T>, row: unknown, entity: string): T {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new DataIntegrityError(
        `Malformed ${entity} row: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`,
        entity,
      );
    }
    return result.data;
  }

  protected parseRows<T>(schema: ZodType<T>, rows: unknown, entity: string): T[] {
    if (rows === null || rows === undefined) return [];
    if (!Array.isArray(rows)) {
      throw new DataIntegrityError(`Expected a list of ${entity} rows`, entity);
    }
    return rows.map((row) => this.parseRow(schema, row, entity));
  }

  /**
   * Every row matching an `in` filter over `values`. The values are split
   * into chunks and each chunk is read page by page until a short page.
   * `request` must apply a total order or rows can repeat across pages.
   */
  protected async selectAllIn(
    values: readonly string[],
    request: PageRequest,
    message: string,
    context: Record<string, unknown> = {},
  ): Promise<unknown[]> {
    const rows: unknown[] = [];
    for (let start = 0; start < values.length; start += IN_FILTER_CHUNK) {
      const chunk = values.slice(start, start + IN_FILTER_CHUNK);
      let from = 0;
      let pageLength = PAGE_SIZE;
      while (pageLength === PAGE_SIZE) {
        const { data, error } = await request(chunk, from, from + PAGE_SIZE - 1);
        if (error) {
          throw this.wrapError(message, error, { ...context, from });
        }
        const page = data ?? [];
        if (!Array.isArray(page)) {
          throw new DataIntegrityError(`Expected a page of rows from ${message}`, 'page');
        }
        rows.push(...page);
        pageLength = page.length;
        from += PAGE_SIZE;
      }
    }
    return rows;
  }

  protected toInstant(value: string): Date {
    return coerceLegacy(value, this.legacyZone);
  }
}
