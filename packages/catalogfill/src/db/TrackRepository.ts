/**
 * Track table access over PostgREST.
 *
 * Every method catches its own failures: a non-success response or a
 * transport error is logged and comes back as `null`, `false` or `[]`.
 * Nothing here throws to the caller.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { COLUMNS, PENDING_FILTER, type TrackStatus } from '../config/constants.js';
import type { JobSliceWindow } from '../config/env.js';
import { errorMessage, type Logger } from '../monitoring/logger.js';

// ── Types ──────────────────────────────────────────────────────────────────

/** One backend row, column name to value. */
export type TrackRow = Record<string, unknown>;

export type InsertResult = { ok: true } | { ok: false; detail: string };

export interface TrackRepositoryConfig {
  supabase: SupabaseClient;
  table: string;
  logger: Logger;
}

interface BackendError {
  message: string;
  details?: string | null;
  hint?: string | null;
  code?: string;
}

const trackRowsSchema = z.array(z.record(z.unknown()));

function describeError(error: BackendError): string {
  return [error.message, error.details, error.hint].filter((part) => part != null && part !== '').join(' | ');
}

// ── Implementation ─────────────────────────────────────────────────────────

export class TrackRepository {
  private supabase: SupabaseClient;
  private table: string;
  private logger: Logger;

  constructor(config: TrackRepositoryConfig) {
    this.supabase = config.supabase;
    this.table = config.table;
    this.logger = config.logger;
  }

  /**
   * Exact number of rows not yet marked successful, read from the
   * `Content-Range` total of a HEAD request. Returns null when the backend
   * could not be asked.
   */
  async countPending(): Promise<number | null> {
    try {
      const { count, error, status } = await this.supabase
        .from(this.table)
        .select(COLUMNS.id, { count: 'exact', head: true })
        .or(PENDING_FILTER);

      if (error) {
        this.logger.error('Pending count query failed', { status, error: describeError(error) });
        return null;
      }
      if (count == null || !Number.isFinite(count)) {
        this.logger.warn('Backend returned no usable content-range total; assuming 0', { status });
        return 0;
      }

      this.logger.info('Pending rows counted', { count });
      return count;
    } catch (err) {
      this.logger.error('Could not reach backend for pending count', { error: errorMessage(err) });
      return null;
    }
  }

  /**
   * Pending rows ordered by id. With a slice only that offset/limit window
   * is returned; without one, the whole pending set.
   */
  async fetchPending(slice?: JobSliceWindow): Promise<TrackRow[]> {
    this.logger.info('Fetching pending rows', {
      offset: slice?.offset ?? null,
      limit: slice?.limit ?? null,
    });

    try {
      const { data, error, status } = await this.pendingQuery(slice);

      if (error) {
        this.logger.error('Pending rows query failed', { status, error: describeError(error) });
        return [];
      }

      const parsed = trackRowsSchema.safeParse(data ?? []);
      if (!parsed.success) {
        this.logger.error('Backend returned rows in an unexpected shape', { error: parsed.error.message });
        return [];
      }

      if (parsed.data.length === 0) {
        this.logger.info('No pending rows for this worker');
      } else {
        this.logger.info('Pending rows fetched', { count: parsed.data.length });
      }
      return parsed.data;
    } catch (err) {
      this.logger.error('Could not reach backend for pending rows', { error: errorMessage(err) });
      return [];
    }
  }

  /** Writes the status column of the row with this code. True only on 204. */
  async markStatus(code: string, status: TrackStatus): Promise<boolean> {
    try {
      const { error, status: httpStatus } = await this.supabase
        .from(this.table)
        .update({ [COLUMNS.status]: status })
        .eq(COLUMNS.code, code);

      if (error || httpStatus !== 204) {
        this.logger.warn('Status update rejected', {
          code,
          status,
          httpStatus,
          ...(error ? { error: describeError(error) } : {}),
        });
        return false;
      }
      return true;
    } catch (err) {
      this.logger.error('Could not reach backend for status update', { code, status, error: errorMessage(err) });
      return false;
    }
  }

  /** Lightweight read that tells whether the table answers at all. */
  async ping(): Promise<boolean> {
    try {
      const { error, status } = await this.supabase.from(this.table).select('*').limit(1);
      if (error || status !== 200) {
        this.logger.error('Backend check failed', {
          status,
          ...(error ? { error: describeError(error) } : {}),
        });
        return false;
      }
      this.logger.info('Backend reachable', { table: this.table });
      return true;
    } catch (err) {
      this.logger.error('Could not reach backend', { error: errorMessage(err) });
      return false;
    }
  }

  /** Deletes every row (every row carries a code, so `code <> ''` matches all). */
  async clearAll(): Promise<boolean> {
    try {
      const { error, status } = await this.supabase.from(this.table).delete().neq(COLUMNS.code, '');
      if (error || status !== 204) {
        this.logger.error('Clearing table failed', {
          status,
          ...(error ? { error: describeError(error) } : {}),
        });
        return false;
      }
      this.logger.info('Table cleared', { table: this.table });
      return true;
    } catch (err) {
      this.logger.error('Could not reach backend to clear table', { error: errorMessage(err) });
      return false;
    }
  }

  /** Inserts one record. A rejection carries the backend's detail. */
  async insert(record: TrackRow): Promise<InsertResult> {
    try {
      const { error, status } = await this.supabase.from(this.table).insert(record);
      if (error) return { ok: false, detail: describeError(error) };
      if (status !== 201) return { ok: false, detail: `unexpected status ${status}` };
      return { ok: true };
    } catch (err) {
      return { ok: false, detail: errorMessage(err) };
    }
  }

  private pendingQuery(slice?: JobSliceWindow) {
    const query = this.supabase
      .from(this.table)
      .select('*')
      .or(PENDING_FILTER)
      .order(COLUMNS.id, { ascending: true });
    return slice ? query.range(slice.offset, slice.offset + slice.limit - 1) : query;
  }
}
