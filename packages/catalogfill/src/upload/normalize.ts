import type { TrackRow } from '../db/TrackRepository.js';

export function normalizeColumnName(name: string): string {
  return name.trim().toUpperCase();
}

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

/**
 * Canonical record for insertion: upper-case column names, absent cells
 * dropped rather than sent as null, text trimmed. Applying it twice gives
 * the same result as applying it once.
 */
export function normalizeRecord(raw: Record<string, unknown>): TrackRow {
  const record: TrackRow = {};
  for (const [key, value] of Object.entries(raw)) {
    if (isAbsent(value)) continue;
    record[normalizeColumnName(key)] = typeof value === 'string' ? value.trim() : value;
  }
  return record;
}
