import { COLUMNS } from '../config/constants.js';
import type { TrackRow } from '../db/TrackRepository.js';

/** The three fields the panel form needs for one registration. */
export interface Track {
  code: string;
  artist: string;
  holders: string;
}

export type TrackField = keyof Track;

/**
 * `rowCode` is the code exactly as stored, for filtering the status write;
 * `track.code` is its trimmed form for the panel.
 */
export type ReadTrackResult =
  | { ok: true; track: Track; rowCode: string }
  | { ok: false; missing: TrackField[] };

const FIELD_COLUMNS: Record<TrackField, string> = {
  code: COLUMNS.code,
  artist: COLUMNS.artist,
  holders: COLUMNS.holders,
};

function cellText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const text = value.trim();
    return text === '' ? undefined : text;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/** Extracts code, artist and right-holders; lists whichever are missing. */
export function readTrack(row: TrackRow): ReadTrackResult {
  const storedCode = row[FIELD_COLUMNS.code];
  const code = cellText(storedCode);
  const artist = cellText(row[FIELD_COLUMNS.artist]);
  const holders = cellText(row[FIELD_COLUMNS.holders]);

  if (code !== undefined && artist !== undefined && holders !== undefined) {
    const rowCode = typeof storedCode === 'string' ? storedCode : code;
    return { ok: true, track: { code, artist, holders }, rowCode };
  }

  const missing: TrackField[] = [];
  if (code === undefined) missing.push('code');
  if (artist === undefined) missing.push('artist');
  if (holders === undefined) missing.push('holders');
  return { ok: false, missing };
}
