import { COLUMNS } from '../config/constants.js';
import type { InsertResult, TrackRow } from '../db/TrackRepository.js';
import { errorMessage, type Logger } from '../monitoring/logger.js';
import { normalizeColumnName, normalizeRecord } from './normalize.js';
import { loadSpreadsheet, SpreadsheetNotFoundError, type SpreadsheetContents } from './spreadsheet.js';

export interface UploadTarget {
  ping(): Promise<boolean>;
  clearAll(): Promise<boolean>;
  insert(record: TrackRow): Promise<InsertResult>;
}

export interface UploadCounts {
  accepted: number;
  rejected: number;
}

export type UploadOutcome =
  | { status: 'unreachable' }
  | { status: 'missing_spreadsheet'; path: string }
  | { status: 'unreadable_spreadsheet'; path: string; error: string }
  | ({ status: 'completed'; cleared: boolean } & UploadCounts);

const PROGRESS_EVERY = 50;

function codeOf(record: TrackRow): string {
  const code = record[COLUMNS.code];
  return typeof code === 'string' || typeof code === 'number' ? String(code) : 'N/A';
}

/**
 * Inserts records one request at a time. A rejected insert is logged with
 * the row's code and the backend's reason, and the upload goes on.
 */
export async function uploadRows(deps: {
  target: Pick<UploadTarget, 'insert'>;
  records: TrackRow[];
  logger: Logger;
}): Promise<UploadCounts> {
  const { target, records, logger } = deps;
  const counts: UploadCounts = { accepted: 0, rejected: 0 };

  logger.info('Importing rows', { total: records.length });

  for (const [index, record] of records.entries()) {
    const result = await target.insert(record);
    if (result.ok) {
      counts.accepted += 1;
    } else {
      counts.rejected += 1;
      logger.warn('Row rejected', { row: index + 1, isrc: codeOf(record), detail: result.detail });
    }

    const done = index + 1;
    if (done % PROGRESS_EVERY === 0 && done < records.length) {
      logger.info('Import progress', { done, total: records.length, ...counts });
    }
  }

  return counts;
}

/**
 * One-shot seeding run: check the backend, optionally clear the table,
 * then load, normalize and insert every spreadsheet row.
 */
export async function runUpload(deps: {
  target: UploadTarget;
  spreadsheetPath: string;
  confirmClear: () => Promise<boolean>;
  logger: Logger;
  load?: (path: string) => Promise<SpreadsheetContents>;
}): Promise<UploadOutcome> {
  const { target, spreadsheetPath, logger } = deps;
  const load = deps.load ?? loadSpreadsheet;

  if (!(await target.ping())) {
    logger.error('Backend unreachable; check SUPABASE_URL and SUPABASE_API_KEY');
    return { status: 'unreachable' };
  }

  let cleared = false;
  if (await deps.confirmClear()) {
    logger.info('Clearing destination table');
    cleared = await target.clearAll();
    if (!cleared) {
      logger.warn('Table not cleared; importing on top of existing rows');
    }
  }

  let contents: SpreadsheetContents;
  try {
    contents = await load(spreadsheetPath);
  } catch (err) {
    if (err instanceof SpreadsheetNotFoundError) {
      logger.error('Spreadsheet not found', { path: spreadsheetPath });
      return { status: 'missing_spreadsheet', path: spreadsheetPath };
    }
    logger.error('Spreadsheet could not be read', { path: spreadsheetPath, error: errorMessage(err) });
    return { status: 'unreadable_spreadsheet', path: spreadsheetPath, error: errorMessage(err) };
  }

  logger.info('Spreadsheet columns', { columns: contents.columns });
  logger.info('Normalized columns', { columns: contents.columns.map(normalizeColumnName) });

  const records = contents.rows.map(normalizeRecord);
  const counts = await uploadRows({ target, records, logger });

  logger.info('Import finished', { ...counts });
  return { status: 'completed', cleared, ...counts };
}
