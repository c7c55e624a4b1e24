import { readFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';

export interface SpreadsheetContents {
  columns: string[];
  rows: Record<string, unknown>[];
}

export class SpreadsheetNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Spreadsheet not found: ${path}`);
    this.name = 'SpreadsheetNotFoundError';
    this.path = path;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * First worksheet as header-keyed records. Empty cells are left out of the
 * record instead of appearing as empty values.
 */
export function readSpreadsheet(data: Buffer | Uint8Array): SpreadsheetContents {
  const workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  if (!sheet) {
    return { columns: [], rows: [] };
  }

  const header = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false })[0] ?? [];
  const columns = header.filter((cell) => cell != null).map((cell) => String(cell));
  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { blankrows: false });
  return { columns, rows };
}

export async function loadSpreadsheet(path: string): Promise<SpreadsheetContents> {
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new SpreadsheetNotFoundError(path);
    }
    throw err;
  }
  return readSpreadsheet(data);
}
