// --- Dispatch ---

export const BATCH_SIZE = 250; // rows per worker slice
export const MAX_WORKERS = 4;

// --- Row columns ---

export const COLUMNS = {
  id: 'id',
  code: 'ISRC',
  artist: 'ARTISTA',
  holders: 'TITULARES',
  status: 'PAINEL_NEW',
} as const;

// --- Row status values (null means pending) ---

export const STATUS_SUCCESS = 'Cadastro OK';
export const STATUS_ERROR = 'Erro no Cadastro';

export type TrackStatus = typeof STATUS_SUCCESS | typeof STATUS_ERROR;

/** PostgREST `or` filter: status unset or anything but success. */
export const PENDING_FILTER = `${COLUMNS.status}.is.null,${COLUMNS.status}.neq.${STATUS_SUCCESS}`;
