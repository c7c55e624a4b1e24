/**
 * Job matrix planning for parallel registration workers.
 *
 * The matrix is handed to an external orchestrator that starts one
 * `register-tracks` process per slice. Slices are computed from a count
 * snapshot and applied to the live table later; nothing here claims rows.
 */

import { appendFile } from 'node:fs/promises';
import { BATCH_SIZE, MAX_WORKERS } from '../config/constants.js';
import type { Logger } from '../monitoring/logger.js';

// --- Types ---

export interface JobSlice {
  workerId: number;
  offset: number;
  limit: number;
}

export interface JobMatrix {
  hasJobs: boolean;
  include: JobSlice[];
}

export interface PlanOptions {
  batchSize?: number;
  maxWorkers?: number;
}

/** Wire shape of one matrix entry, as the orchestrator reads it. */
export interface JobSliceDocument {
  worker_id: number;
  offset: number;
  limit: number;
}

export interface PendingCounter {
  countPending(): Promise<number | null>;
}

// --- Planning ---

/**
 * `min(ceil(count / batchSize), maxWorkers)` slices of `batchSize` rows each.
 * The last slice keeps the full limit even when fewer rows remain; the fetch
 * simply returns fewer rows.
 */
export function planJobMatrix(count: number, opts: PlanOptions = {}): JobMatrix {
  const batchSize = opts.batchSize ?? BATCH_SIZE;
  const maxWorkers = opts.maxWorkers ?? MAX_WORKERS;

  if (!Number.isFinite(count) || count <= 0) {
    return { hasJobs: false, include: [] };
  }

  const numWorkers = Math.min(Math.ceil(count / batchSize), maxWorkers);
  const include: JobSlice[] = [];
  for (let i = 0; i < numWorkers; i++) {
    include.push({ workerId: i + 1, offset: i * batchSize, limit: batchSize });
  }
  return { hasJobs: true, include };
}

/**
 * Counts pending rows and plans the matrix. A failed count degrades to an
 * empty matrix; this never throws.
 */
export async function computeJobMatrix(deps: {
  repository: PendingCounter;
  logger: Logger;
  options?: PlanOptions;
}): Promise<JobMatrix> {
  const { repository, logger } = deps;
  const batchSize = deps.options?.batchSize ?? BATCH_SIZE;
  const maxWorkers = deps.options?.maxWorkers ?? MAX_WORKERS;

  const count = await repository.countPending();
  if (count === null) {
    logger.error('Pending count unavailable; dispatching no workers');
    return { hasJobs: false, include: [] };
  }

  const matrix = planJobMatrix(count, { batchSize, maxWorkers });
  if (!matrix.hasJobs) {
    logger.info('No pending rows; no workers will be started');
    return matrix;
  }

  logger.info('Workers planned', { pending: count, workers: matrix.include.length });

  const capacity = matrix.include.length * batchSize;
  if (count > capacity) {
    logger.warn('Pending rows exceed dispatch capacity; the remainder waits for the next dispatch', {
      pending: count,
      capacity,
      unassigned: count - capacity,
    });
  }
  return matrix;
}

// --- Output ---

export function toMatrixDocument(matrix: JobMatrix): { include: JobSliceDocument[] } {
  return {
    include: matrix.include.map((slice) => ({
      worker_id: slice.workerId,
      offset: slice.offset,
      limit: slice.limit,
    })),
  };
}

/** `key=value` lines for the orchestrator's output file. */
export function formatOutputLines(matrix: JobMatrix): string[] {
  return [`has_jobs=${matrix.hasJobs}`, `matrix=${JSON.stringify(toMatrixDocument(matrix))}`];
}

/**
 * Appends the matrix to the orchestrator's output file, or prints the JSON
 * document on stdout when no file is configured.
 */
export async function publishJobMatrix(
  matrix: JobMatrix,
  opts: { outputFile?: string; stdout?: (line: string) => void; logger: Logger },
): Promise<void> {
  const document = { hasJobs: matrix.hasJobs, ...toMatrixDocument(matrix) };
  opts.logger.info('Job matrix generated', { matrix: JSON.stringify(document) });

  if (opts.outputFile) {
    await appendFile(opts.outputFile, `${formatOutputLines(matrix).join('\n')}\n`, 'utf-8');
    opts.logger.info('Job matrix written to output file', { outputFile: opts.outputFile });
    return;
  }

  const print = opts.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  print(JSON.stringify(document));
}
