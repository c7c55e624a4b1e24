#!/usr/bin/env node
/**
 * Upload Spreadsheet Script
 *
 * Seeds the track table from $PLANILHA (default Emitir.xlsx). Asks before
 * clearing the table unless --clear or --no-clear is given.
 * Use with caution - clearing is destructive!
 *
 * Usage:
 *   npm run upload
 *   npm run upload -- --clear
 *   npm run upload -- --no-clear
 */

import { createInterface } from 'node:readline/promises';
import { ConfigError, loadDotEnv, loadUploaderConfig } from '../config/index.js';
import { createBackendClient } from '../db/client.js';
import { TrackRepository } from '../db/TrackRepository.js';
import { errorMessage, Logger } from '../monitoring/logger.js';
import { isAffirmative, parseClearFlag } from '../upload/confirm.js';
import { runUpload } from '../upload/uploadRows.js';

async function askToClear(summary: { spreadsheet: string; table: string; url: string }): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    console.log(`\nPlanilha: ${summary.spreadsheet}`);
    console.log(`Tabela de destino: ${summary.table}`);
    console.log(`Backend: ${summary.url}`);
    const answer = await rl.question('\nLimpar a tabela antes de importar? (s/n): ');
    return isAffirmative(answer);
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  let logger = new Logger({ service: 'upload' });

  try {
    loadDotEnv();
    const config = loadUploaderConfig();
    logger = new Logger({ service: 'upload', level: config.logLevel });
    logger.info('Starting import');

    const target = new TrackRepository({
      supabase: createBackendClient(config.backend),
      table: config.backend.table,
      logger,
    });

    const clearFlag = parseClearFlag(process.argv.slice(2));
    const outcome = await runUpload({
      target,
      spreadsheetPath: config.spreadsheetPath,
      logger,
      confirmClear: async () =>
        clearFlag ??
        askToClear({
          spreadsheet: config.spreadsheetPath,
          table: config.backend.table,
          url: config.backend.url,
        }),
    });

    if (outcome.status !== 'completed') {
      process.exitCode = 1;
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Configuration error; set the variables below and retry', { issues: err.issues });
    } else {
      logger.error('Unexpected error during import', { error: errorMessage(err) });
    }
    process.exitCode = 1;
  }
}

void main();
