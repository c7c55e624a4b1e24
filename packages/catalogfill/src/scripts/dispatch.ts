#!/usr/bin/env node
/**
 * Dispatch Script
 *
 * Counts pending rows and emits the worker job matrix for the orchestrator.
 * Appends `has_jobs=` and `matrix=` lines to $GITHUB_OUTPUT when set,
 * otherwise prints the matrix JSON on stdout. Logs go to stderr.
 *
 * Usage:
 *   npm run dispatch
 */

import { ConfigError, loadDispatcherConfig, loadDotEnv } from '../config/index.js';
import { createBackendClient } from '../db/client.js';
import { TrackRepository } from '../db/TrackRepository.js';
import { computeJobMatrix, publishJobMatrix } from '../dispatch/jobMatrix.js';
import { consoleSink, errorMessage, Logger } from '../monitoring/logger.js';

async function main(): Promise<void> {
  let logger = new Logger({ service: 'dispatch', sinks: [consoleSink({ stderr: true })] });

  try {
    loadDotEnv();
    const config = loadDispatcherConfig();
    logger = new Logger({ service: 'dispatch', level: config.logLevel, sinks: [consoleSink({ stderr: true })] });

    const repository = new TrackRepository({
      supabase: createBackendClient(config.backend),
      table: config.backend.table,
      logger,
    });

    const matrix = await computeJobMatrix({ repository, logger });
    await publishJobMatrix(matrix, {
      logger,
      ...(config.outputFile !== undefined ? { outputFile: config.outputFile } : {}),
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Configuration error; set the variables below and retry', { issues: err.issues });
    } else {
      logger.error('Unexpected error during dispatch', { error: errorMessage(err) });
    }
    process.exitCode = 1;
  }
}

void main();
