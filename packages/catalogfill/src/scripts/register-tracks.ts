#!/usr/bin/env node
/**
 * Register Tracks Script
 *
 * One registration worker: fetches its slice of pending rows, logs into the
 * panel and registers each row, then reports to Telegram.
 *
 * Logs go to painel_novo_<WORKER_ID>.log in $LOG_DIR and to the console.
 *
 * Usage:
 *   npm run register
 *   WORKER_ID=2 JOB_OFFSET=250 JOB_LIMIT=250 npm run register
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { chromiumLauncher } from '../automator/browser.js';
import { FormAutomator } from '../automator/FormAutomator.js';
import { ConfigError, loadAutomatorConfig, loadDotEnv } from '../config/index.js';
import { createBackendClient } from '../db/client.js';
import { TrackRepository } from '../db/TrackRepository.js';
import { consoleSink, errorMessage, fileSink, Logger } from '../monitoring/logger.js';
import { TelegramNotifier } from '../notifications/TelegramNotifier.js';

function workerLogFile(logDir: string, workerId: string): string {
  return join(logDir, `painel_novo_${workerId}.log`);
}

async function main(): Promise<void> {
  let logger = new Logger({ service: 'register' });

  try {
    loadDotEnv();
    const config = loadAutomatorConfig();

    mkdirSync(config.logDir, { recursive: true });
    logger = new Logger({
      service: 'register',
      level: config.logLevel,
      workerId: config.workerId,
      sinks: [consoleSink(), fileSink(workerLogFile(config.logDir, config.workerId))],
    });
    logger.info('Starting registration worker', {
      offset: config.slice?.offset ?? null,
      limit: config.slice?.limit ?? null,
    });

    const automator = new FormAutomator({
      workerId: config.workerId,
      repository: new TrackRepository({
        supabase: createBackendClient(config.backend),
        table: config.backend.table,
        logger,
      }),
      launchBrowser: chromiumLauncher(config.browser),
      notifier: new TelegramNotifier({
        token: config.telegram.token,
        chatId: config.telegram.chatId,
        logger,
      }),
      logger,
      panel: config.panel,
      ...(config.slice ? { slice: config.slice } : {}),
      notificationsDisabled: config.telegram.disabled,
    });

    const summary = await automator.run();
    logger.info('Worker finished', { ...summary });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Configuration error; set the variables below and retry', { issues: err.issues });
    } else {
      logger.error('Unexpected error; check the log above for the last row handled', { error: errorMessage(err) });
    }
    process.exitCode = 1;
  } finally {
    await logger.close();
  }
}

void main();
