import { STATUS_ERROR, STATUS_SUCCESS, type TrackStatus } from '../config/constants.js';
import type { JobSliceWindow } from '../config/env.js';
import type { TrackRow } from '../db/TrackRepository.js';
import { errorMessage, type Logger } from '../monitoring/logger.js';
import type { CompletionNotifier } from '../notifications/TelegramNotifier.js';
import type { BrowserLauncher, BrowserSession } from './browser.js';
import { PanelSession } from './panel.js';
import { readTrack } from './track.js';

/**
 * FormAutomator - One worker's registration run.
 *
 *   INIT -> FETCH_ROWS -> (no rows: DONE) -> START_BROWSER -> LOGIN
 *        -> (fail: ABORT) -> PROCESS_ROW* -> NOTIFY -> DONE
 *
 * Rows are handled strictly one after another on a single page. Every row
 * that reaches the form gets exactly one status write; rows missing a
 * required field get none and stay pending.
 */

// --- Types ---

export type RunState =
  | 'INIT'
  | 'FETCH_ROWS'
  | 'START_BROWSER'
  | 'LOGIN'
  | 'PROCESS_ROW'
  | 'NOTIFY'
  | 'ABORT'
  | 'DONE';

export type RunOutcome = 'no_rows' | 'login_failed' | 'completed';

export interface RunSummary {
  outcome: RunOutcome;
  fetched: number;
  registered: number;
  failed: number;
  skipped: number;
  notified: boolean;
}

export interface TrackSource {
  fetchPending(slice?: JobSliceWindow): Promise<TrackRow[]>;
  markStatus(code: string, status: TrackStatus): Promise<boolean>;
}

export interface FormAutomatorOptions {
  workerId: string;
  repository: TrackSource;
  launchBrowser: BrowserLauncher;
  notifier: CompletionNotifier;
  logger: Logger;
  panel: {
    baseUrl: string;
    username: string;
    password: string;
  };
  slice?: JobSliceWindow;
  notificationsDisabled?: boolean;
  /** Observes state transitions; used by tests and debug logging. */
  onStateChange?: (state: RunState) => void;
}

// --- Implementation ---

export class FormAutomator {
  private workerId: string;
  private repository: TrackSource;
  private launchBrowser: BrowserLauncher;
  private notifier: CompletionNotifier;
  private logger: Logger;
  private panel: FormAutomatorOptions['panel'];
  private slice: JobSliceWindow | undefined;
  private notificationsDisabled: boolean;
  private onStateChange: ((state: RunState) => void) | undefined;

  constructor(opts: FormAutomatorOptions) {
    this.workerId = opts.workerId;
    this.repository = opts.repository;
    this.launchBrowser = opts.launchBrowser;
    this.notifier = opts.notifier;
    this.logger = opts.logger;
    this.panel = opts.panel;
    this.slice = opts.slice;
    this.notificationsDisabled = opts.notificationsDisabled ?? false;
    this.onStateChange = opts.onStateChange;
  }

  async run(): Promise<RunSummary> {
    this.enter('INIT');
    const summary: RunSummary = {
      outcome: 'completed',
      fetched: 0,
      registered: 0,
      failed: 0,
      skipped: 0,
      notified: false,
    };

    this.enter('FETCH_ROWS');
    const rows = await this.repository.fetchPending(this.slice);
    summary.fetched = rows.length;
    if (rows.length === 0) {
      this.logger.info('Nothing to process; finishing');
      this.enter('DONE');
      return { ...summary, outcome: 'no_rows' };
    }

    this.enter('START_BROWSER');
    const browser = await this.launchBrowser();
    try {
      this.enter('LOGIN');
      const session = new PanelSession({ page: browser.page, baseUrl: this.panel.baseUrl, logger: this.logger });
      if (!(await session.login(this.panel.username, this.panel.password))) {
        this.enter('ABORT');
        return { ...summary, outcome: 'login_failed' };
      }

      this.logger.info('Starting registration', { total: rows.length });
      for (const [index, row] of rows.entries()) {
        this.enter('PROCESS_ROW');
        await this.processRow(session, row, index, rows.length, summary);
      }
      this.logger.info('Registration finished', {
        registered: summary.registered,
        failed: summary.failed,
        skipped: summary.skipped,
      });

      if (!this.notificationsDisabled) {
        this.enter('NOTIFY');
        summary.notified = await this.notifier.notifyCompletion(summary.registered);
      }

      this.enter('DONE');
      return summary;
    } finally {
      await this.release(browser);
    }
  }

  private async processRow(
    session: PanelSession,
    row: TrackRow,
    index: number,
    total: number,
    summary: RunSummary,
  ): Promise<void> {
    const log = this.logger.child({ row: index + 1, total });
    const read = readTrack(row);
    if (!read.ok) {
      summary.skipped += 1;
      log.warn('Incomplete row skipped', { missing: read.missing });
      return;
    }

    const { track, rowCode } = read;
    try {
      await session.registerTrack(track);
    } catch (err) {
      summary.failed += 1;
      log.error('Registration failed', { isrc: track.code, error: errorMessage(err) });
      if (!(await this.repository.markStatus(rowCode, STATUS_ERROR))) {
        log.warn('Error status update failed; row stays pending', { isrc: track.code });
      }
      return;
    }

    if (await this.repository.markStatus(rowCode, STATUS_SUCCESS)) {
      summary.registered += 1;
      log.info('Track registered', {
        isrc: track.code,
        artist: track.artist,
        holders: track.holders,
      });
    } else {
      log.warn('Track registered but status update failed', { isrc: track.code });
    }
  }

  private async release(browser: BrowserSession): Promise<void> {
    try {
      await browser.close();
    } catch (err) {
      this.logger.warn('Browser did not close cleanly', { error: errorMessage(err) });
    }
  }

  private enter(state: RunState): void {
    this.logger.debug('State', { state, workerId: this.workerId });
    this.onStateChange?.(state);
  }
}
