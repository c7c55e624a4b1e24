/**
 * Page driver for the registration panel.
 *
 * Selectors and the holder checkbox order mirror the panel's form layout;
 * the order of HOLDER_CHECKBOXES is the form's own and must not be sorted.
 */

import { errorMessage, type Logger } from '../monitoring/logger.js';
import type { Track } from './track.js';

// --- Constants ---

export const PANEL_PATHS = {
  login: '/login?login_error',
  addTrack: '/musicas/add',
} as const;

export const SELECTORS = {
  username: 'input#login-username',
  password: 'input#login-password',
  submit: 'button[type="submit"]',
  title: 'input#titulo',
  code: 'input#isrc',
  holderSelector: 'span.select2-selection',
  holderSearch: 'input.select2-search__field',
  addHolder: 'button#AdicionarTitular',
  save: 'button#BtnSalvar',
} as const;

export const HOLDER_CHECKBOXES = [
  'input#titular_2',
  'input#titular_1',
  'input#titular_4',
  'input#titular_5',
  'input#titular_3',
] as const;

export const LOGIN_SETTLE_MS = 2_000;
export const FORM_SETTLE_MS = 500;

// --- Page contract ---

/**
 * The slice of a Playwright `Page` the panel needs. A real page satisfies it;
 * tests hand in a recording fake.
 */
export interface PanelPage {
  goto(url: string): Promise<unknown>;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
  press(selector: string, key: string): Promise<void>;
  waitForSelector(selector: string): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  url(): string;
}

/** A post-submit address still on the login page means the login failed. */
export function isLoginAddress(url: string): boolean {
  return url.includes('login');
}

// --- Session ---

export interface PanelSessionConfig {
  page: PanelPage;
  baseUrl: string;
  logger: Logger;
}

export class PanelSession {
  private page: PanelPage;
  private baseUrl: string;
  private logger: Logger;

  constructor(config: PanelSessionConfig) {
    this.page = config.page;
    this.baseUrl = config.baseUrl;
    this.logger = config.logger;
  }

  /** Returns false, after logging why, when the panel did not let us in. */
  async login(username: string, password: string): Promise<boolean> {
    this.logger.info('Logging into panel');
    try {
      await this.page.goto(this.baseUrl + PANEL_PATHS.login);
      await this.page.fill(SELECTORS.username, username);
      await this.page.fill(SELECTORS.password, password);
      await this.page.click(SELECTORS.submit);
      await this.page.waitForTimeout(LOGIN_SETTLE_MS);

      const address = this.page.url();
      if (isLoginAddress(address)) {
        this.logger.error('Login failed: still on the login page', { address });
        return false;
      }

      this.logger.info('Login succeeded');
      return true;
    } catch (err) {
      this.logger.error('Login attempt raised', { error: errorMessage(err) });
      return false;
    }
  }

  /** Fills and saves the add-track form. Throws on any interaction failure. */
  async registerTrack(track: Track): Promise<void> {
    await this.page.goto(this.baseUrl + PANEL_PATHS.addTrack);
    await this.page.waitForSelector(SELECTORS.title);
    await this.page.fill(SELECTORS.title, track.artist);
    await this.page.fill(SELECTORS.code, track.code);

    await this.page.click(SELECTORS.holderSelector);
    await this.page.waitForSelector(SELECTORS.holderSearch);
    await this.page.fill(SELECTORS.holderSearch, track.holders);
    await this.page.press(SELECTORS.holderSearch, 'Enter');
    await this.page.waitForTimeout(FORM_SETTLE_MS);

    for (const checkbox of HOLDER_CHECKBOXES) {
      await this.page.click(checkbox);
    }

    await this.page.waitForTimeout(FORM_SETTLE_MS);
    await this.page.click(SELECTORS.addHolder);
    await this.page.click(SELECTORS.save);
  }
}
