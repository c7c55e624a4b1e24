import { chromium } from 'playwright-core';
import type { PanelPage } from './panel.js';

/** A browser page plus the means to tear the whole browser down. */
export interface BrowserSession {
  page: PanelPage;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserSession>;

export interface ChromiumLaunchOptions {
  headless: boolean;
  /** Path to a Chromium build when the default channel is not installed. */
  executablePath?: string;
}

export function chromiumLauncher(opts: ChromiumLaunchOptions): BrowserLauncher {
  return async () => {
    const browser = await chromium.launch({
      headless: opts.headless,
      ...(opts.executablePath ? { executablePath: opts.executablePath } : {}),
    });
    try {
      const page = await browser.newPage();
      return {
        page,
        close: () => browser.close(),
      };
    } catch (err) {
      await browser.close();
      throw err;
    }
  };
}
