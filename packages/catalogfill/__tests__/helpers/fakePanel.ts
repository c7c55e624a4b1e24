import type { BrowserLauncher } from '../../src/automator/browser.js';
import { SELECTORS, type PanelPage } from '../../src/automator/panel.js';

export const PANEL_URL = 'https://panel.test';

/**
 * Records every page interaction as a readable line, e.g.
 * `click input#titular_2` or `fill input#isrc=BRTST2400001`.
 */
export class FakePanelPage implements PanelPage {
  readonly actions: string[] = [];
  currentUrl = 'about:blank';
  /** Where the login submit lands. */
  afterLoginUrl = `${PANEL_URL}/dashboard`;
  /** Throws for any action line this returns true for. */
  failWhen: (action: string) => boolean = () => false;

  private record(action: string): void {
    this.actions.push(action);
    if (this.failWhen(action)) {
      throw new Error(`Timeout 30000ms exceeded: ${action}`);
    }
  }

  async goto(url: string): Promise<null> {
    this.record(`goto ${url}`);
    this.currentUrl = url;
    return null;
  }

  async fill(selector: string, value: string): Promise<void> {
    this.record(`fill ${selector}=${value}`);
  }

  async click(selector: string): Promise<void> {
    this.record(`click ${selector}`);
    if (selector === SELECTORS.submit) {
      this.currentUrl = this.afterLoginUrl;
    }
  }

  async press(selector: string, key: string): Promise<void> {
    this.record(`press ${selector} ${key}`);
  }

  async waitForSelector(selector: string): Promise<null> {
    this.record(`waitForSelector ${selector}`);
    return null;
  }

  async waitForTimeout(timeout: number): Promise<void> {
    this.record(`wait ${timeout}`);
  }

  url(): string {
    return this.currentUrl;
  }

  /** Actions after the first `goto` of the given path. */
  actionsFrom(path: string): string[] {
    const start = this.actions.indexOf(`goto ${PANEL_URL}${path}`);
    return start === -1 ? [] : this.actions.slice(start);
  }
}

export interface FakeLauncher {
  launch: BrowserLauncher;
  launches: number;
  closes: number;
}

export function fakeLauncher(page: FakePanelPage): FakeLauncher {
  const state: FakeLauncher = {
    launches: 0,
    closes: 0,
    launch: async () => {
      state.launches += 1;
      return {
        page,
        close: async () => {
          state.closes += 1;
        },
      };
    },
  };
  return state;
}
