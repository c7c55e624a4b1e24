/**
 * TelegramNotifier - Sends the end-of-run summary to the operators' chat.
 *
 * One attempt per run, bounded by a timeout. Delivery failures are logged
 * but never change the run's outcome.
 */

import { errorMessage, type Logger } from '../monitoring/logger.js';

export interface TelegramNotifierConfig {
  token: string;
  chatId: string;
  logger: Logger;
  /** Defaults to the global fetch. */
  fetch?: typeof fetch;
  timeoutMs?: number;
}

export interface CompletionNotifier {
  notifyCompletion(registered: number): Promise<boolean>;
}

const TELEGRAM_API_URL = 'https://api.telegram.org';
const TIMEOUT_MS = 10_000;

export function buildSummaryMessage(registered: number): string {
  return (
    'Painel New Concluído com êxito 👍🏼📝✅\n' +
    `${registered} arquivo(s) cadastrado(s).\n` +
    'Por gentileza validar relatório de logs, Obrigado!'
  );
}

export function buildSendMessageUrl(token: string, chatId: string, text: string): string {
  return (
    `${TELEGRAM_API_URL}/bot${token}/sendMessage` +
    `?chat_id=${encodeURIComponent(chatId)}&text=${encodeURIComponent(text)}`
  );
}

export class TelegramNotifier implements CompletionNotifier {
  private token: string;
  private chatId: string;
  private logger: Logger;
  private fetchImpl: typeof fetch;
  private timeoutMs: number;

  constructor(config: TelegramNotifierConfig) {
    this.token = config.token;
    this.chatId = config.chatId;
    this.logger = config.logger;
    this.fetchImpl = config.fetch ?? ((input: string | URL | Request, init?: RequestInit) => fetch(input, init));
    this.timeoutMs = config.timeoutMs ?? TIMEOUT_MS;
  }

  /**
   * Sends the summary for `registered` rows.
   * Returns true on HTTP 200. Never throws.
   */
  async notifyCompletion(registered: number): Promise<boolean> {
    this.logger.info('Sending Telegram notification', { registered });
    const url = buildSendMessageUrl(this.token, this.chatId, buildSummaryMessage(registered));

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, { method: 'GET', signal: controller.signal });
      if (response.status === 200) {
        this.logger.info('Telegram notification delivered');
        return true;
      }
      this.logger.error('Telegram notification rejected', { status: response.status });
      return false;
    } catch (err) {
      this.logger.error('Telegram notification failed', { error: errorMessage(err) });
      return false;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
