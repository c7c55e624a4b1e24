import { describe, expect, test } from 'vitest';
import { Logger, memorySink } from '../../../src/monitoring/logger.js';
import { buildSummaryMessage, TelegramNotifier } from '../../../src/notifications/TelegramNotifier.js';

function notifierWith(respond: (url: URL) => Response | Promise<Response>) {
  const sink = memorySink();
  const calls: URL[] = [];
  const fakeFetch: typeof fetch = async (input: string | URL | Request) => {
    const url = new URL(String(input));
    calls.push(url);
    return respond(url);
  };
  const notifier = new TelegramNotifier({
    token: 'test-token',
    chatId: '-100',
    logger: new Logger({ sinks: [sink] }),
    fetch: fakeFetch,
  });
  return { notifier, calls, sink };
}

describe('buildSummaryMessage', () => {
  test('three lines with the registered count', () => {
    expect(buildSummaryMessage(7).split('\n')).toEqual([
      'Painel New Concluído com êxito 👍🏼📝✅',
      '7 arquivo(s) cadastrado(s).',
      'Por gentileza validar relatório de logs, Obrigado!',
    ]);
  });
});

describe('TelegramNotifier', () => {
  test('sends the summary through the bot sendMessage endpoint', async () => {
    const { notifier, calls } = notifierWith(() => new Response('{"ok":true}', { status: 200 }));

    expect(await notifier.notifyCompletion(3)).toBe(true);

    expect(calls).toHaveLength(1);
    const [url] = calls;
    expect(url?.origin).toBe('https://api.telegram.org');
    expect(url?.pathname).toBe('/bottest-token/sendMessage');
    expect(url?.searchParams.get('chat_id')).toBe('-100');
    expect(url?.searchParams.get('text')).toBe(buildSummaryMessage(3));
  });

  test('a non-200 answer is an undelivered notification', async () => {
    const { notifier, sink } = notifierWith(() => new Response('{"ok":false}', { status: 400 }));

    expect(await notifier.notifyCompletion(3)).toBe(false);
    expect(sink.entries.find((e) => e.level === 'error')).toMatchObject({
      msg: 'Telegram notification rejected',
      status: 400,
    });
  });

  test('a transport failure is logged, never thrown', async () => {
    const { notifier, sink } = notifierWith(() => {
      throw new TypeError('fetch failed');
    });

    expect(await notifier.notifyCompletion(3)).toBe(false);
    expect(sink.messages('error')).toEqual(['Telegram notification failed']);
  });
});
