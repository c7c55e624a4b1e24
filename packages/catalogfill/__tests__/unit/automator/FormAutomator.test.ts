import { beforeEach, describe, expect, test, vi, type Mock } from 'vitest';
import { FormAutomator, type RunState, type TrackSource } from '../../../src/automator/FormAutomator.js';
import { STATUS_ERROR, STATUS_SUCCESS, type TrackStatus } from '../../../src/config/constants.js';
import type { JobSliceWindow } from '../../../src/config/env.js';
import type { TrackRow } from '../../../src/db/TrackRepository.js';
import { Logger, memorySink, type MemorySink } from '../../../src/monitoring/logger.js';
import { fakeLauncher, FakePanelPage, PANEL_URL, type FakeLauncher } from '../../helpers/fakePanel.js';

// --- Fakes ---

class FakeTrackSource implements TrackSource {
  readonly writes: Array<[string, TrackStatus]> = [];
  readonly slices: Array<JobSliceWindow | undefined> = [];
  /** Codes whose status write the backend rejects. */
  rejectWritesFor = new Set<string>();

  constructor(private rows: TrackRow[]) {}

  async fetchPending(slice?: JobSliceWindow): Promise<TrackRow[]> {
    this.slices.push(slice);
    return this.rows;
  }

  async markStatus(code: string, status: TrackStatus): Promise<boolean> {
    this.writes.push([code, status]);
    return !this.rejectWritesFor.has(code);
  }
}

function row(n: number, overrides: TrackRow = {}): TrackRow {
  return {
    id: n,
    ISRC: `BRTST24000${String(n).padStart(2, '0')}`,
    ARTISTA: `Banda ${n}`,
    TITULARES: `Titular ${n}`,
    PAINEL_NEW: null,
    ...overrides,
  };
}

// --- Tests ---

describe('FormAutomator', () => {
  let page: FakePanelPage;
  let launcher: FakeLauncher;
  let sink: MemorySink;
  let notifier: { notifyCompletion: Mock<(registered: number) => Promise<boolean>> };
  let states: RunState[];

  beforeEach(() => {
    page = new FakePanelPage();
    launcher = fakeLauncher(page);
    sink = memorySink();
    notifier = { notifyCompletion: vi.fn(async (_registered: number) => true) };
    states = [];
  });

  function automator(source: TrackSource, extra: { slice?: JobSliceWindow; notificationsDisabled?: boolean } = {}) {
    return new FormAutomator({
      workerId: '1',
      repository: source,
      launchBrowser: launcher.launch,
      notifier,
      logger: new Logger({ level: 'debug', sinks: [sink] }),
      panel: { baseUrl: PANEL_URL, username: 'operator', password: 'test-password' },
      onStateChange: (state) => states.push(state),
      ...extra,
    });
  }

  test('no pending rows: no browser, no notification', async () => {
    const summary = await automator(new FakeTrackSource([])).run();

    expect(summary).toEqual({
      outcome: 'no_rows',
      fetched: 0,
      registered: 0,
      failed: 0,
      skipped: 0,
      notified: false,
    });
    expect(launcher.launches).toBe(0);
    expect(notifier.notifyCompletion).not.toHaveBeenCalled();
    expect(states).toEqual(['INIT', 'FETCH_ROWS', 'DONE']);
  });

  test('passes its slice window to the fetch', async () => {
    const source = new FakeTrackSource([]);
    await automator(source, { slice: { offset: 250, limit: 250 } }).run();
    expect(source.slices).toEqual([{ offset: 250, limit: 250 }]);
  });

  test('failed login: no rows touched, no notification, browser closed', async () => {
    page.afterLoginUrl = `${PANEL_URL}/login?login_error`;
    const source = new FakeTrackSource([row(1), row(2)]);

    const summary = await automator(source).run();

    expect(summary.outcome).toBe('login_failed');
    expect(source.writes).toEqual([]);
    expect(page.actions).not.toContain(`goto ${PANEL_URL}/musicas/add`);
    expect(notifier.notifyCompletion).not.toHaveBeenCalled();
    expect(launcher.closes).toBe(1);
    expect(states).toEqual(['INIT', 'FETCH_ROWS', 'START_BROWSER', 'LOGIN', 'ABORT']);
  });

  test('registers every row in order and reports the count', async () => {
    const source = new FakeTrackSource([row(1), row(2), row(3)]);

    const summary = await automator(source).run();

    expect(summary).toEqual({
      outcome: 'completed',
      fetched: 3,
      registered: 3,
      failed: 0,
      skipped: 0,
      notified: true,
    });
    expect(source.writes).toEqual([
      ['BRTST2400001', STATUS_SUCCESS],
      ['BRTST2400002', STATUS_SUCCESS],
      ['BRTST2400003', STATUS_SUCCESS],
    ]);
    expect(page.actions.filter((a) => a.startsWith('fill input#isrc='))).toEqual([
      'fill input#isrc=BRTST2400001',
      'fill input#isrc=BRTST2400002',
      'fill input#isrc=BRTST2400003',
    ]);
    expect(notifier.notifyCompletion).toHaveBeenCalledWith(3);
    expect(launcher.launches).toBe(1);
    expect(launcher.closes).toBe(1);
    expect(states).toEqual([
      'INIT',
      'FETCH_ROWS',
      'START_BROWSER',
      'LOGIN',
      'PROCESS_ROW',
      'PROCESS_ROW',
      'PROCESS_ROW',
      'NOTIFY',
      'DONE',
    ]);
  });

  test('rows missing a field are skipped without a status write', async () => {
    const source = new FakeTrackSource([row(1, { TITULARES: '' }), row(2)]);

    const summary = await automator(source).run();

    expect(summary).toMatchObject({ registered: 1, skipped: 1, failed: 0 });
    expect(source.writes).toEqual([['BRTST2400002', STATUS_SUCCESS]]);
    expect(sink.entries.find((e) => e.msg === 'Incomplete row skipped')).toMatchObject({
      row: 1,
      total: 2,
      missing: ['holders'],
    });
  });

  test('a form failure marks that row as errored once and moves on', async () => {
    page.failWhen = (action) => action === 'fill input#isrc=BRTST2400001';
    const source = new FakeTrackSource([row(1), row(2)]);

    const summary = await automator(source).run();

    expect(summary).toMatchObject({ outcome: 'completed', registered: 1, failed: 1 });
    expect(source.writes).toEqual([
      ['BRTST2400001', STATUS_ERROR],
      ['BRTST2400002', STATUS_SUCCESS],
    ]);
    expect(notifier.notifyCompletion).toHaveBeenCalledWith(1);
  });

  test('a failed error write is logged once and the next row still runs', async () => {
    page.failWhen = (action) => action === 'fill input#isrc=BRTST2400001';
    const source = new FakeTrackSource([row(1), row(2)]);
    source.rejectWritesFor.add('BRTST2400001');

    const summary = await automator(source).run();

    expect(summary).toMatchObject({ outcome: 'completed', registered: 1, failed: 1 });
    expect(source.writes).toEqual([
      ['BRTST2400001', STATUS_ERROR],
      ['BRTST2400002', STATUS_SUCCESS],
    ]);
    expect(sink.entries.find((e) => e.level === 'warn')).toMatchObject({
      msg: 'Error status update failed; row stays pending',
      row: 1,
      isrc: 'BRTST2400001',
    });
  });

  test('status writes target the code as stored, the form gets it trimmed', async () => {
    const source = new FakeTrackSource([row(1, { ISRC: 'BRTST2400001 ' })]);

    const summary = await automator(source).run();

    expect(summary.registered).toBe(1);
    expect(page.actions).toContain('fill input#isrc=BRTST2400001');
    expect(source.writes).toEqual([['BRTST2400001 ', STATUS_SUCCESS]]);
  });

  test('row logs carry the row position', async () => {
    await automator(new FakeTrackSource([row(1), row(2)])).run();

    const registered = sink.entries.filter((e) => e.msg === 'Track registered');
    expect(registered.map((e) => [e.row, e.total, e.isrc])).toEqual([
      [1, 2, 'BRTST2400001'],
      [2, 2, 'BRTST2400002'],
    ]);
  });

  test('a rejected success write does not count as registered', async () => {
    const source = new FakeTrackSource([row(1), row(2)]);
    source.rejectWritesFor.add('BRTST2400001');

    const summary = await automator(source).run();

    expect(summary).toMatchObject({ registered: 1, failed: 0 });
    expect(source.writes).toEqual([
      ['BRTST2400001', STATUS_SUCCESS],
      ['BRTST2400002', STATUS_SUCCESS],
    ]);
    expect(sink.messages('warn')).toEqual(['Track registered but status update failed']);
  });

  test('disabled notifications skip the notify step', async () => {
    const summary = await automator(new FakeTrackSource([row(1)]), { notificationsDisabled: true }).run();

    expect(summary).toMatchObject({ outcome: 'completed', registered: 1, notified: false });
    expect(notifier.notifyCompletion).not.toHaveBeenCalled();
    expect(states).not.toContain('NOTIFY');
  });

  test('an undelivered notification does not change the outcome', async () => {
    notifier.notifyCompletion.mockResolvedValue(false);

    const summary = await automator(new FakeTrackSource([row(1)])).run();

    expect(summary).toMatchObject({ outcome: 'completed', registered: 1, notified: false });
  });

  test('closes the browser when a step throws unexpectedly', async () => {
    const source = new FakeTrackSource([row(1)]);
    vi.spyOn(source, 'markStatus').mockRejectedValue(new Error('socket hang up'));

    await expect(automator(source).run()).rejects.toThrow('socket hang up');
    expect(launcher.closes).toBe(1);
  });
});
