import { describe, expect, test } from 'vitest';
import { isAffirmative, parseClearFlag } from '../../../src/upload/confirm.js';
import { normalizeColumnName, normalizeRecord } from '../../../src/upload/normalize.js';

describe('normalizeColumnName', () => {
  test('trims and upper-cases', () => {
    expect(normalizeColumnName('  isrc ')).toBe('ISRC');
    expect(normalizeColumnName('Titulares')).toBe('TITULARES');
  });
});

describe('normalizeRecord', () => {
  test('upper-cases keys, trims text and drops absent cells', () => {
    expect(
      normalizeRecord({
        ' isrc': ' BRTST2400001 ',
        Artista: 'Banda Teste',
        titulares: null,
        ano: 2024,
        duracao: Number.NaN,
        obs: undefined,
      }),
    ).toEqual({ ISRC: 'BRTST2400001', ARTISTA: 'Banda Teste', ANO: 2024 });
  });

  test('is idempotent', () => {
    const samples: Record<string, unknown>[] = [
      { isrc: ' BRTST2400002', artista: 'Outra Banda ', TITULARES: 'Titular Um' },
      { ' Mixed Case ': 0, empty: '', missing: null },
      {},
    ];
    for (const raw of samples) {
      const once = normalizeRecord(raw);
      expect(normalizeRecord(once)).toEqual(once);
    }
  });

  test('keeps empty strings, which the backend stores as empty', () => {
    expect(normalizeRecord({ obs: '   ' })).toEqual({ OBS: '' });
  });
});

describe('isAffirmative', () => {
  test.each(['s', 'S', 'sim', ' Sim ', 'y', 'YES'])('%j means yes', (answer) => {
    expect(isAffirmative(answer)).toBe(true);
  });

  test.each(['n', 'nao', '', 'si'])('%j means no', (answer) => {
    expect(isAffirmative(answer)).toBe(false);
  });
});

describe('parseClearFlag', () => {
  test('explicit flags skip the question', () => {
    expect(parseClearFlag(['--clear'])).toBe(true);
    expect(parseClearFlag(['--no-clear'])).toBe(false);
    expect(parseClearFlag(['--clear', '--no-clear'])).toBe(false);
    expect(parseClearFlag([])).toBeUndefined();
  });
});
