import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '@/domain/errors';
import { loadRules, parseRules } from '@/infrastructure/config/loadRules';

const RULES_FILE = fileURLToPath(new URL('../../../../config/rules.json', import.meta.url));

describe('parseRules', () => {
  it('足の長さの表記をミリ秒にし、重要度の既定値を補う', () => {
    expect(parseRules([{ id: 'm', kind: 'momentum', interval: '5m', window: 3, thresholdPct: 1.5 }])).toEqual([
      { id: 'm', kind: 'momentum', interval: 300_000, severity: 'warning', window: 3, thresholdPct: 1.5 },
    ]);
  });

  it('未知の種別はエラー', () => {
    expect(() => parseRules([{ id: 'x', kind: 'rsi', interval: '1m' }])).toThrow(/^invalid rules: \[0\.kind\]/);
  });

  it('種別ごとの制約に反するとエラー', () => {
    expect(() =>
      parseRules([{ id: 'b', kind: 'book_imbalance', interval: '1m', depth: 5, ratio: 0.5 }])
    ).toThrow('[0.ratio]');
    expect(() => parseRules([{ id: 'v', kind: 'volume_spike', interval: '1m', window: 1, multiplier: 3 }])).toThrow(
      '[0.window]'
    );
  });

  it('解釈できない足の長さはエラー', () => {
    expect(() => parseRules([{ id: 's', kind: 'spread_widening', interval: 'weekly', maxSpreadBps: 5 }])).toThrow(
      'invalid rules: [0.interval] invalid interval "weekly"'
    );
  });

  it('ルール ID の重複はエラー', () => {
    const rule = { id: 'dup', kind: 'spread_widening', interval: '1m', maxSpreadBps: 5 };

    expect(() => parseRules([rule, rule])).toThrow('invalid rules: duplicate rule id "dup"');
  });

  it('集計しない足を参照するルールはエラー', () => {
    const rules = [{ id: 'm15', kind: 'momentum', interval: '15m', window: 2, thresholdPct: 1 }];

    expect(() => parseRules(rules, [60_000])).toThrow(
      'invalid rules: rule "m15" uses interval 15m which is not aggregated'
    );
    expect(parseRules(rules)).toHaveLength(1);
  });

  it('配列でなければエラー', () => {
    expect(() => parseRules({ rules: [] })).toThrow(ConfigurationError);
  });
});

describe('loadRules', () => {
  it('同梱のルールファイルを読み込む', async () => {
    const rules = await loadRules(RULES_FILE, [60_000, 300_000]);

    expect(rules.map((rule) => rule.id)).toEqual([
      'volume-spike-1m',
      'momentum-5m',
      'spread-widening-1m',
      'book-imbalance-1m',
    ]);
    expect(rules[0]).toEqual({
      id: 'volume-spike-1m',
      kind: 'volume_spike',
      interval: 60_000,
      severity: 'warning',
      window: 20,
      multiplier: 3,
    });
  });

  it('読み込めないファイルは ConfigurationError', async () => {
    await expect(loadRules('/nonexistent/rules.json')).rejects.toThrow(
      'cannot read rules file /nonexistent/rules.json'
    );
  });
});
