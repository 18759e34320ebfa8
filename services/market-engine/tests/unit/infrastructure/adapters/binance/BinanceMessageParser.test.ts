import { describe, expect, it } from 'vitest';
import { BinanceMessageParser } from '@/infrastructure/adapters/binance/BinanceMessageParser';

/**
 * 単体テスト: BinanceMessageParser
 *
 * - combined stream の封筒と封筒なしの payload
 * - コマンド応答・エラーフレーム
 * - 不正なフレームは null
 */
describe('BinanceMessageParser', () => {
  const parser = new BinanceMessageParser();

  it('封筒付きの差分板更新を DepthUpdate にする', () => {
    const frame = parser.parse(
      JSON.stringify({
        stream: 'btcusdt@depth@100ms',
        data: {
          e: 'depthUpdate',
          E: 1_700_000_000_000,
          s: 'BTCUSDT',
          U: 157,
          u: 160,
          b: [['0.0024', '10']],
          a: [
            ['0.0026', '100'],
            ['0.0027', '0.00000000'],
          ],
        },
      })
    );

    expect(frame?.kind).toBe('events');
    if (frame?.kind !== 'events') {
      return;
    }
    const [event] = frame.events;
    expect(event.type).toBe('depth');
    if (event.type !== 'depth') {
      return;
    }
    expect(event.instrument).toBe('BTCUSDT');
    expect(event.firstUpdateId).toBe(157);
    expect(event.lastUpdateId).toBe(160);
    expect(event.eventTime).toBe(1_700_000_000_000);
    expect(event.bidChanges.map((c) => [c.price.toString(), c.quantity.toString()])).toEqual([['0.0024', '10']]);
    expect(event.askChanges.map((c) => [c.price.toString(), c.quantity.toString()])).toEqual([
      ['0.0026', '100'],
      ['0.0027', '0'],
    ]);
  });

  it('封筒なしの約定を Trade にし、買い手メイカーなら売りとする', () => {
    const frame = parser.parse(
      JSON.stringify({ e: 'trade', E: 2000, s: 'ethusdt', t: 12345, p: '1800.50', q: '0.25', T: 1999, m: true })
    );

    expect(frame).toMatchObject({ kind: 'events' });
    if (frame?.kind !== 'events') {
      return;
    }
    const [event] = frame.events;
    if (event.type !== 'trade') {
      throw new Error(`unexpected event ${event.type}`);
    }
    expect(event.instrument).toBe('ETHUSDT');
    expect(event.tradeId).toBe(12345);
    expect(event.price.toString()).toBe('1800.5');
    expect(event.quantity.toString()).toBe('0.25');
    expect(event.side).toBe('sell');
    expect(event.timestamp).toBe(1999);
  });

  it('買い手テイカーの約定は買い', () => {
    const frame = parser.parse(
      JSON.stringify({ e: 'trade', E: 2000, s: 'BTCUSDT', t: 1, p: '100', q: '1', T: 2000, m: false })
    );

    const event = frame?.kind === 'events' ? frame.events[0] : null;
    expect(event?.type === 'trade' ? event.side : null).toBe('buy');
  });

  it('コマンド応答は control', () => {
    expect(parser.parse('{"result":null,"id":1}')).toEqual({ kind: 'control', id: 1 });
    expect(parser.parse('{"result":["btcusdt@trade"],"id":3}')).toEqual({ kind: 'control', id: 3 });
  });

  it('エラーフレームは error', () => {
    expect(parser.parse('{"error":{"code":2,"msg":"Invalid request"},"id":4}')).toEqual({
      kind: 'error',
      code: 2,
      message: 'Invalid request',
      id: 4,
    });
    expect(parser.parse('{"error":{"msg":"Too many requests"}}')).toEqual({
      kind: 'error',
      code: null,
      message: 'Too many requests',
      id: null,
    });
  });

  it.each([
    ['JSON でない', 'not json'],
    ['未知のイベント', '{"e":"kline","E":1,"s":"BTCUSDT"}'],
    ['負の価格', '{"e":"trade","E":1,"s":"BTCUSDT","t":1,"p":"-1","q":"1","T":1,"m":false}'],
    ['数値の価格', '{"e":"trade","E":1,"s":"BTCUSDT","t":1,"p":100,"q":"1","T":1,"m":false}'],
    ['U が u より大きい', '{"e":"depthUpdate","E":1,"s":"BTCUSDT","U":5,"u":4,"b":[],"a":[]}'],
    ['封筒の中身が不正', '{"stream":"btcusdt@trade","data":{"e":"trade"}}'],
  ])('%s フレームは null', (_label, text) => {
    expect(parser.parse(text)).toBeNull();
  });
});
