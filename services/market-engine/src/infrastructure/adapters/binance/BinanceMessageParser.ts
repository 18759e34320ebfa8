import Decimal from 'decimal.js';
import type { MessageParser, ParsedFrame } from '@/application/interfaces/MessageParser';
import type { DepthUpdate, MarketEvent, PriceLevelChange, Trade } from '@/domain/types';
import {
  type BinanceDepthUpdate,
  type BinancePriceLevel,
  type BinanceTrade,
  combinedEnvelopeSchema,
  commandAckSchema,
  errorFrameSchema,
  streamPayloadSchema,
} from './messages/BinanceRawMessage';

/**
 * インフラ層: Binance メッセージ形式のパース処理
 *
 * 責務: テキストフレーム → ParsedFrame への変換。
 * combined stream の封筒（{ stream, data }）と封筒なしの payload のどちらも受け付ける。
 */
export class BinanceMessageParser implements MessageParser {
  parse(text: string): ParsedFrame | null {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return null;
    }

    const errorFrame = errorFrameSchema.safeParse(raw);
    if (errorFrame.success) {
      return {
        kind: 'error',
        code: errorFrame.data.error.code ?? null,
        message: errorFrame.data.error.msg,
        id: errorFrame.data.id ?? null,
      };
    }

    const ack = commandAckSchema.safeParse(raw);
    if (ack.success) {
      return { kind: 'control', id: ack.data.id };
    }

    const envelope = combinedEnvelopeSchema.safeParse(raw);
    const payload = streamPayloadSchema.safeParse(envelope.success ? envelope.data.data : raw);
    if (!payload.success) {
      return null;
    }

    const event: MarketEvent =
      payload.data.e === 'depthUpdate' ? toDepthUpdate(payload.data) : toTrade(payload.data);
    return { kind: 'events', events: [event] };
  }
}

function toDepthUpdate(message: BinanceDepthUpdate): DepthUpdate {
  return {
    type: 'depth',
    instrument: message.s.toUpperCase(),
    firstUpdateId: message.U,
    lastUpdateId: message.u,
    eventTime: message.E,
    bidChanges: message.b.map(toLevelChange),
    askChanges: message.a.map(toLevelChange),
  };
}

function toTrade(message: BinanceTrade): Trade {
  return {
    type: 'trade',
    instrument: message.s.toUpperCase(),
    tradeId: message.t,
    price: new Decimal(message.p),
    quantity: new Decimal(message.q),
    side: message.m ? 'sell' : 'buy',
    timestamp: message.T,
  };
}

export function toLevelChange([price, quantity]: BinancePriceLevel): PriceLevelChange {
  return { price: new Decimal(price), quantity: new Decimal(quantity) };
}
