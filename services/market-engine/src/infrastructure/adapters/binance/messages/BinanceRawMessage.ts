import { z } from 'zod';

/**
 * Binance Spot WebSocket / REST で受け取るメッセージのスキーマ定義。
 *
 * 価格・数量は文字列で届く。Decimal に変換する前にここで形式を検証する。
 */

const decimalString = z.string().regex(/^\d+(\.\d+)?$/, 'not a non-negative decimal');

/** [価格, 数量] */
export const priceLevelSchema = z.tuple([decimalString, decimalString]);

/**
 * 差分板更新（<symbol>@depth@100ms）
 */
export const depthUpdateSchema = z
  .object({
    e: z.literal('depthUpdate'),
    E: z.number().int(),
    s: z.string().min(1),
    U: z.number().int().nonnegative(),
    u: z.number().int().nonnegative(),
    b: z.array(priceLevelSchema),
    a: z.array(priceLevelSchema),
  })
  .refine((update) => update.U <= update.u, { message: 'first update id is after last update id' });

/**
 * 約定（<symbol>@trade）。m が true なら買い手がメイカー、つまりテイカーは売り。
 */
export const tradeSchema = z.object({
  e: z.literal('trade'),
  E: z.number().int(),
  s: z.string().min(1),
  t: z.number().int().nonnegative(),
  p: decimalString,
  q: decimalString,
  T: z.number().int().nonnegative(),
  m: z.boolean(),
});

export const streamPayloadSchema = z.union([depthUpdateSchema, tradeSchema]);

/**
 * /stream エンドポイントの combined stream 形式
 */
export const combinedEnvelopeSchema = z.object({
  stream: z.string(),
  data: z.unknown(),
});

/**
 * SUBSCRIBE / UNSUBSCRIBE などへの応答
 */
export const commandAckSchema = z.object({
  result: z.union([z.null(), z.array(z.string())]),
  id: z.number().int().nullable(),
});

export const errorFrameSchema = z.object({
  error: z.object({
    code: z.number().int().nullable().optional(),
    msg: z.string(),
  }),
  id: z.number().int().nullable().optional(),
});

/**
 * GET /api/v3/depth の応答
 */
export const depthSnapshotSchema = z.object({
  lastUpdateId: z.number().int().nonnegative(),
  bids: z.array(priceLevelSchema),
  asks: z.array(priceLevelSchema),
});

export type BinanceDepthUpdate = z.infer<typeof depthUpdateSchema>;
export type BinanceTrade = z.infer<typeof tradeSchema>;
export type BinanceDepthSnapshot = z.infer<typeof depthSnapshotSchema>;
export type BinancePriceLevel = z.infer<typeof priceLevelSchema>;

/**
 * 送信するコマンド
 */
export interface BinanceCommand {
  method: 'SUBSCRIBE' | 'UNSUBSCRIBE';
  params: string[];
  id: number;
}
