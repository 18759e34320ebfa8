import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { SignalRule } from '@/application/signal/SignalRule';
import { ConfigurationError } from '@/domain/errors';
import { formatInterval, parseInterval } from '@/domain/interval';

const intervalLabel = z.string().transform((value, ctx) => {
  const ms = parseInterval(value);
  if (ms === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid interval "${value}"` });
    return z.NEVER;
  }
  return ms;
});

const ruleBase = {
  id: z.string().min(1),
  interval: intervalLabel,
  severity: z.enum(['info', 'warning', 'critical']).default('warning'),
};

const ruleSchema = z.discriminatedUnion('kind', [
  z.object({
    ...ruleBase,
    kind: z.literal('volume_spike'),
    window: z.number().int().min(2),
    multiplier: z.number().positive(),
  }),
  z.object({
    ...ruleBase,
    kind: z.literal('momentum'),
    window: z.number().int().min(2),
    thresholdPct: z.number().positive(),
  }),
  z.object({
    ...ruleBase,
    kind: z.literal('spread_widening'),
    maxSpreadBps: z.number().positive(),
  }),
  z.object({
    ...ruleBase,
    kind: z.literal('book_imbalance'),
    depth: z.number().int().positive(),
    ratio: z.number().gt(0.5).max(1),
  }),
]);

const rulesSchema = z.array(ruleSchema);

/**
 * ルール定義（JSON を読み込んだ値）を検証して SignalRule に変換する。
 * @param intervals 集計対象の足の長さ。指定した場合、含まれない足を参照するルールはエラー
 * @throws {ConfigurationError}
 */
export function parseRules(raw: unknown, intervals?: readonly number[]): SignalRule[] {
  const result = rulesSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `[${issue.path.join('.')}] ${issue.message}`).join('; ');
    throw new ConfigurationError(`invalid rules: ${details}`, { cause: result.error });
  }

  const ids = new Set<string>();
  for (const rule of result.data) {
    if (ids.has(rule.id)) {
      throw new ConfigurationError(`invalid rules: duplicate rule id "${rule.id}"`);
    }
    ids.add(rule.id);
    if (intervals && !intervals.includes(rule.interval)) {
      throw new ConfigurationError(
        `invalid rules: rule "${rule.id}" uses interval ${formatInterval(rule.interval)} which is not aggregated`
      );
    }
  }
  return result.data;
}

/**
 * ルールファイル（JSON 配列）を読み込む。
 * @throws {ConfigurationError} 読み込めない、または内容が不正な場合
 */
export async function loadRules(path: string, intervals?: readonly number[]): Promise<SignalRule[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`cannot read rules file ${path}`, { cause: error });
  }
  return parseRules(raw, intervals);
}
