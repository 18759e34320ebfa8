import { z } from 'zod';
import { ConfigurationError } from '@/domain/errors';
import { parseInterval } from '@/domain/interval';
import type { Instrument } from '@/domain/types';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/** 空文字の環境変数は未設定として扱う */
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

function integer(defaultValue: number, min = 0) {
  return optionalEnv(z.coerce.number().int().min(min).default(defaultValue));
}

/**
 * SYMBOLS を StreamClient ごとのグループに分ける。
 * 'BTCUSDT,ETHUSDT|SOLUSDT' → [['BTCUSDT', 'ETHUSDT'], ['SOLUSDT']]
 */
const symbolGroupsSchema = z.string().transform((value, ctx): Instrument[][] => {
  const groups = value
    .split('|')
    .map((group) =>
      group
        .split(',')
        .map((symbol) => symbol.trim().toUpperCase())
        .filter((symbol) => symbol.length > 0)
    )
    .filter((group) => group.length > 0);

  if (groups.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one symbol is required' });
    return z.NEVER;
  }

  const seen = new Set<Instrument>();
  for (const symbol of groups.flat()) {
    if (!/^[A-Z0-9]+$/.test(symbol)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid symbol "${symbol}"` });
      return z.NEVER;
    }
    if (seen.has(symbol)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `symbol "${symbol}" is listed more than once` });
      return z.NEVER;
    }
    seen.add(symbol);
  }
  return groups;
});

const intervalsSchema = z.string().transform((value, ctx): number[] => {
  const intervals: number[] = [];
  for (const label of value.split(',').map((item) => item.trim()).filter((item) => item.length > 0)) {
    const ms = parseInterval(label);
    if (ms === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid interval "${label}" (expected e.g. 15s, 1m, 4h)` });
      return z.NEVER;
    }
    intervals.push(ms);
  }
  if (intervals.length === 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one interval is required' });
    return z.NEVER;
  }
  return [...new Set(intervals)].sort((a, b) => a - b);
});

const envSchema = z
  .object({
    NODE_ENV: optionalEnv(z.enum(['development', 'production', 'test']).default('development')),
    LOG_LEVEL: optionalEnv(z.enum(LOG_LEVELS).default('info')),

    WS_BASE_URL: optionalEnv(z.string().url().default('wss://stream.binance.com:9443/stream')),
    REST_BASE_URL: optionalEnv(z.string().url().default('https://api.binance.com')),
    SYMBOLS: symbolGroupsSchema,
    CANDLE_INTERVALS: optionalEnv(z.string().default('1m,5m')).pipe(intervalsSchema),
    RULES_FILE: optionalEnv(z.string().default('config/rules.json')),

    SNAPSHOT_LIMIT: integer(1000, 1).pipe(z.number().max(5000)),
    SNAPSHOT_TIMEOUT_MS: integer(10_000, 1),
    MAX_SNAPSHOT_ATTEMPTS: integer(5, 1),
    SNAPSHOT_RETRY_DELAY_MS: integer(1000),
    MAX_BUFFERED_UPDATES: integer(10_000, 1),

    BACKOFF_BASE_MS: integer(1000, 1),
    BACKOFF_MAX_MS: integer(30_000, 1),
    HEARTBEAT_TIMEOUT_MS: integer(60_000),

    DEDUP_WINDOW_SIZE: integer(1000, 1),
    CANDLE_RETENTION: integer(500, 1),
    SIGNAL_RETENTION: integer(200, 1),
    CLOSE_GRACE_MS: integer(2000),

    REDIS_URL: optionalEnv(z.string().url().optional()),
    REDIS_STREAM: optionalEnv(z.string().min(1).default('signals')),
    METRICS_PORT: optionalEnv(z.coerce.number().int().min(1).max(65_535).optional()),
  })
  .superRefine((env, ctx) => {
    if (env.BACKOFF_MAX_MS < env.BACKOFF_BASE_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['BACKOFF_MAX_MS'],
        message: 'must be greater than or equal to BACKOFF_BASE_MS',
      });
    }
  });

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * 起動時に確定する設定値。
 */
export interface AppConfig {
  env: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  stream: {
    wsBaseUrl: string;
    /** StreamClient ごとの銘柄グループ */
    groups: Instrument[][];
    heartbeatTimeoutMs: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
  };
  snapshot: {
    restBaseUrl: string;
    limit: number;
    timeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
    maxBufferedUpdates: number;
  };
  candles: {
    /** 足の長さ（ミリ秒、昇順） */
    intervals: number[];
    dedupWindowSize: number;
    retention: number;
    closeGraceMs: number;
  };
  signals: {
    rulesFile: string;
    retention: number;
  };
  redis: { url: string; stream: string } | null;
  metricsPort: number | null;
}

/**
 * 環境変数を検証して AppConfig を作る。
 * @throws {ConfigurationError} 不正な値がある場合（該当するキーをすべて列挙する）
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`invalid configuration: ${details}`, { cause: result.error });
  }
  const values = result.data;

  return {
    env: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
    stream: {
      wsBaseUrl: values.WS_BASE_URL,
      groups: values.SYMBOLS,
      heartbeatTimeoutMs: values.HEARTBEAT_TIMEOUT_MS,
      backoffBaseMs: values.BACKOFF_BASE_MS,
      backoffMaxMs: values.BACKOFF_MAX_MS,
    },
    snapshot: {
      restBaseUrl: values.REST_BASE_URL,
      limit: values.SNAPSHOT_LIMIT,
      timeoutMs: values.SNAPSHOT_TIMEOUT_MS,
      maxAttempts: values.MAX_SNAPSHOT_ATTEMPTS,
      retryDelayMs: values.SNAPSHOT_RETRY_DELAY_MS,
      maxBufferedUpdates: values.MAX_BUFFERED_UPDATES,
    },
    candles: {
      intervals: values.CANDLE_INTERVALS,
      dedupWindowSize: values.DEDUP_WINDOW_SIZE,
      retention: values.CANDLE_RETENTION,
      closeGraceMs: values.CLOSE_GRACE_MS,
    },
    signals: {
      rulesFile: values.RULES_FILE,
      retention: values.SIGNAL_RETENTION,
    },
    redis: values.REDIS_URL ? { url: values.REDIS_URL, stream: values.REDIS_STREAM } : null,
    metricsPort: values.METRICS_PORT ?? null,
  };
}
