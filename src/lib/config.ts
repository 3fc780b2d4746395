import 'dotenv/config';
import { z } from 'zod';

// Empty strings in .env mean "not set".
const blank = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z.object({
  DASHBOARD_API_URL: z.preprocess(blank, z.string().trim().optional()),
  API_KEY: z.preprocess(blank, z.string().trim().optional()),
  TELEGRAM_TOKEN: z.preprocess(blank, z.string().trim().optional()),
  ADMIN_CHAT_ID: z.preprocess(blank, z.string().trim().optional()),
  PORT: z.preprocess(blank, z.coerce.number().int().positive().default(3000)),
  ALERT_INTERVAL_MS: z.preprocess(blank, z.coerce.number().int().positive().default(300_000)),
  SCHEDULER: z.preprocess(blank, z.enum(['interval', 'bullmq']).default('interval')),
  REDIS_URL: z.preprocess(blank, z.string().default('redis://127.0.0.1:6379')),
});

export type SchedulerBackend = z.infer<typeof EnvSchema>['SCHEDULER'];

export interface AppConfig {
  dashboard: { baseUrl?: string; apiKey?: string };
  /** Operator channel; alerts are only scheduled when this is set. */
  telegram?: { botToken: string; chatId: string };
  port: number;
  alertIntervalMs: number;
  scheduler: SchedulerBackend;
  redisUrl: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  const { TELEGRAM_TOKEN: botToken, ADMIN_CHAT_ID: chatId } = parsed;
  return {
    dashboard: { baseUrl: parsed.DASHBOARD_API_URL, apiKey: parsed.API_KEY },
    telegram: botToken && chatId ? { botToken, chatId } : undefined,
    port: parsed.PORT,
    alertIntervalMs: parsed.ALERT_INTERVAL_MS,
    scheduler: parsed.SCHEDULER,
    redisUrl: parsed.REDIS_URL,
  };
}
