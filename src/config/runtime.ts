import { parseOptionalString, parsePositiveInteger } from './env';

export type RuntimeConfig = {
  port: number;
  databaseUrl: string | null;
  redisUrl: string | null;
  eventsChannel: string;
  healthDbTimeoutMs: number;
};

export function getRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    port: parsePositiveInteger(env.PORT, 3000),
    databaseUrl: parseOptionalString(env.DATABASE_URL),
    redisUrl: parseOptionalString(env.REDIS_URL),
    eventsChannel: parseOptionalString(env.EVENTS_CHANNEL) ?? 'lot-dispense:events',
    healthDbTimeoutMs: parsePositiveInteger(env.HEALTH_DB_TIMEOUT_MS, 1500)
  };
}
