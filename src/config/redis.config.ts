import { registerAs } from '@nestjs/config';

export interface RedisSettings {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db: number;
  tls?: { rejectUnauthorized: boolean };
}

/**
 * REDIS_URL wins over the discrete REDIS_* variables when both are set.
 * The same settings back the BullMQ connection and the report cache.
 */
export function loadRedisSettings(env: NodeJS.ProcessEnv): RedisSettings {
  const db = parseInt(env.REDIS_DB || '0', 10);

  if (env.REDIS_URL) {
    const url = new URL(env.REDIS_URL);
    return {
      host: url.hostname,
      port: parseInt(url.port || '6379', 10),
      username: url.username || undefined,
      password: url.password || undefined,
      db,
      tls: url.protocol === 'rediss:' ? { rejectUnauthorized: false } : undefined,
    };
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    db,
  };
}

export default registerAs('redis', () => loadRedisSettings(process.env));
