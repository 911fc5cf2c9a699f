import { Injectable, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { loadRedisSettings, type RedisSettings } from '../config/redis.config';
import { describeError } from '../common/errors/ingestion.errors';

/**
 * Best-effort key/value access for the report cache.
 * A Redis outage degrades to cache misses; it never fails a batch.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly client: Redis;
  private readonly logger = new Logger(RedisService.name);
  private connected = false;

  constructor(config: ConfigService) {
    const settings = config.get<RedisSettings>('redis') ?? loadRedisSettings(process.env);

    this.client = new Redis({
      ...settings,
      lazyConnect: true,
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => (times > 3 ? null : Math.min(times * 500, 2000)),
    });

    this.client.on('connect', () => {
      this.connected = true;
      this.logger.log(`Connected to Redis at ${settings.host}:${settings.port}`);
    });
    this.client.on('error', (err: Error) => {
      this.connected = false;
      this.logger.warn(`Redis unavailable, report cache disabled: ${err.message}`);
    });
    this.client.on('close', () => {
      this.connected = false;
    });

    this.client.connect().catch((err: unknown) => {
      this.logger.warn(`Redis connect failed: ${describeError(err)}`);
    });
  }

  async get(key: string): Promise<string | null> {
    if (!this.connected) return null;
    try {
      return await this.client.get(key);
    } catch (err) {
      this.logger.debug(`GET ${key} failed: ${describeError(err)}`);
      return null;
    }
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (!this.connected) return;
    try {
      if (ttlSeconds) {
        await this.client.set(key, value, 'EX', ttlSeconds);
      } else {
        await this.client.set(key, value);
      }
    } catch (err) {
      this.logger.debug(`SET ${key} failed: ${describeError(err)}`);
    }
  }

  async del(key: string): Promise<void> {
    if (!this.connected) return;
    try {
      await this.client.del(key);
    } catch (err) {
      this.logger.debug(`DEL ${key} failed: ${describeError(err)}`);
    }
  }

  async onModuleDestroy() {
    if (this.client.status === 'end') return;
    await this.client.quit();
    this.logger.log('Redis connection closed');
  }
}
