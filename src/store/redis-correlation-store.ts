import { Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import Redis from 'ioredis';
import type { StoreConfig } from '../config/store.config';
import type { CorrelationStore } from './correlation-store';

/**
 * CorrelationStore over Redis
 */
export class RedisCorrelationStore implements CorrelationStore, OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(RedisCorrelationStore.name);
  private readonly redis: Redis;

  constructor(private readonly config: StoreConfig) {
    this.redis = new Redis({
      host: config.host,
      port: config.port,
      db: config.db,
      password: config.password,
      lazyConnect: true,
    });
  }

  async onModuleInit() {
    this.logger.log(`Connecting to redis instance at '${this.config.host}:${this.config.port}'`);
    await this.redis.connect();
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, 'EX', ttlSeconds);
  }

  async onApplicationShutdown() {
    this.logger.log('Closing redis connection');
    await this.redis.quit();
  }
}
