import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { StoreConfig } from '../config/store.config';
import { CORRELATION_STORE } from './correlation-store';
import { RedisCorrelationStore } from './redis-correlation-store';

/**
 * Store module binds the CorrelationStore contract to Redis
 */
@Module({
  providers: [
    {
      provide: CORRELATION_STORE,
      useFactory: (configService: ConfigService) => {
        const config = configService.get<StoreConfig>('store');
        if (!config) {
          throw new Error('Store configuration not found');
        }
        return new RedisCorrelationStore(config);
      },
      inject: [ConfigService],
    },
  ],
  exports: [CORRELATION_STORE],
})
export class StoreModule {}
