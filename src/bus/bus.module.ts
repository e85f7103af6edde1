import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { BusConfig } from '../config/bus.config';
import { MESSAGE_BUS } from './message-bus';
import { PubSubMessageBus } from './pubsub-message-bus';

/**
 * Bus module binds the MessageBus contract to Cloud Pub/Sub
 */
@Module({
  providers: [
    {
      provide: MESSAGE_BUS,
      useFactory: (configService: ConfigService) => {
        const config = configService.get<BusConfig>('bus');
        if (!config) {
          throw new Error('Bus configuration not found');
        }
        return new PubSubMessageBus(config);
      },
      inject: [ConfigService],
    },
  ],
  exports: [MESSAGE_BUS],
})
export class BusModule {}
