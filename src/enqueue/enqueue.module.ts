import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { PipelineConfig } from '../config/pipeline.config';
import { BusModule } from '../bus/bus.module';
import { StoreModule } from '../store/store.module';
import { StatementsModule } from '../statements/statements.module';
import { FileSlowCallSink, LoggerSlowCallSink, SLOW_CALL_SINK } from './slow-call.sink';
import { TransactionEnqueuerService } from './transaction-enqueuer.service';

/**
 * Enqueue module is the producer side of the pipeline
 * Exports the statement builder so callers can assemble batches
 */
@Module({
  imports: [StatementsModule, BusModule, StoreModule],
  providers: [
    {
      provide: SLOW_CALL_SINK,
      useFactory: (configService: ConfigService) => {
        const path = configService.get<PipelineConfig>('pipeline')?.slowCallLog;
        return path ? new FileSlowCallSink(path) : new LoggerSlowCallSink();
      },
      inject: [ConfigService],
    },
    TransactionEnqueuerService,
  ],
  exports: [TransactionEnqueuerService, StatementsModule, SLOW_CALL_SINK],
})
export class EnqueueModule {}
