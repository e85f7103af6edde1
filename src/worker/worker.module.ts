import { Module } from '@nestjs/common';
import { BusModule } from '../bus/bus.module';
import { DatabaseModule } from '../database/database.module';
import { StoreModule } from '../store/store.module';
import { QueueWorkerService } from './queue-worker.service';

/**
 * Worker module consumes batches from the bus and answers through the store
 */
@Module({
  imports: [DatabaseModule, BusModule, StoreModule],
  providers: [QueueWorkerService],
  exports: [QueueWorkerService],
})
export class WorkerModule {}
