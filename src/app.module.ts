import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import databaseConfig from './config/database.config';
import busConfig from './config/bus.config';
import storeConfig from './config/store.config';
import pipelineConfig from './config/pipeline.config';
import tablesConfig from './config/tables.config';
import { WorkerModule } from './worker/worker.module';

/**
 * Root module of the worker process
 * Configuration is global; the worker module pulls in database, bus and store
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [databaseConfig, busConfig, storeConfig, pipelineConfig, tablesConfig],
    }),

    WorkerModule,
  ],
})
export class AppModule {}
