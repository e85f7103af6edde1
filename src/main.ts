/**
 * querybus worker entry point
 * Connects to the database, bus and store, then processes batches until stopped
 */
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { getLogLevels } from './common/logging.utils';
import { QueueWorkerService } from './worker/queue-worker.service';

async function bootstrap() {
  const logger = new Logger('querybus');

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason, promise) => {
    logger.error('Unhandled rejection at:', promise, 'reason:', reason);
    process.exit(1);
  });

  try {
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: getLogLevels(process.env.LOG_LEVEL),
    });

    // SIGTERM/SIGINT close the context, which stops the worker after the in-flight message
    app.enableShutdownHooks();

    logger.log('=== querybus worker ready ===');
    await app.get(QueueWorkerService).run();
  } catch (error) {
    logger.error('Failed to start querybus worker');
    console.error(error);
    process.exit(1);
  }
}

void bootstrap();
