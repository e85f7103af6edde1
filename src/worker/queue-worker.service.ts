import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { PipelineConfig } from '../config/pipeline.config';
import type { StoreConfig } from '../config/store.config';
import { MESSAGE_BUS, MessageBus, PulledMessage } from '../bus/message-bus';
import { CORRELATION_STORE, CorrelationStore } from '../store/correlation-store';
import { RELATIONAL_DATABASE, RelationalDatabase } from '../database/relational-database';
import { StaleMessageError, errorMessage } from '../common/errors';
import { formatTimer, truncateForLog } from '../common/logging.utils';
import { Clock, PIPELINE_CLOCK, systemClock } from '../common/retry';
import { TelemetryContext } from '../common/telemetry';
import { decodeAttributes, decodeBatch, encodeResult } from '../pipeline/envelope';
import { ABSOLUTE_TIMERS, TIMER } from '../pipeline/timers';
import { correlationKey, ResultEnvelope } from '../pipeline/types';
import { BatchExecutor } from './batch-executor';

const IDLE_PAUSE_MS = 100;

/**
 * Stages of one worker iteration
 */
export enum WorkerState {
  WaitForMessage = 'wait-for-message',
  Decode = 'decode',
  Execute = 'execute',
  Commit = 'commit',
  Acknowledge = 'acknowledge',
  PublishResult = 'publish-result',
}

export type IterationOutcome = 'idle' | 'stale' | 'processed' | 'dropped';

/**
 * Worker side of the pipeline
 * Pulls one batch at a time, runs it in a transaction and publishes the result
 * under the batch's correlation key. Every pulled message is acknowledged,
 * whatever happens to it.
 */
@Injectable()
export class QueueWorkerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(QueueWorkerService.name);
  private readonly executor: BatchExecutor;
  private state = WorkerState.WaitForMessage;
  private running = false;
  private loop?: Promise<void>;

  // Continuous silence tracking for the idle warning
  private silentSince?: number;
  private lastIdleWarning?: number;

  constructor(
    @Inject(RELATIONAL_DATABASE) private readonly database: RelationalDatabase,
    @Inject(MESSAGE_BUS) private readonly bus: MessageBus,
    @Inject(CORRELATION_STORE) private readonly store: CorrelationStore,
    private readonly configService: ConfigService,
    @Optional() @Inject(PIPELINE_CLOCK) private readonly clock: Clock = systemClock,
  ) {
    this.executor = new BatchExecutor(database, this.getPipelineConfig().batchMode);
  }

  async onApplicationBootstrap(): Promise<void> {
    await this.bus.ensureResources?.();
  }

  get currentState(): WorkerState {
    return this.state;
  }

  /**
   * Process messages until stop() is called
   */
  run(): Promise<void> {
    if (!this.loop) {
      this.running = true;
      this.loop = this.loopUntilStopped().finally(() => {
        this.loop = undefined;
      });
    }
    return this.loop;
  }

  stop(): void {
    this.running = false;
  }

  /**
   * Let the in-flight message finish before connections close
   */
  async onModuleDestroy(): Promise<void> {
    this.stop();
    if (this.loop) {
      await this.loop;
    }
  }

  /**
   * Run one iteration: wait for a message and take it through every stage
   */
  async processNext(): Promise<IterationOutcome> {
    this.state = WorkerState.WaitForMessage;
    const pullStartedAt = this.seconds();
    const message = await this.pull();
    const receivedAt = this.seconds();

    if (!message) {
      await this.idle(receivedAt);
      return 'idle';
    }

    this.silentSince = undefined;
    this.lastIdleWarning = undefined;
    return this.handle(message, receivedAt, receivedAt - pullStartedAt);
  }

  private async loopUntilStopped(): Promise<void> {
    this.logger.log('Worker started');
    while (this.running) {
      await this.processNext();
    }
    this.logger.log('Worker stopped');
  }

  private async handle(message: PulledMessage, receivedAt: number, pullWait: number): Promise<IterationOutcome> {
    const pipeline = this.getPipelineConfig();
    const telemetry = new TelemetryContext(() => this.seconds());

    try {
      this.state = WorkerState.Decode;
      const attributes = decodeAttributes(message.attributes);
      const key = correlationKey(attributes.srv_id, attributes.trans_id);

      const insertedAt = attributes.insertion_time === undefined ? undefined : Number(attributes.insertion_time);
      if (insertedAt !== undefined) {
        const queueWait = receivedAt - insertedAt;
        telemetry.record(TIMER.queueWait, queueWait);
        if (queueWait > pipeline.messageTimeoutSeconds) {
          throw new StaleMessageError(key, queueWait);
        }
      }
      telemetry.record(TIMER.pullWait, pullWait);

      telemetry.start(TIMER.decode);
      const batch = decodeBatch(message.body);
      telemetry.stop(TIMER.decode);
      this.logger.debug(`Executing ${batch.length} statements for ${key}`);

      this.state = WorkerState.Execute;
      const outcome = await this.executor.execute(batch, key, telemetry);

      this.state = WorkerState.Commit;
      await telemetry.measure(TIMER.commit, () => this.database.commit());

      this.state = WorkerState.Acknowledge;
      await telemetry.measure(TIMER.ack, () => this.bus.acknowledge([message.ackId]));

      this.state = WorkerState.PublishResult;
      telemetry.mark(TIMER.storeWrite);
      telemetry.mark(TIMER.total, insertedAt ?? receivedAt);
      telemetry.record(TIMER.workerProcessing, this.seconds() - receivedAt);

      const result: ResultEnvelope = { ...outcome, timers: telemetry.toRecord() };
      await this.store.setWithTtl(key, encodeResult(result), this.getStoreConfig().resultTtlSeconds);

      this.reportTimers(telemetry, pipeline.timerWarnSeconds);
      return 'processed';
    } catch (error) {
      if (error instanceof StaleMessageError) {
        this.logger.warn(`Dropping stale message: ${error.message}`);
        await this.acknowledge(message);
        return 'stale';
      }

      this.logger.error(`Dropping message ${truncateForLog(message.body)}: ${errorMessage(error)}`);
      if (this.state === WorkerState.Execute || this.state === WorkerState.Commit) {
        await this.rollback();
      }
      if (this.state !== WorkerState.PublishResult) {
        await this.acknowledge(message);
      }
      return 'dropped';
    } finally {
      this.state = WorkerState.WaitForMessage;
    }
  }

  private async pull(): Promise<PulledMessage | undefined> {
    try {
      const [message] = await this.bus.pull(1);
      return message;
    } catch (error) {
      this.logger.error(`Failed to pull from the bus: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async idle(now: number): Promise<void> {
    const { timerWarnSeconds } = this.getPipelineConfig();
    const silentSince = this.silentSince ?? now;
    this.silentSince = silentSince;

    const since = this.lastIdleWarning ?? silentSince;
    if (now - since >= timerWarnSeconds) {
      this.logger.warn(`No messages received for ${Math.floor(now - silentSince)} secs`);
      this.lastIdleWarning = now;
    }

    await this.clock.sleep(IDLE_PAUSE_MS);
  }

  private async acknowledge(message: PulledMessage): Promise<void> {
    try {
      await this.bus.acknowledge([message.ackId]);
    } catch (error) {
      this.logger.error(`Failed to acknowledge ${message.ackId}: ${errorMessage(error)}`);
    }
  }

  private async rollback(): Promise<void> {
    try {
      await this.database.rollback();
    } catch (error) {
      this.logger.error(`Rollback failed: ${errorMessage(error)}`);
    }
  }

  private reportTimers(telemetry: TelemetryContext, warnSeconds: number): void {
    const now = this.seconds();
    for (const [name, value] of telemetry.entries()) {
      const seconds = ABSOLUTE_TIMERS.includes(name) ? now - value : value;
      const line = formatTimer(name, seconds);
      if (seconds > warnSeconds) {
        this.logger.warn(line);
      } else {
        this.logger.log(line);
      }
    }
  }

  private seconds(): number {
    return this.clock.now() / 1000;
  }

  private getPipelineConfig(): PipelineConfig {
    const config = this.configService.get<PipelineConfig>('pipeline');
    if (!config) {
      throw new Error('Pipeline configuration not found');
    }
    return config;
  }

  private getStoreConfig(): StoreConfig {
    const config = this.configService.get<StoreConfig>('store');
    if (!config) {
      throw new Error('Store configuration not found');
    }
    return config;
  }
}
