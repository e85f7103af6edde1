import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { PipelineConfig } from '../config/pipeline.config';
import { MESSAGE_BUS, MessageBus } from '../bus/message-bus';
import { CORRELATION_STORE, CorrelationStore } from '../store/correlation-store';
import { LookupTimeoutError, PublishFailedError, errorMessage } from '../common/errors';
import { formatTimer } from '../common/logging.utils';
import { Clock, PIPELINE_CLOCK, retryWithBackoff, systemClock } from '../common/retry';
import { isWorkerInternal } from '../common/telemetry';
import { decodeResult, encodeAttributes, encodeBatch } from '../pipeline/envelope';
import { ABSOLUTE_TIMERS, TIMER } from '../pipeline/timers';
import { correlationKey, QueryBatch, ResultEnvelope, TransactionEnvelope } from '../pipeline/types';
import { SLOW_CALL_SINK, SlowCallSink } from './slow-call.sink';

export type EnqueueResult =
  | { ok: true; result: ResultEnvelope }
  | { ok: false; error: LookupTimeoutError | PublishFailedError };

/**
 * Producer side of the pipeline
 * Publishes a batch and waits for the worker's result to appear in the store
 */
@Injectable()
export class TransactionEnqueuerService {
  private readonly logger = new Logger(TransactionEnqueuerService.name);
  private readonly config: PipelineConfig;

  constructor(
    @Inject(MESSAGE_BUS) private readonly bus: MessageBus,
    @Inject(CORRELATION_STORE) private readonly store: CorrelationStore,
    @Inject(SLOW_CALL_SINK) private readonly sink: SlowCallSink,
    private readonly configService: ConfigService,
    @Optional() @Inject(PIPELINE_CLOCK) private readonly clock: Clock = systemClock,
  ) {
    // A missing section fails construction, never a call
    this.config = this.getConfig();
  }

  /**
   * Publish `batch` under `serverId:transactionId` and poll for its result
   * Resolves { ok: false } on publish failure or when the poll deadline passes;
   * the batch is never republished.
   */
  async enqueueAndWait(transactionId: string, batch: QueryBatch, serverId: string): Promise<EnqueueResult> {
    const key = correlationKey(serverId, transactionId);
    const startedAt = this.seconds();

    const envelope: TransactionEnvelope = {
      serverId,
      transactionId,
      insertionTime: startedAt,
      batch,
    };

    try {
      await this.bus.publish(encodeBatch(batch), encodeAttributes(envelope));
    } catch (error) {
      this.logger.error(`Failed to publish ${key}: ${errorMessage(error)}`);
      return { ok: false, error: new PublishFailedError(key, { cause: error }) };
    }

    const publishElapsed = this.seconds() - startedAt;
    const publishLine = formatTimer('Pubsub Publish', publishElapsed);
    if (publishElapsed > this.config.slowCallSeconds) {
      this.logger.warn(publishLine);
      await this.report(publishLine);
    } else {
      this.logger.debug(publishLine);
    }

    const pollStartedAt = this.seconds();
    let result: ResultEnvelope;
    try {
      result = await retryWithBackoff(
        async () => {
          const raw = await this.store.get(key);
          if (raw === null) {
            throw new Error(`Unable to find ${key} in result store`);
          }
          return decodeResult(raw);
        },
        {
          initialDelayMs: this.config.pollInitialDelayMs,
          multiplier: this.config.pollBackoffMultiplier,
          maxDelayMs: this.config.pollMaxDelayMs,
          deadlineMs: this.config.pollDeadlineMs,
        },
        {
          clock: this.clock,
          onRetry: ({ error }) => this.logger.debug(`${errorMessage(error)}, checking again`),
        },
      );
    } catch (error) {
      const timeout = new LookupTimeoutError(key, Math.round((this.seconds() - pollStartedAt) * 1000), { cause: error });
      this.logger.warn(timeout.message);
      await this.report(timeout.message);
      return { ok: false, error: timeout };
    }

    const now = this.seconds();
    const timers = { ...result.timers };
    for (const name of ABSOLUTE_TIMERS) {
      const stamp = timers[name];
      if (stamp !== undefined) {
        timers[name] = now - stamp;
      }
    }
    timers[TIMER.ackCheck] = now - pollStartedAt;
    timers[TIMER.roundtrip] = now - startedAt;

    const roundtripLine = formatTimer('SQL roundtrip', timers[TIMER.roundtrip]);
    if (timers[TIMER.roundtrip] > this.config.slowCallSeconds) {
      for (const [name, seconds] of Object.entries(timers)) {
        if (!isWorkerInternal(name)) {
          const line = `${name} - ${seconds.toFixed(3)}`;
          this.logger.warn(line);
          await this.report(line);
        }
      }
    } else {
      this.logger.debug(roundtripLine);
    }

    return { ok: true, result: { ...result, timers } };
  }

  private seconds(): number {
    return this.clock.now() / 1000;
  }

  private async report(line: string): Promise<void> {
    try {
      await this.sink.record(line);
    } catch (error) {
      this.logger.error(`Failed to record slow call: ${errorMessage(error)}`);
    }
  }

  private getConfig(): PipelineConfig {
    const config = this.configService.get<PipelineConfig>('pipeline');
    if (!config) {
      throw new Error('Pipeline configuration not found');
    }
    return config;
  }
}
