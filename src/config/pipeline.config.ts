import { registerAs } from '@nestjs/config';
import { IsIn, IsInt, IsNotEmpty, IsNumber, IsOptional, IsString, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { validateConfig } from './config-validation';
import type { UnknownFieldPolicy } from '../statements/statement.types';

export type BatchMode = 'non-atomic' | 'atomic';

export const BATCH_MODES: readonly BatchMode[] = ['non-atomic', 'atomic'];
export const UNKNOWN_FIELD_POLICIES: readonly UnknownFieldPolicy[] = ['passthrough', 'strip'];

/**
 * Producer and worker tuning shared by both sides of the pipeline
 */
export class PipelineConfig {
  // Messages older than this are dropped unexecuted; producers stop waiting at the same age
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  messageTimeoutSeconds!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  timerWarnSeconds!: number;

  @IsIn(BATCH_MODES)
  batchMode!: BatchMode;

  @IsIn(UNKNOWN_FIELD_POLICIES)
  unknownFields!: UnknownFieldPolicy;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  pollInitialDelayMs!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(1)
  pollBackoffMultiplier!: number;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  pollMaxDelayMs!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  pollDeadlineMs!: number;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  slowCallSeconds!: number;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  slowCallLog?: string;
}

export default registerAs('pipeline', (): PipelineConfig => {
  const rawConfig = {
    messageTimeoutSeconds: parseFloat(process.env.MESSAGE_TIMEOUT_SECONDS || '30'),
    timerWarnSeconds: parseFloat(process.env.TIMER_WARN_SECONDS || '10'),
    batchMode: process.env.BATCH_MODE || 'non-atomic',
    unknownFields: process.env.UNKNOWN_FIELDS || 'passthrough',
    pollInitialDelayMs: parseInt(process.env.POLL_INITIAL_DELAY_MS || '100', 10),
    pollBackoffMultiplier: parseFloat(process.env.POLL_BACKOFF_MULTIPLIER || '2'),
    pollMaxDelayMs: parseInt(process.env.POLL_MAX_DELAY_MS || '2500', 10),
    pollDeadlineMs: parseInt(process.env.POLL_DEADLINE_MS || '30000', 10),
    slowCallSeconds: parseFloat(process.env.SLOW_CALL_SECONDS || '10'),
    slowCallLog: process.env.SLOW_CALL_LOG || undefined,
  };

  return validateConfig(rawConfig, 'pipeline', PipelineConfig);
});
