import { plainToInstance } from 'class-transformer';
import {
  IsArray,
  IsNotEmpty,
  IsNumberString,
  IsOptional,
  IsString,
  Validate,
  ValidationArguments,
  ValidatorConstraint,
  ValidatorConstraintInterface,
  validateSync,
} from 'class-validator';
import { MalformedBatchError } from '../common/errors';
import type { Timers } from '../common/telemetry';
import {
  BatchEntry,
  MessageAttributes,
  QueryBatch,
  RESERVED_RESULT_KEYS,
  ResultEnvelope,
  Row,
  TransactionEnvelope,
  WireValue,
} from './types';

type WireEntry = [string, string] | [string, string, WireValue[]];

function isWireValue(value: unknown): value is WireValue {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A wire entry is [sql, resultKey] or [sql, resultKey, params]
 */
@ValidatorConstraint({ name: 'isBatchEntry' })
class IsBatchEntryConstraint implements ValidatorConstraintInterface {
  validate(entries: unknown): boolean {
    return Array.isArray(entries) && entries.every(entry => isWireEntry(entry));
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must contain [statement, resultKey] or [statement, resultKey, params] entries`;
  }
}

function isWireEntry(entry: unknown): entry is WireEntry {
  if (!Array.isArray(entry) || (entry.length !== 2 && entry.length !== 3)) {
    return false;
  }
  const [sql, resultKey, params] = entry;
  if (typeof sql !== 'string' || sql.trim() === '' || typeof resultKey !== 'string') {
    return false;
  }
  return params === undefined || (Array.isArray(params) && params.every(isWireValue));
}

/**
 * DTO for the JSON message body
 */
export class BatchMessageDto {
  @IsArray()
  @Validate(IsBatchEntryConstraint)
  queries!: unknown[];
}

/**
 * DTO for the message attributes
 */
export class MessageAttributesDto {
  @IsString()
  @IsNotEmpty()
  srv_id!: string;

  @IsString()
  @IsNotEmpty()
  trans_id!: string;

  @IsOptional()
  @IsNumberString()
  insertion_time?: string;
}

function validationFailure<T extends object>(dto: T): string | undefined {
  const errors = validateSync(dto);
  if (errors.length === 0) {
    return undefined;
  }
  return errors
    .map(error => `${error.property}: ${Object.values(error.constraints || {}).join(', ')}`)
    .join('; ');
}

export function encodeBatch(batch: QueryBatch): string {
  const queries: WireEntry[] = batch.map(entry =>
    entry.params === undefined ? [entry.sql, entry.resultKey] : [entry.sql, entry.resultKey, entry.params],
  );
  return JSON.stringify({ queries });
}

/**
 * Parse a message body into a QueryBatch
 * Throws MalformedBatchError for anything that is not a valid batch
 */
export function decodeBatch(body: string): QueryBatch {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new MalformedBatchError('Message body is not valid JSON', { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new MalformedBatchError('Message body must be a JSON object');
  }

  const dto = plainToInstance(BatchMessageDto, parsed);
  const failure = validationFailure(dto);
  if (failure) {
    throw new MalformedBatchError(`Invalid batch: ${failure}`);
  }

  return dto.queries.filter(isWireEntry).map((entry): BatchEntry => {
    const [sql, resultKey, params] = entry;
    return params === undefined ? { sql, resultKey } : { sql, resultKey, params };
  });
}

/**
 * Validate message attributes
 * Throws MalformedBatchError when the correlation attributes are missing
 */
export function decodeAttributes(attributes: Record<string, string>): MessageAttributes {
  const dto = plainToInstance(MessageAttributesDto, attributes);
  const failure = validationFailure(dto);
  if (failure) {
    throw new MalformedBatchError(`Invalid message attributes: ${failure}`);
  }
  return dto.insertion_time === undefined
    ? { srv_id: dto.srv_id, trans_id: dto.trans_id }
    : { srv_id: dto.srv_id, trans_id: dto.trans_id, insertion_time: dto.insertion_time };
}

export function encodeAttributes(envelope: TransactionEnvelope): Required<MessageAttributes> {
  return {
    srv_id: envelope.serverId,
    trans_id: envelope.transactionId,
    insertion_time: String(envelope.insertionTime),
  };
}

/**
 * Flatten a result envelope into the stored JSON shape
 */
export function encodeResult(result: ResultEnvelope): string {
  return JSON.stringify({
    ...result.rows,
    affected: result.affected,
    timers: result.timers,
  });
}

/**
 * Parse a stored result back into a ResultEnvelope
 */
export function decodeResult(raw: string): ResultEnvelope {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error('Stored result must be a JSON object');
  }

  const { affected, timers, ...rest } = parsed;
  if (typeof affected !== 'number') {
    throw new Error('Stored result is missing a numeric "affected" count');
  }

  const rows: Record<string, Row[]> = {};
  for (const [key, value] of Object.entries(rest)) {
    if (RESERVED_RESULT_KEYS.has(key)) {
      continue;
    }
    if (!Array.isArray(value)) {
      throw new Error(`Stored result key '${key}' is not a row list`);
    }
    rows[key] = value.filter(isRecord);
  }

  return { rows, affected, timers: decodeTimers(timers) };
}

function decodeTimers(value: unknown): Timers {
  const timers: Timers = {};
  if (!isRecord(value)) {
    return timers;
  }
  for (const [name, seconds] of Object.entries(value)) {
    if (typeof seconds === 'number') {
      timers[name] = seconds;
    }
  }
  return timers;
}
