import type { Timers } from '../common/telemetry';

/**
 * Values that survive the JSON wire format
 */
export type WireValue = string | number | boolean | null;

/**
 * One statement of a batch and the result key its rows are collected under
 */
export interface BatchEntry {
  sql: string;
  resultKey: string;
  params?: WireValue[];
}

/**
 * Ordered statements executed as one unit of work
 */
export type QueryBatch = BatchEntry[];

export type Row = Record<string, unknown>;

export interface TransactionEnvelope {
  serverId: string;
  transactionId: string;
  /** Epoch seconds when the producer published the batch */
  insertionTime: number;
  batch: QueryBatch;
}

/**
 * Aggregated outcome of one batch
 * On the wire the rows are flattened next to `affected` and `timers`
 */
export interface ResultEnvelope {
  rows: Record<string, Row[]>;
  affected: number;
  timers: Timers;
}

/**
 * Result keys that name envelope fields rather than row lists
 */
export const RESERVED_RESULT_KEYS: ReadonlySet<string> = new Set(['affected', 'timers']);

/**
 * Message attributes carried next to the batch body
 */
export interface MessageAttributes {
  srv_id: string;
  trans_id: string;
  insertion_time?: string;
}

export function correlationKey(serverId: string, transactionId: string): string {
  return `${serverId}:${transactionId}`;
}
