/**
 * Timer names shared by producer and worker
 * Parenthesised names are worker-internal and skipped in producer reports
 */
export const TIMER = {
  // worker
  queueWait: 'queue wait',
  pullWait: '(pull wait)',
  decode: 'decode',
  commit: 'commit',
  ack: 'ack',
  storeWrite: 'store write',
  total: 'total',
  workerProcessing: '(worker processing)',
  // producer
  publish: 'publish',
  ackCheck: 'ack check',
  roundtrip: 'roundtrip',
} as const;

/**
 * Timers the worker stores as absolute epoch seconds; the producer turns them
 * into durations when it reads the result
 */
export const ABSOLUTE_TIMERS: readonly string[] = [TIMER.storeWrite, TIMER.total];

/**
 * Name of the timer for the statement at `index` (1-based) of a batch
 */
export function statementTimer(index: number, sql: string, key: string): string {
  const verb = sql.trim().split(/\s+/, 1)[0]?.toUpperCase() ?? '';
  return `${index} ${verb} ${key}`;
}
