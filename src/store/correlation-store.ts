/**
 * Ephemeral key/value store used to hand results from worker to producer
 * Values are written once with a TTL and only ever polled
 */
export interface CorrelationStore {
  get(key: string): Promise<string | null>;
  setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export const CORRELATION_STORE = Symbol('CORRELATION_STORE');
