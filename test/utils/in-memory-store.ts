import type { Clock } from '../../src/common/retry';
import type { CorrelationStore } from '../../src/store/correlation-store';

interface Entry {
  value: string;
  expiresAt: number;
}

/**
 * Key/value store with TTL expiry measured on the given clock
 */
export class InMemoryCorrelationStore implements CorrelationStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly clock: Clock) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (this.clock.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async setWithTtl(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { value, expiresAt: this.clock.now() + ttlSeconds * 1000 });
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
