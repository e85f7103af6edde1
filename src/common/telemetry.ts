/**
 * Per-request timer set carried through one enqueue or one worker iteration
 *
 * Values are seconds. Completed timers hold durations, marks hold absolute
 * epoch seconds that the reader converts to elapsed time itself. Insertion
 * order is kept so reports read in the order the stages ran.
 */
export type Timers = Record<string, number>;

export function epochSeconds(): number {
  return Date.now() / 1000;
}

/**
 * Worker-internal timers are wrapped in parentheses and are not reported by producers
 */
export function isWorkerInternal(name: string): boolean {
  return name.startsWith('(');
}

export class TelemetryContext {
  private readonly values = new Map<string, number>();
  private readonly running = new Map<string, number>();

  constructor(private readonly now: () => number = epochSeconds) {}

  start(name: string): void {
    this.running.set(name, this.now());
    // reserve the slot so reports keep start order
    if (!this.values.has(name)) {
      this.values.set(name, 0);
    }
  }

  /**
   * Stop a running timer and return its duration in seconds
   */
  stop(name: string): number {
    const startedAt = this.running.get(name);
    if (startedAt === undefined) {
      throw new Error(`Timer '${name}' was never started`);
    }
    this.running.delete(name);
    const elapsed = this.now() - startedAt;
    this.values.set(name, elapsed);
    return elapsed;
  }

  /**
   * Time an async stage
   */
  async measure<T>(name: string, stage: () => Promise<T>): Promise<T> {
    this.start(name);
    try {
      return await stage();
    } finally {
      this.stop(name);
    }
  }

  record(name: string, seconds: number): void {
    this.values.set(name, seconds);
  }

  mark(name: string, epoch: number = this.now()): void {
    this.values.set(name, epoch);
  }

  get(name: string): number | undefined {
    return this.values.get(name);
  }

  isRunning(name: string): boolean {
    return this.running.has(name);
  }

  entries(): Array<[string, number]> {
    return Array.from(this.values.entries());
  }

  toRecord(): Timers {
    return Object.fromEntries(this.values);
  }
}
