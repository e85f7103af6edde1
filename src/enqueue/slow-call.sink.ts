import { Logger } from '@nestjs/common';
import { appendFile } from 'fs/promises';

/**
 * Destination for diagnostics about slow or failed round trips
 */
export interface SlowCallSink {
  record(line: string): Promise<void>;
}

export const SLOW_CALL_SINK = Symbol('SLOW_CALL_SINK');

export class LoggerSlowCallSink implements SlowCallSink {
  private readonly logger = new Logger('SlowCalls');

  async record(line: string): Promise<void> {
    this.logger.warn(line);
  }
}

/**
 * Appends one line per record to a slow query log file
 */
export class FileSlowCallSink implements SlowCallSink {
  constructor(private readonly path: string) {}

  async record(line: string): Promise<void> {
    await appendFile(this.path, line.endsWith('\n') ? line : `${line}\n`, 'utf8');
  }
}
