import { Logger } from '@nestjs/common';
import { BatchAbortedError, IntegrityViolationError } from '../common/errors';
import { truncateForLog } from '../common/logging.utils';
import type { TelemetryContext } from '../common/telemetry';
import type { BatchMode } from '../config/pipeline.config';
import type { RelationalDatabase } from '../database/relational-database';
import { statementTimer } from '../pipeline/timers';
import { QueryBatch, RESERVED_RESULT_KEYS, Row } from '../pipeline/types';
import { renderStatement } from '../statements/statement-builder';

export interface BatchOutcome {
  rows: Record<string, Row[]>;
  affected: number;
}

/**
 * Runs the statements of one batch inside an open transaction
 * The caller owns commit and rollback.
 */
export class BatchExecutor {
  private readonly logger = new Logger(BatchExecutor.name);

  constructor(
    private readonly database: RelationalDatabase,
    private readonly mode: BatchMode = 'non-atomic',
  ) {}

  /**
   * Begin a transaction and execute every entry in order
   * Rows are collected per result key; reserved keys only count affected rows.
   * In non-atomic mode an integrity violation skips that statement and the
   * batch carries on; in atomic mode it aborts the batch.
   */
  async execute(batch: QueryBatch, key: string, telemetry: TelemetryContext): Promise<BatchOutcome> {
    const rows = new Map<string, Row[]>();
    let affected = 0;

    await this.database.begin();

    for (const [index, entry] of batch.entries()) {
      let collected: Row[] | undefined;
      if (!RESERVED_RESULT_KEYS.has(entry.resultKey)) {
        collected = rows.get(entry.resultKey) ?? [];
        rows.set(entry.resultKey, collected);
      }

      const timer = statementTimer(index + 1, entry.sql, key);
      telemetry.start(timer);
      try {
        const outcome = await this.database.execute(entry.sql, entry.params);
        collected?.push(...outcome.rows);
        affected += outcome.rowCount;
      } catch (error) {
        if (!(error instanceof IntegrityViolationError)) {
          throw error;
        }

        if (this.mode === 'atomic') {
          throw new BatchAbortedError(`Aborting ${key} at statement ${index + 1}: ${error.message}`, { cause: error });
        }
        const statement = truncateForLog(renderStatement({ sql: entry.sql, params: entry.params ?? [] }));
        this.logger.error(`Skipping statement ${index + 1} of ${key} (${statement}): ${error.message}`);
      } finally {
        telemetry.stop(timer);
      }
    }

    return { rows: Object.fromEntries(rows), affected };
  }
}
