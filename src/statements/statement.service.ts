import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { PipelineConfig } from '../config/pipeline.config';
import type { BatchEntry } from '../pipeline/types';
import { createTable, insert, select, toBatchEntry, update } from './statement-builder';
import type { RowData, SqlValue, Statement, StatementOptions } from './statement.types';
import { TableRegistry } from './table-registry';

/**
 * Statement builder bound to the table registry and the configured field policy
 */
@Injectable()
export class StatementService {
  constructor(
    private readonly registry: TableRegistry,
    private readonly configService: ConfigService,
  ) {}

  insert(tableName: string, data: RowData): Statement | undefined {
    return insert(this.registry.get(tableName), data, this.options());
  }

  select(tableName: string, values?: readonly SqlValue[] | null, field?: string | null): Statement {
    return select(this.registry.get(tableName), values, field);
  }

  update(tableName: string, pkey: SqlValue, data: RowData): Statement | undefined {
    return update(this.registry.get(tableName), pkey, data, this.options());
  }

  createTable(tableName: string): Statement {
    return createTable(this.registry.get(tableName));
  }

  /**
   * Collect the statements that were produced into batch entries under `resultKey`
   * Statements that came back undefined (nothing to write) are skipped
   */
  entries(resultKey: string, ...statements: Array<Statement | undefined>): BatchEntry[] {
    return statements
      .filter((statement): statement is Statement => statement !== undefined)
      .map(statement => toBatchEntry(statement, resultKey));
  }

  private options(): StatementOptions {
    const config = this.configService.get<PipelineConfig>('pipeline');
    return { unknownFields: config?.unknownFields ?? 'passthrough' };
  }
}
