import type { Connection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { IntegrityViolationError } from '../common/errors';
import type { Row, WireValue } from '../pipeline/types';

/**
 * Rows returned by a statement and the rows it changed
 * rowCount is 0 for statements that return a result set
 */
export interface QueryOutcome {
  rows: Row[];
  rowCount: number;
}

/**
 * Minimal transactional database surface used by the worker
 */
export interface RelationalDatabase {
  begin(): Promise<void>;
  execute(sql: string, params?: readonly WireValue[]): Promise<QueryOutcome>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export const RELATIONAL_DATABASE = Symbol('RELATIONAL_DATABASE');

// SQLSTATE class 23: integrity constraint violation
const INTEGRITY_SQLSTATE_CLASS = '23';

function isSqlError(error: unknown): error is Error & { sqlState: string } {
  return error instanceof Error && 'sqlState' in error && typeof error.sqlState === 'string';
}

/**
 * Map driver errors to pipeline errors where the pipeline reacts to them
 */
export function classifyDatabaseError(error: unknown): unknown {
  if (isSqlError(error) && error.sqlState.startsWith(INTEGRITY_SQLSTATE_CLASS)) {
    return new IntegrityViolationError(error.message, error.sqlState, { cause: error });
  }
  return error;
}

/**
 * RelationalDatabase over a single mysql2 connection
 */
export class MysqlDatabase implements RelationalDatabase {
  constructor(private readonly connection: Connection) {}

  async begin(): Promise<void> {
    await this.connection.beginTransaction();
  }

  async execute(sql: string, params: readonly WireValue[] = []): Promise<QueryOutcome> {
    try {
      const [result] = await this.connection.query<RowDataPacket[] | ResultSetHeader>(sql, [...params]);
      if (Array.isArray(result)) {
        return { rows: result.map(row => ({ ...row })), rowCount: 0 };
      }
      return { rows: [], rowCount: result.affectedRows };
    } catch (error) {
      throw classifyDatabaseError(error);
    }
  }

  async commit(): Promise<void> {
    await this.connection.commit();
  }

  async rollback(): Promise<void> {
    await this.connection.rollback();
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}
