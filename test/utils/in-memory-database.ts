import type { TableSchema } from '../../src/config/table.types';
import { classifyDatabaseError, QueryOutcome, RelationalDatabase } from '../../src/database/relational-database';
import type { Row, WireValue } from '../../src/pipeline/types';

const INSERT = /^INSERT INTO (\w+) \(([^)]*)\) VALUES \(([^)]*)\)$/;
const SELECT = /^SELECT \* FROM (\w+)(?: WHERE (\w+) IN \(([^)]*)\))?$/;
const UPDATE = /^UPDATE (\w+) SET (.+) WHERE (\w+)=\?$/;

class SqlStateError extends Error {
  constructor(message: string, readonly sqlState: string) {
    super(message);
  }
}

/**
 * Transactional table store that understands the statements the builder emits
 * Any other statement succeeds without effect. Failures can be scripted per
 * statement text to simulate driver errors.
 */
export class InMemoryDatabase implements RelationalDatabase {
  private tables = new Map<string, Row[]>();
  private snapshot?: Map<string, Row[]>;
  private readonly failures = new Map<string, unknown>();
  private readonly nextIds = new Map<string, number>();

  readonly executed: string[] = [];
  commits = 0;
  rollbacks = 0;

  constructor(private readonly schemas: readonly TableSchema[]) {
    for (const schema of schemas) {
      this.tables.set(schema.name, []);
      this.nextIds.set(schema.name, 1);
    }
  }

  /**
   * Make the next execution of `sql` fail with `error`
   */
  failOnce(sql: string, error: unknown): void {
    this.failures.set(sql, error);
  }

  rows(table: string): Row[] {
    return this.table(table).map(row => ({ ...row }));
  }

  async begin(): Promise<void> {
    this.snapshot = this.copyTables();
  }

  async execute(sql: string, params: readonly WireValue[] = []): Promise<QueryOutcome> {
    this.executed.push(sql);

    const failure = this.failures.get(sql);
    if (failure !== undefined) {
      this.failures.delete(sql);
      throw failure;
    }

    try {
      return this.run(sql, params);
    } catch (error) {
      throw classifyDatabaseError(error);
    }
  }

  async commit(): Promise<void> {
    this.snapshot = undefined;
    this.commits++;
  }

  async rollback(): Promise<void> {
    if (this.snapshot) {
      this.tables = this.snapshot;
      this.snapshot = undefined;
    }
    this.rollbacks++;
  }

  async close(): Promise<void> {
    this.snapshot = undefined;
  }

  private run(sql: string, params: readonly WireValue[]): QueryOutcome {
    const insert = INSERT.exec(sql);
    if (insert) {
      return this.insert(insert[1], insert[2].split(','), params);
    }

    const select = SELECT.exec(sql);
    if (select) {
      const rows = this.table(select[1]);
      const field = select[2];
      const matching = field === undefined ? rows : rows.filter(row => {
        const value = toWire(row[field]);
        return value !== undefined && params.includes(value);
      });
      return { rows: matching.map(row => ({ ...row })), rowCount: 0 };
    }

    const update = UPDATE.exec(sql);
    if (update) {
      const fields = update[2].split(',').map(assignment => assignment.replace(/=\?$/, ''));
      const pkey = params[fields.length];
      let rowCount = 0;
      for (const row of this.table(update[1])) {
        if (row[update[3]] === pkey) {
          fields.forEach((field, index) => {
            row[field] = params[index];
          });
          rowCount++;
        }
      }
      return { rows: [], rowCount };
    }

    return { rows: [], rowCount: 0 };
  }

  private insert(tableName: string, fields: string[], params: readonly WireValue[]): QueryOutcome {
    const rows = this.table(tableName);
    const schema = this.schemas.find(candidate => candidate.name === tableName);
    const primaryKey = schema?.primaryKeyField ?? 'id';

    const row: Row = {};
    for (const schemaField of schema?.fields ?? []) {
      row[schemaField.name] = 0;
    }
    fields.forEach((field, index) => {
      row[field] = params[index];
    });

    const nextId = this.nextIds.get(tableName) ?? 1;
    if (!fields.includes(primaryKey)) {
      row[primaryKey] = nextId;
    }
    const id = row[primaryKey];
    if (rows.some(existing => existing[primaryKey] === id)) {
      throw new SqlStateError(`Duplicate entry '${String(id)}' for key 'PRIMARY'`, '23000');
    }
    if (typeof id === 'number' && id >= nextId) {
      this.nextIds.set(tableName, id + 1);
    }

    rows.push(row);
    return { rows: [], rowCount: 1 };
  }

  private table(name: string): Row[] {
    const rows = this.tables.get(name);
    if (!rows) {
      throw new SqlStateError(`Table '${name}' doesn't exist`, '42S02');
    }
    return rows;
  }

  private copyTables(): Map<string, Row[]> {
    return new Map(Array.from(this.tables, ([name, rows]): [string, Row[]] => [name, rows.map(row => ({ ...row }))]));
  }
}

function toWire(value: unknown): WireValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return undefined;
}
