import { Logger } from '@nestjs/common';
import { escapeId, format } from 'mysql2';
import type { TableSchema } from '../config/table.types';
import type { BatchEntry, WireValue } from '../pipeline/types';
import { FIELD_TYPES } from './field-types';
import type { RowData, SqlValue, Statement, StatementOptions } from './statement.types';

const logger = new Logger('StatementBuilder');

const BARE_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const INTEGER_TEXT = /^[+-]?\d+$/;

/**
 * Quote an identifier only when it would not parse bare
 */
export function quoteIdentifier(name: string): string {
  return BARE_IDENTIFIER.test(name) ? name : escapeId(name);
}

/**
 * Read a value as an integer the way the column would store it
 * Returns undefined for values with no integer reading
 */
function toInteger(value: SqlValue): bigint | undefined {
  switch (typeof value) {
    case 'bigint':
      return value;
    case 'number':
      return Number.isFinite(value) ? BigInt(Math.trunc(value)) : undefined;
    case 'boolean':
      return value ? 1n : 0n;
    case 'string': {
      const text = value.trim();
      if (INTEGER_TEXT.test(text)) {
        return BigInt(text);
      }
      const parsed = Number(text);
      return text !== '' && Number.isFinite(parsed) ? BigInt(Math.trunc(parsed)) : undefined;
    }
    default:
      return undefined;
  }
}

function fromInteger(value: bigint): number | bigint {
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value;
}

/**
 * Clamp every schema field (other than the primary key) into [0, maxValue]
 * Overflow is logged and replaced by the column maximum; negatives become 0.
 * Keys that are not columns pass through unless options.unknownFields is 'strip'.
 * Returns a new object; `data` is not modified.
 */
export function validate(table: TableSchema, data: RowData, options: StatementOptions = {}): RowData {
  const result: RowData = { ...data };

  for (const field of table.fields) {
    if (field.name === table.primaryKeyField || !(field.name in result)) {
      continue;
    }

    const fieldType = FIELD_TYPES[field.type];
    const value = result[field.name];
    const integer = toInteger(value);

    if (integer === undefined) {
      logger.error(`Field:'${field.name}', value: '${String(value)}' is of type '${field.type}' and is not an integer`);
      result[field.name] = 0;
    } else if (integer < 0n) {
      result[field.name] = 0;
    } else if (integer > fieldType.maxValue) {
      logger.error(
        `Field:'${field.name}', value: '${String(value)}' is of type '${field.type}' and is not in the valid range of [0,${fieldType.maxValue}]`,
      );
      result[field.name] = fromInteger(fieldType.maxValue);
    }
  }

  if (options.unknownFields === 'strip') {
    const known = new Set(table.fields.map(field => field.name));
    for (const key of Object.keys(result)) {
      if (!known.has(key)) {
        logger.debug(`Dropping field '${key}' not in table '${table.name}'`);
        delete result[key];
      }
    }
  }

  return result;
}

/**
 * INSERT one row after validation
 * Returns undefined when nothing is left to insert
 */
export function insert(table: TableSchema, data: RowData, options: StatementOptions = {}): Statement | undefined {
  const row = validate(table, data, options);
  const fields = Object.keys(row);
  if (fields.length === 0) {
    return undefined;
  }

  const statement: Statement = {
    sql: `INSERT INTO ${quoteIdentifier(table.name)} (${fields.map(quoteIdentifier).join(',')}) VALUES (${fields.map(() => '?').join(',')})`,
    params: fields.map(field => row[field]),
  };
  logger.debug(statement.sql);
  return statement;
}

/**
 * SELECT rows whose `field` (the primary key by default) is one of `values`
 * No values selects the whole table
 */
export function select(table: TableSchema, values?: readonly SqlValue[] | null, field?: string | null): Statement {
  const column = field || table.primaryKeyField;
  const base = `SELECT * FROM ${quoteIdentifier(table.name)}`;

  if (!values || values.length === 0) {
    return { sql: base, params: [] };
  }

  const statement: Statement = {
    sql: `${base} WHERE ${quoteIdentifier(column)} IN (${values.map(() => '?').join(',')})`,
    params: [...values],
  };
  logger.debug(statement.sql);
  return statement;
}

/**
 * UPDATE the row with primary key `pkey` after validation
 * Returns undefined when nothing is left to set
 */
export function update(table: TableSchema, pkey: SqlValue, data: RowData, options: StatementOptions = {}): Statement | undefined {
  const row = validate(table, data, options);
  const fields = Object.keys(row);
  if (fields.length === 0) {
    return undefined;
  }

  const statement: Statement = {
    sql: `UPDATE ${quoteIdentifier(table.name)} SET ${fields.map(key => `${quoteIdentifier(key)}=?`).join(',')} WHERE ${quoteIdentifier(table.primaryKeyField)}=?`,
    params: [...fields.map(key => row[key]), pkey],
  };
  logger.debug(statement.sql);
  return statement;
}

/**
 * CREATE TABLE IF NOT EXISTS for a schema
 * Every column is an unsigned NOT NULL integer; the primary key auto-increments.
 */
export function createTable(table: TableSchema): Statement {
  const columns = table.fields.map(field => {
    const name = quoteIdentifier(field.name);
    const suffix = field.name === table.primaryKeyField ? 'AUTO_INCREMENT UNIQUE' : 'DEFAULT 0';
    return `${name} ${field.type} UNSIGNED NOT NULL ${suffix}`;
  });

  const indexes = table.indexedFields.map(field => {
    const name = quoteIdentifier(field);
    return `INDEX ${quoteIdentifier(`${field}_idx`)} (${name})`;
  });

  const definitions = [...columns, ...indexes, `PRIMARY KEY(${quoteIdentifier(table.primaryKeyField)})`];

  const sql = `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table.name)} (${definitions.join(', ')}) ROW_FORMAT=COMPRESSED KEY_BLOCK_SIZE=8`;
  logger.debug(sql);
  return { sql, params: [] };
}

/**
 * Inline escaped params into the statement text
 */
export function renderStatement(statement: Statement): string {
  if (statement.params.length === 0) {
    return statement.sql;
  }
  return format(statement.sql, statement.params.map(toWireValue));
}

function toWireValue(value: SqlValue): WireValue {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Package a statement as one entry of a query batch
 */
export function toBatchEntry(statement: Statement, resultKey: string): BatchEntry {
  if (statement.params.length === 0) {
    return { sql: statement.sql, resultKey };
  }
  return { sql: statement.sql, resultKey, params: statement.params.map(toWireValue) };
}
