/**
 * Values a statement can bind
 * bigint only appears after clamping a BIGINT column above Number.MAX_SAFE_INTEGER
 */
export type SqlValue = string | number | bigint | boolean | null;

export type RowData = Record<string, SqlValue>;

/**
 * Parameterised SQL text with `?` placeholders
 */
export interface Statement {
  sql: string;
  params: SqlValue[];
}

/**
 * What validation does with keys that are not columns of the table
 * - passthrough: keep them in the generated statement unvalidated
 * - strip: drop them before generating the statement
 */
export type UnknownFieldPolicy = 'passthrough' | 'strip';

export interface StatementOptions {
  unknownFields?: UnknownFieldPolicy;
}
