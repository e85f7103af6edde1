// Types for table schemas loaded from YAML

import type { FieldTypeName } from '../statements/field-types';

export interface TableField {
  name: string;
  type: FieldTypeName;
}

/**
 * Complete definition of one database table
 * Field order is the column order used by CREATE TABLE
 */
export interface TableSchema {
  readonly name: string;
  readonly primaryKeyField: string;
  readonly fields: readonly TableField[];
  readonly indexedFields: readonly string[];
}

/**
 * Raw structure of a table as written in the YAML file
 */
export interface YamlTableDefinition {
  primary_key?: string;
  indexed_fields?: string[];
  fields?: Record<string, string>;
}

export interface YamlTablesFile {
  tables?: Record<string, YamlTableDefinition>;
}
