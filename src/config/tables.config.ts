import { registerAs } from '@nestjs/config';
import { readFileSync } from 'fs';
import { load } from 'js-yaml';
import { Logger } from '@nestjs/common';
import type { TableField, TableSchema, YamlTableDefinition, YamlTablesFile } from './table.types';
import { FIELD_TYPES, isFieldTypeName } from '../statements/field-types';

const logger = new Logger('TablesConfig');

/**
 * Loads table schemas from the YAML tables file once at startup
 * Fails fast if the file is missing or a table is inconsistent
 */
export default registerAs('tables', (): Map<string, TableSchema> => {
  const tables = new Map<string, TableSchema>();

  const tablesPath = process.env.TABLES_PATH || './tables.yaml';

  try {
    logger.log(`Loading table schemas from: ${tablesPath}`);

    const yamlContent = readFileSync(tablesPath, 'utf-8');
    const yamlData = load(yamlContent) as YamlTablesFile | undefined;

    if (!yamlData?.tables) {
      throw new Error('Invalid tables file: must contain a "tables" section');
    }

    for (const [tableName, definition] of Object.entries(yamlData.tables)) {
      tables.set(tableName, parseTable(tableName, definition));
    }

    if (tables.size === 0) {
      throw new Error('No tables found in tables file. At least one table must be defined.');
    }

    logger.log(`Loaded ${tables.size} tables: ${Array.from(tables.keys()).join(', ')}`);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.error(`Tables file not found at ${tablesPath}`);
      throw new Error(`Tables file not found: ${tablesPath}. Please ensure the file exists or set TABLES_PATH environment variable.`);
    }
    logger.error('Failed to load table schemas');
    throw error;
  }

  return tables;
});

/**
 * Build a frozen TableSchema from its YAML definition
 */
export function parseTable(tableName: string, definition: YamlTableDefinition): TableSchema {
  if (!definition.primary_key) {
    throw new Error(`Table '${tableName}' missing required 'primary_key' field`);
  }

  if (!definition.fields || Object.keys(definition.fields).length === 0) {
    throw new Error(`Table '${tableName}' must have at least one field defined`);
  }

  const fields: TableField[] = Object.entries(definition.fields).map(([name, type]) => {
    if (!isFieldTypeName(type)) {
      throw new Error(`Invalid type '${type}' for field '${name}' in table '${tableName}'. Valid types are: ${Object.keys(FIELD_TYPES).join(', ')}`);
    }
    return Object.freeze({ name, type });
  });

  if (!definition.fields[definition.primary_key]) {
    throw new Error(`Primary key '${definition.primary_key}' not found in fields for table '${tableName}'`);
  }

  const indexedFields = definition.indexed_fields ?? [];
  for (const field of indexedFields) {
    if (!definition.fields[field]) {
      throw new Error(`Indexed field '${field}' not found in fields for table '${tableName}'`);
    }
  }

  return Object.freeze({
    name: tableName,
    primaryKeyField: definition.primary_key,
    fields: Object.freeze(fields),
    indexedFields: Object.freeze([...indexedFields]),
  });
}
