import type { TableSchema } from '../config/table.types';

/**
 * Static lookup of table schemas by name, built once from configuration
 */
export class TableRegistry {
  private readonly tables: ReadonlyMap<string, TableSchema>;

  constructor(tables: Iterable<TableSchema>) {
    const byName = new Map<string, TableSchema>();
    for (const table of tables) {
      if (byName.has(table.name)) {
        throw new Error(`Duplicate table schema: ${table.name}`);
      }
      byName.set(table.name, table);
    }
    this.tables = byName;
  }

  get(name: string): TableSchema {
    const table = this.tables.get(name);
    if (!table) {
      throw new Error(`Unknown table: ${name}. Available tables: ${this.names().join(', ')}`);
    }
    return table;
  }

  has(name: string): boolean {
    return this.tables.has(name);
  }

  names(): string[] {
    return Array.from(this.tables.keys());
  }

  all(): TableSchema[] {
    return Array.from(this.tables.values());
  }
}
