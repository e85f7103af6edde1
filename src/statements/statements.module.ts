import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { TableSchema } from '../config/table.types';
import { StatementService } from './statement.service';
import { TableRegistry } from './table-registry';

/**
 * Statements module exposes the table registry and statement builder
 */
@Module({
  providers: [
    {
      provide: TableRegistry,
      useFactory: (configService: ConfigService) => {
        const tables = configService.get<Map<string, TableSchema>>('tables');
        if (!tables) {
          throw new Error('Table configuration not found');
        }
        return new TableRegistry(tables.values());
      },
      inject: [ConfigService],
    },
    StatementService,
  ],
  exports: [TableRegistry, StatementService],
})
export class StatementsModule {}
