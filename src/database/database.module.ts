import { Module } from '@nestjs/common';
import { StatementsModule } from '../statements/statements.module';
import { TableRegistry } from '../statements/table-registry';
import { DatabaseConnectionService } from './database-connection.service';
import { RELATIONAL_DATABASE } from './relational-database';

/**
 * Database module opens the worker's connection and prepares the schema
 * Exports RELATIONAL_DATABASE once the registered tables exist
 */
@Module({
  imports: [StatementsModule],
  providers: [
    DatabaseConnectionService,
    {
      provide: RELATIONAL_DATABASE,
      useFactory: async (connections: DatabaseConnectionService, registry: TableRegistry) => {
        const database = await connections.connect();
        await connections.prepareSchema(database, registry);
        return database;
      },
      inject: [DatabaseConnectionService, TableRegistry],
    },
  ],
  exports: [RELATIONAL_DATABASE, DatabaseConnectionService],
})
export class DatabaseModule {}
