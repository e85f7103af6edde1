import { Injectable, OnApplicationShutdown, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createConnection } from 'mysql2/promise';
import type { DatabaseConfig } from '../config/database.config';
import { ConnectionFailureError, errorMessage } from '../common/errors';
import { retryWithBackoff, RetryPolicy } from '../common/retry';
import { createTable, quoteIdentifier } from '../statements/statement-builder';
import type { TableRegistry } from '../statements/table-registry';
import { MysqlDatabase, RelationalDatabase } from './relational-database';

// Component-specific database configuration
const DB_CONNECTION_TIMEOUT_MS = 10000;
const CONNECT_INITIAL_DELAY_MS = 1000;
const CONNECT_MAX_DELAY_MS = 10000;

/**
 * Database connection management service
 * Opens MySQL connections for workers and prepares the schema they run against
 */
@Injectable()
export class DatabaseConnectionService implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseConnectionService.name);
  private readonly databases = new Set<RelationalDatabase>();

  constructor(private configService: ConfigService) {}

  /**
   * Connect with bounded exponential backoff
   * Throws ConnectionFailureError once the connect deadline has passed
   */
  async connect(): Promise<RelationalDatabase> {
    const config = this.configService.get<DatabaseConfig>('database');

    if (!config) {
      throw new Error('Database configuration not found');
    }

    const target = config.socketPath ?? `${config.host}:${config.port}`;
    const policy: RetryPolicy = {
      initialDelayMs: CONNECT_INITIAL_DELAY_MS,
      multiplier: 2,
      maxDelayMs: CONNECT_MAX_DELAY_MS,
      deadlineMs: config.connectDeadlineMs,
    };

    this.logger.log(`Attempting to connect to database at ${target}`);

    try {
      const connection = await retryWithBackoff(
        () => createConnection({
          host: config.host,
          port: config.port,
          user: config.user,
          password: config.password,
          socketPath: config.socketPath,
          connectTimeout: DB_CONNECTION_TIMEOUT_MS,
          // BIGINT UNSIGNED exceeds Number.MAX_SAFE_INTEGER; keep such values as decimal strings
          supportBigNumbers: true,
          bigNumberStrings: true,
        }),
        policy,
        {
          onRetry: ({ attempt, delayMs, error }) => this.logger.warn(
            `Connection attempt ${attempt} to ${target} failed (${errorMessage(error)}), retrying in ${delayMs}ms`,
          ),
        },
      );

      const database = new MysqlDatabase(connection);
      this.databases.add(database);
      this.logger.log(`Connected to ${target}`);
      return database;
    } catch (error) {
      this.logger.error(`Failed to connect to the database at ${target}`);
      throw new ConnectionFailureError(target, { cause: error });
    }
  }

  /**
   * Create the database and every registered table if missing,
   * then drop the session to READ UNCOMMITTED for throughput
   */
  async prepareSchema(database: RelationalDatabase, registry: TableRegistry): Promise<void> {
    const config = this.configService.get<DatabaseConfig>('database');

    if (!config) {
      throw new Error('Database configuration not found');
    }

    const name = quoteIdentifier(config.database);
    await database.execute(`CREATE DATABASE IF NOT EXISTS ${name}`);
    await database.execute(`USE ${name}`);

    for (const table of registry.all()) {
      await database.execute(createTable(table).sql);
      this.logger.debug(`Ensured table ${table.name}`);
    }

    await database.execute('SET SESSION TRANSACTION ISOLATION LEVEL READ UNCOMMITTED');
    await database.commit();
    this.logger.log(`Schema ready in ${config.database}: ${registry.names().join(', ')}`);
  }

  /**
   * Disconnect a specific database connection
   */
  async disconnect(database: RelationalDatabase): Promise<void> {
    try {
      await database.close();
      this.logger.log('Database connection closed');
    } finally {
      // Still forget the connection even if close fails
      this.databases.delete(database);
    }
  }

  /**
   * Cleanup all connections once every module has been destroyed
   */
  async onApplicationShutdown() {
    this.logger.log(`Closing ${this.databases.size} database connections`);

    const disconnectPromises = Array.from(this.databases).map(database =>
      this.disconnect(database).catch(error =>
        this.logger.error(`Error closing connection during shutdown: ${errorMessage(error)}`),
      ),
    );

    await Promise.all(disconnectPromises);
  }
}
