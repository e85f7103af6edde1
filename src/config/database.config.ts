import { registerAs } from '@nestjs/config';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { validateConfig } from './config-validation';

/**
 * MySQL connection configuration
 * Validated using class-validator decorators
 */
export class DatabaseConfig {
  @IsString()
  @IsNotEmpty()
  host!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;

  @IsString()
  @IsNotEmpty()
  user!: string;

  @IsString()
  password!: string;

  @IsString()
  @IsNotEmpty()
  database!: string;

  // Unix socket, e.g. a Cloud SQL proxy path; replaces host/port when set
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  socketPath?: string;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  connectDeadlineMs!: number;
}

/**
 * Database configuration factory
 * Loads database settings from environment variables with defaults
 */
export default registerAs('database', (): DatabaseConfig => {
  const rawConfig = {
    host: process.env.DATABASE_HOST || '127.0.0.1',
    port: parseInt(process.env.DATABASE_PORT || '3306', 10),
    user: process.env.DATABASE_USER || 'querybus',
    password: process.env.DATABASE_PASSWORD ?? 'querybus',
    database: process.env.DATABASE_NAME || 'querybus',
    socketPath: process.env.DATABASE_SOCKET_PATH || undefined,
    connectDeadlineMs: parseInt(process.env.DATABASE_CONNECT_DEADLINE_MS || '10000', 10),
  };

  return validateConfig(rawConfig, 'database', DatabaseConfig);
});
