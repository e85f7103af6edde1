import { registerAs } from '@nestjs/config';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { validateConfig } from './config-validation';

/**
 * Result store configuration (Redis)
 */
export class StoreConfig {
  @IsString()
  @IsNotEmpty()
  host!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  db!: number;

  @IsOptional()
  @IsString()
  password?: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  resultTtlSeconds!: number;
}

/**
 * Accepts redis://host:port as well as the tcp://host:port form
 * that container links inject
 */
export function parseRedisUrl(url: string): { host: string; port: number } {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
  };
}

export default registerAs('store', (): StoreConfig => {
  const { host, port } = parseRedisUrl(process.env.REDIS_URL || 'redis://localhost:6379');
  const rawConfig = {
    host,
    port,
    db: parseInt(process.env.REDIS_DB || '0', 10),
    password: process.env.REDIS_PASSWORD || undefined,
    resultTtlSeconds: parseInt(process.env.RESULT_TTL_SECONDS || '30', 10),
  };

  return validateConfig(rawConfig, 'store', StoreConfig);
});
