import { ValidationError, validateSync } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { Logger } from '@nestjs/common';

const logger = new Logger('ConfigValidation');

/**
 * Flatten class-validator errors, nested ones included, into constraint messages
 */
export function describeValidationErrors(errors: ValidationError[], parent?: string): string[] {
  return errors.flatMap(error => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(message =>
      parent ? `${path}: ${message}` : message,
    );
    return [...own, ...describeValidationErrors(error.children ?? [], path)];
  });
}

/**
 * Convert a raw config section into its validated class instance
 * Throws `Invalid configuration for <section>: ...` listing every failed constraint
 */
export function validateConfig<T extends object>(
  config: Record<string, unknown>,
  sectionName: string,
  validationClass: new () => T,
): T {
  const validatedConfig = plainToInstance(validationClass, config, {
    enableImplicitConversion: true,
  });
  const messages = describeValidationErrors(validateSync(validatedConfig, { skipMissingProperties: false }));

  if (messages.length > 0) {
    for (const message of messages) {
      logger.error(`${sectionName}: ${message}`);
    }
    throw new Error(`Invalid configuration for ${sectionName}: ${messages.join('; ')}`);
  }

  return validatedConfig;
}
