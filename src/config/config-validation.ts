import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';

const logger = new Logger('ConfigValidation');

/**
 * Convert raw settings into a validated config section
 * Every failing property is named in the log before the section is rejected
 */
export function validateConfig<T extends object>(
  rawConfig: Record<string, unknown>,
  section: string,
  sectionClass: new () => T,
): T {
  const config = plainToInstance(sectionClass, rawConfig, { enableImplicitConversion: true });
  const errors = validateSync(config, { skipMissingProperties: false });

  if (errors.length > 0) {
    const messages = errors.map(error => Object.values(error.constraints ?? {}).join(', ')).join('; ');
    logger.error(`Invalid ${section} settings: ${errors.map(error => error.property).join(', ')}`);
    throw new Error(`Invalid configuration for ${section}: ${messages}`);
  }

  return config;
}
