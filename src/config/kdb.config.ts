import { registerAs } from '@nestjs/config';
import { IsInt, IsNotEmpty, IsString, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { validateConfig } from './config-validation';

/**
 * Engine connection configuration
 * Validated using class-validator decorators
 */
export class KdbConfig {
  @IsString()
  @IsNotEmpty()
  host!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  port!: number;

  // Credentials are optional; an open server accepts an empty user
  @IsString()
  user!: string;

  @IsString()
  password!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  connectTimeoutMs!: number;

  /** 0 disables the per-query timeout */
  @Type(() => Number)
  @IsInt()
  @Min(0)
  queryTimeoutMs!: number;
}

export function loadKdbConfig(env: NodeJS.ProcessEnv = process.env): KdbConfig {
  const rawConfig = {
    host: env.KDB_HOST || 'localhost',
    port: parseInt(env.KDB_PORT || '5001', 10),
    user: env.KDB_USER ?? '',
    password: env.KDB_PASSWORD ?? '',
    connectTimeoutMs: parseInt(env.KDB_CONNECT_TIMEOUT_MS || '10000', 10),
    queryTimeoutMs: parseInt(env.KDB_QUERY_TIMEOUT_MS || '0', 10),
  };

  return validateConfig(rawConfig, 'kdb', KdbConfig);
}

/**
 * Engine configuration factory
 * Loads connection settings from environment variables with defaults
 */
export default registerAs('kdb', (): KdbConfig => loadKdbConfig());
