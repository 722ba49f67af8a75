import { Transform, plainToInstance } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, IsUrl, Max, Min, MinLength, validateSync } from 'class-validator';

function parseFlag(raw: unknown): boolean {
  return raw === true || raw === 'true' || raw === '1';
}

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  DATABASE_PATH: string = './data/vpn-engine.db';

  @IsString()
  @MinLength(8)
  PANEL_CRED_SECRET!: string;

  @IsString()
  @MinLength(8)
  ADMIN_API_TOKEN!: string;

  @IsInt()
  @Min(1000)
  PANEL_API_TIMEOUT_MS: number = 15_000;

  // читаем исходную строку: неявное преобразование превратило бы 'false' в true
  @Transform(({ obj, key }) => parseFlag(obj[key]))
  @IsBoolean()
  PANEL_VERIFY_SSL: boolean = false;

  @IsInt()
  @Min(60)
  PANEL_SESSION_TTL_SECONDS: number = 6 * 3600;

  @IsOptional()
  @IsUrl({ require_tld: false })
  PANEL_SUBSCRIPTION_BASE_URL?: string;

  /** 0 отключает цикл. */
  @IsInt()
  @Min(0)
  HEALTH_CHECK_INTERVAL_SECONDS: number = 300;

  /** 0 отключает цикл. */
  @IsInt()
  @Min(0)
  INBOUND_SYNC_INTERVAL_SECONDS: number = 900;

  @IsInt()
  @Min(1)
  HEALTH_CHECK_CONCURRENCY: number = 5;

  @IsInt()
  @Min(1)
  SYNC_CONCURRENCY: number = 3;
}

export function validateEnv(raw: Record<string, unknown>): EnvironmentVariables {
  const env = plainToInstance(EnvironmentVariables, raw, { enableImplicitConversion: true });
  const errors = validateSync(env, { skipMissingProperties: false });
  if (errors.length > 0) {
    const details = errors.map((e) => `${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`);
    throw new Error(`Invalid environment configuration:\n${details.join('\n')}`);
  }
  return env;
}
