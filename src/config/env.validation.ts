import { plainToInstance } from 'class-transformer';
import { IsBooleanString, IsIn, IsInt, IsOptional, Max, Min, validateSync } from 'class-validator';

import { BATCH_POLICIES, BatchPolicy } from './configuration';

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsBooleanString()
  TLE_VERIFY_CHECKSUM?: string;

  @IsOptional()
  @IsBooleanString()
  TLE_KEEP_REMAINDER?: string;

  @IsOptional()
  @IsIn(BATCH_POLICIES)
  TLE_BATCH_POLICY?: BatchPolicy;
}

/**
 * Checked once by ConfigModule at startup; a bad value stops the app.
 */
export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });
  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validated;
}
