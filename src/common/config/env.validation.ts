import 'reflect-metadata';
import { plainToInstance } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
  /** Shared secret every MCP client presents as a bearer token */
  @IsString()
  @IsNotEmpty()
  AUTH_TOKEN!: string;

  /** Identity value returned by the `validate` tool */
  @IsString()
  @IsNotEmpty()
  MY_NUMBER!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT: number = 8086;

  @IsOptional()
  @IsString()
  HOST: string = '0.0.0.0';
}

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
