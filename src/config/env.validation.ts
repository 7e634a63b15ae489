import { plainToInstance } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export type WorkerLogLevel = (typeof LOG_LEVELS)[number];

/**
 * Environment the worker needs at startup.
 *
 * @remarks
 * Buckets, region and a queue identifier are required; a missing value
 * aborts the process before the first poll. Endpoints and static
 * credentials are only set for LocalStack, otherwise the SDK default
 * chain applies.
 */
export class EnvironmentVariables {
  @IsString()
  @IsNotEmpty()
  AWS_REGION!: string;

  @IsString()
  @IsNotEmpty()
  S3_INPUT_BUCKET!: string;

  @IsString()
  @IsNotEmpty()
  S3_OUTPUT_BUCKET!: string;

  /** Full queue URL; takes precedence over SQS_QUEUE_NAME */
  @ValidateIf((env: EnvironmentVariables) => !env.SQS_QUEUE_NAME)
  @IsString()
  @IsNotEmpty({ message: 'SQS_QUEUE_URL or SQS_QUEUE_NAME must be set' })
  SQS_QUEUE_URL?: string;

  @IsOptional()
  @IsString()
  SQS_QUEUE_NAME?: string;

  @IsOptional()
  @IsString()
  S3_ENDPOINT?: string;

  @IsOptional()
  @IsString()
  SQS_ENDPOINT?: string;

  @IsOptional()
  @IsString()
  AWS_ACCESS_KEY_ID?: string;

  @IsOptional()
  @IsString()
  AWS_SECRET_ACCESS_KEY?: string;

  @IsInt()
  @Min(1)
  @Max(10)
  SQS_BATCH_SIZE: number = 10;

  @IsInt()
  @Min(0)
  @Max(20)
  SQS_WAIT_TIME_SECONDS: number = 20;

  @IsInt()
  @Min(0)
  @Max(43200)
  SQS_VISIBILITY_TIMEOUT: number = 120;

  @IsInt()
  @Min(0)
  SQS_RECEIVE_ERROR_DELAY_MS: number = 1000;

  @IsIn(LOG_LEVELS)
  LOG_LEVEL: WorkerLogLevel = 'log';
}

/**
 * `ConfigModule.forRoot` validate hook.
 *
 * @throws Error listing every invalid variable
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return validated;
}
