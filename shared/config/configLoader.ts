/**
 * Centralized Configuration Loader with Zod Validation
 * Provides type-safe configuration loading with runtime validation
 */

import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

// Base configuration schema
const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  SERVICE_NAME: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(3000),
});

// Accept direct URL (POSTGRES_URL / POSTGRES_URI / DATABASE_URL) or POSTGRES_USER + POSTGRES_PASSWORD + POSTGRES_DB
const PostgresConfigSchema = z.object({
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().optional(),
  POSTGRES_PASSWORD: z.string().optional(),
  POSTGRES_DB: z.string().optional(),
  POSTGRES_SSL: booleanFlag,
  POSTGRES_URL: z.string().optional(),
  POSTGRES_URI: z.string().optional(),
  DATABASE_URL: z.string().optional(),
});

const JWTConfigSchema = z.object({
  JWT_SECRET: z.string().min(32),
  JWT_EXPIRES_IN: z.string().default('7d'),
});

const PortalConfigSchema = z.object({
  LOGIN_URL: z.string().min(1).default('/login'),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;
export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;
export type JWTConfig = z.infer<typeof JWTConfigSchema>;
export type PortalConfig = z.infer<typeof PortalConfigSchema>;

export type ServiceConfig = BaseConfig & PortalConfig & Partial<PostgresConfig & JWTConfig>;

export interface ServiceConfigOptions {
  defaultPort?: number;
  requirePostgres?: boolean;
  requireJWT?: boolean;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
}

/**
 * Load and validate configuration for a service
 */
export function loadServiceConfig(
  serviceName: string,
  options: ServiceConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ServiceConfig {
  const problems: string[] = [];

  const base = BaseConfigSchema.safeParse({
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL,
    SERVICE_NAME: serviceName,
    PORT: env[`${serviceName.toUpperCase().replace(/-/g, '_')}_PORT`] || env.PORT || options.defaultPort,
  });
  if (!base.success) problems.push(...formatIssues(base.error));

  const portal = PortalConfigSchema.safeParse(env);
  if (!portal.success) problems.push(...formatIssues(portal.error));

  let postgres: Partial<PostgresConfig> = {};
  if (options.requirePostgres) {
    const parsed = PostgresConfigSchema.safeParse(env);
    if (parsed.success) {
      postgres = parsed.data;
      const hasUrl = !!(postgres.POSTGRES_URL || postgres.POSTGRES_URI || postgres.DATABASE_URL);
      const hasIndividual = !!(postgres.POSTGRES_USER && postgres.POSTGRES_PASSWORD && postgres.POSTGRES_DB);
      if (!hasUrl && !hasIndividual) {
        problems.push(
          'Postgres requires either POSTGRES_URL (or POSTGRES_URI or DATABASE_URL) or POSTGRES_USER + POSTGRES_PASSWORD + POSTGRES_DB'
        );
      }
    } else {
      problems.push(...formatIssues(parsed.error));
    }
  }

  let jwt: Partial<JWTConfig> = {};
  if (options.requireJWT) {
    const parsed = JWTConfigSchema.safeParse(env);
    if (parsed.success) {
      jwt = parsed.data;
    } else {
      problems.push(...formatIssues(parsed.error));
    }
  }

  if (!base.success || !portal.success || problems.length > 0) {
    throw new Error(`Configuration validation failed for ${serviceName}:\n${problems.join('\n')}`);
  }

  return { ...base.data, ...portal.data, ...postgres, ...jwt };
}
