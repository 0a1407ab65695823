import { LogLevel } from '@shapekit/logger';
import { z } from 'zod/v4';

const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(LogLevel).default(LogLevel.Info),
  NODE_ENV: z.string().default('development'),
  DOCS_ENABLED: z.stringbool().default(true),
  DOCS_PATH: z.string().startsWith('/').default('/docs'),
  OPENAPI_PATH: z.string().startsWith('/').default('/openapi.json'),
});

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  nodeEnv: string;
  docs: {
    enabled: boolean;
    /** Path of the Swagger UI page */
    path: string;
    /** Path of the OpenAPI document */
    openapiPath: string;
  };
}

/**
 * Parses server settings from environment variables.
 *
 * @throws {z.ZodError} Naming every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadServerConfig(process.env);
 * app.start({ port: config.port, hostname: config.host });
 * ```
 */
export function loadServerConfig(
  env: Record<string, string | undefined> = process.env,
): ServerConfig {
  const parsed = serverEnvSchema.safeParse(env);

  if (!parsed.success) {
    throw new z.ZodError(
      parsed.error.issues.map((issue) => ({
        ...issue,
        message: `Environment variable "${String(issue.path[0])}": ${issue.message}`,
      })),
    );
  }

  const { data } = parsed;
  return {
    port: data.PORT,
    host: data.HOST,
    logLevel: data.LOG_LEVEL,
    nodeEnv: data.NODE_ENV,
    docs: {
      enabled: data.DOCS_ENABLED,
      path: data.DOCS_PATH,
      openapiPath: data.OPENAPI_PATH,
    },
  };
}
