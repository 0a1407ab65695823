import { LogLevel } from '@shapekit/logger';
import { describe, expect, it } from 'vitest';
import { z } from 'zod/v4';
import { loadServerConfig } from '../config';

function issueMessages(env: Record<string, string>): string[] {
  try {
    loadServerConfig(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      return error.issues.map((issue) => issue.message);
    }
    throw error;
  }
  return [];
}

describe('loadServerConfig', () => {
  it('should apply defaults for missing variables', () => {
    expect(loadServerConfig({})).toEqual({
      port: 8080,
      host: '0.0.0.0',
      logLevel: LogLevel.Info,
      nodeEnv: 'development',
      docs: { enabled: true, path: '/docs', openapiPath: '/openapi.json' },
    });
  });

  it('should parse provided variables', () => {
    const config = loadServerConfig({
      PORT: '3000',
      HOST: '127.0.0.1',
      LOG_LEVEL: 'debug',
      NODE_ENV: 'production',
      DOCS_ENABLED: 'false',
      DOCS_PATH: '/api-docs',
      OPENAPI_PATH: '/spec.json',
    });

    expect(config).toEqual({
      port: 3000,
      host: '127.0.0.1',
      logLevel: LogLevel.Debug,
      nodeEnv: 'production',
      docs: { enabled: false, path: '/api-docs', openapiPath: '/spec.json' },
    });
  });

  it('should name the variable that failed', () => {
    expect(() => loadServerConfig({ PORT: 'eighty' })).toThrow(z.ZodError);
    expect(issueMessages({ PORT: 'eighty' })).toEqual([
      expect.stringMatching(/^Environment variable "PORT": /),
    ]);
    expect(issueMessages({ LOG_LEVEL: 'verbose' })).toEqual([
      expect.stringMatching(/^Environment variable "LOG_LEVEL": /),
    ]);
  });

  it('should reject docs paths without a leading slash', () => {
    expect(issueMessages({ DOCS_PATH: 'docs' })).toEqual([
      expect.stringMatching(/^Environment variable "DOCS_PATH": /),
    ]);
  });
});
