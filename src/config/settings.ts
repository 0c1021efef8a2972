/**
 * Environment-driven gateway settings.
 *
 * Settings are parsed once at startup into a frozen value that is passed to
 * every consumer; nothing reads `process.env` after this point.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { APPLIANCE_DEFAULTS, HTTP_DEFAULTS } from '../constants.js';
import { ConfigError, Errors } from '../errors/index.js';
import { LogLevel, parseLogLevel } from '../utils/logger.js';
import type { IntentPrecedence } from '../types.js';

export interface JwtSettings {
  secret: string;
  issuer?: string;
  audience?: string;
}

export interface ApplianceSettings {
  url?: string;
  apiKey: string;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
}

export interface GatewaySettings {
  readonly accessToken: string;
  readonly tokenScopes?: Readonly<Record<string, string[]>>;
  readonly jwt?: JwtSettings;
  readonly transport: 'http' | 'sse';
  readonly allowedOrigins: string[];
  readonly logLevel: LogLevel;

  readonly intentClassificationEnabled: boolean;
  readonly intentFallbackToAll: boolean;
  readonly intentPrecedence: IntentPrecedence;
  readonly strictContextLimit: boolean;

  readonly defaultMaxTools: number;
  readonly filterConfigPath: string;

  readonly port: number;
  readonly maxBodySize: string;

  readonly appliance: ApplianceSettings;
  readonly enableDebugTools: boolean;
  readonly enableDestructiveOperations: boolean;
}

const TokenScopesSchema = z.record(z.string(), z.array(z.string()));

const SettingsSchema = z.object({
  transport: z.enum(['http', 'sse'], {
    errorMap: () => ({ message: "MCP_TRANSPORT must be 'http' or 'sse'" })
  }),
  intentPrecedence: z.enum(['intent', 'explicit'], {
    errorMap: () => ({ message: "INTENT_PRECEDENCE must be 'intent' or 'explicit'" })
  }),
  defaultMaxTools: z.number().int().positive(),
  port: z.number().int().min(0).max(65535),
  applianceUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive(),
  maxRetries: z.number().int().min(1),
  retryBackoffMs: z.number().int().min(0),
});

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') return fallback;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
};

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value.trim());
};

const parseOrigins = (raw: string | undefined): string[] => {
  const origins = (raw ?? '').split(',').map(origin => origin.trim()).filter(Boolean);
  return origins.length > 0 ? origins : ['*'];
};

const optionalString = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Read `NAME` directly, or the contents of the file named by `NAME_FILE`.
 */
function readEnvOrFile(env: NodeJS.ProcessEnv, name: string): string {
  const filePath = optionalString(env[`${name}_FILE`]);

  if (filePath) {
    try {
      return fs.readFileSync(filePath, 'utf8').trim();
    } catch (error) {
      throw Errors.invalidConfig(
        `${name}_FILE`,
        `unable to read file: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  return (env[name] ?? '').trim();
}

function parseTokenScopes(raw: string): Record<string, string[]> | undefined {
  if (!raw) {
    return undefined;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw Errors.malformedJson('TOKEN_SCOPES', error instanceof Error ? error.message : String(error));
  }

  const parsed = TokenScopesSchema.safeParse(decoded);
  if (!parsed.success) {
    throw Errors.invalidConfig('TOKEN_SCOPES', 'must decode to a JSON object of string arrays');
  }
  return parsed.data;
}

/**
 * Build and validate gateway settings from an environment map.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): GatewaySettings {
  const accessToken = readEnvOrFile(env, 'MCP_ACCESS_TOKEN');
  const tokenScopes = parseTokenScopes((env.TOKEN_SCOPES ?? '').trim());
  const jwtSecret = readEnvOrFile(env, 'JWT_SECRET');

  if (!accessToken && !tokenScopes && !jwtSecret) {
    throw Errors.missingConfig(
      'MCP_ACCESS_TOKEN, TOKEN_SCOPES or JWT_SECRET must be configured for the HTTP server.'
    );
  }

  const rawLogLevel = env.LOG_LEVEL;
  const logLevel = rawLogLevel === undefined || rawLogLevel.trim() === ''
    ? LogLevel.INFO
    : parseLogLevel(rawLogLevel);
  if (!logLevel) {
    throw Errors.invalidConfig('LOG_LEVEL', `unknown level "${rawLogLevel}"`);
  }

  const candidate = {
    transport: (env.MCP_TRANSPORT ?? '').trim().toLowerCase() || 'http',
    intentPrecedence: (env.INTENT_PRECEDENCE ?? '').trim().toLowerCase() || 'intent',
    defaultMaxTools: parseNumber(env.MCP_MAX_TOOLS, 12),
    port: parseNumber(env.PORT, HTTP_DEFAULTS.PORT),
    applianceUrl: optionalString(env.APPLIANCE_URL),
    timeoutMs: parseNumber(env.APPLIANCE_TIMEOUT_MS, APPLIANCE_DEFAULTS.TIMEOUT_MS),
    maxRetries: parseNumber(env.APPLIANCE_MAX_RETRIES, APPLIANCE_DEFAULTS.MAX_RETRIES),
    retryBackoffMs: parseNumber(env.APPLIANCE_RETRY_BACKOFF_MS, APPLIANCE_DEFAULTS.RETRY_BACKOFF_MS),
  };

  const parsed = SettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue.message, { field: issue.path.join('.') });
  }
  const values = parsed.data;

  return Object.freeze({
    accessToken,
    tokenScopes,
    jwt: jwtSecret
      ? {
          secret: jwtSecret,
          issuer: optionalString(env.JWT_ISSUER),
          audience: optionalString(env.JWT_AUDIENCE)
        }
      : undefined,
    transport: values.transport,
    allowedOrigins: parseOrigins(env.ALLOWED_ORIGINS),
    logLevel,

    intentClassificationEnabled: parseBoolean(env.INTENT_CLASSIFICATION_ENABLED, true),
    intentFallbackToAll: parseBoolean(env.INTENT_FALLBACK_TO_ALL, true),
    intentPrecedence: values.intentPrecedence,
    strictContextLimit: parseBoolean(env.STRICT_CONTEXT_LIMIT, false),

    defaultMaxTools: values.defaultMaxTools,
    filterConfigPath: optionalString(env.FILTER_CONFIG_PATH) ?? 'filter-config.json',

    port: values.port,
    maxBodySize: optionalString(env.HTTP_MAX_BODY_SIZE) ?? HTTP_DEFAULTS.MAX_BODY_SIZE,

    appliance: {
      url: values.applianceUrl,
      apiKey: readEnvOrFile(env, 'APPLIANCE_API_KEY'),
      timeoutMs: values.timeoutMs,
      maxRetries: values.maxRetries,
      retryBackoffMs: values.retryBackoffMs
    },
    enableDebugTools: parseBoolean(env.ENABLE_DEBUG_TOOLS, false),
    enableDestructiveOperations: parseBoolean(env.ENABLE_DESTRUCTIVE_OPERATIONS, false),
  });
}
