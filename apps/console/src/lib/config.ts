import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_RESTORE_DAYS, DEFAULT_STATUS_LIMIT } from '@tierdeck/core';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_REGION = 'us-east-1';
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const configSchema = z.object({
  policyFile: z.string().min(1),
  logFile: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
  restoreDays: z.number().int().positive(),
  statusLimit: z.number().int().positive(),
  s3: z.object({
    region: z.string().min(1),
    endpoint: z.string().url().optional(),
    forcePathStyle: z.boolean(),
    requestTimeoutMs: z.number().int().positive()
  })
});

export type ConsoleConfig = z.infer<typeof configSchema>;

export type ConsoleConfigOverrides = {
  policyFile?: string;
  logFile?: string;
  logLevel?: string;
  region?: string;
  endpoint?: string;
};

let cachedConfig: ConsoleConfig | null = null;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || 'info').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

function positiveInteger(value: number, fallback: number): number {
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function configHome(env: NodeJS.ProcessEnv): string {
  return env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
}

function stateHome(env: NodeJS.ProcessEnv): string {
  return env.XDG_STATE_HOME || path.join(os.homedir(), '.local', 'state');
}

/** Reads the console configuration from the environment. The result is cached. */
export function loadConsoleConfig(env: NodeJS.ProcessEnv = process.env): ConsoleConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const policyFile = env.TIERDECK_POLICY_FILE || path.join(configHome(env), 'tierdeck', 'policies.json');
  const logFile = env.TIERDECK_LOG_FILE || path.join(stateHome(env), 'tierdeck', 'tierdeck.log');
  const logLevel = resolveLogLevel(env.TIERDECK_LOG_LEVEL);
  const restoreDays = parseNumber(env.TIERDECK_RESTORE_DAYS, DEFAULT_RESTORE_DAYS);
  const statusLimit = parseNumber(env.TIERDECK_STATUS_LIMIT, DEFAULT_STATUS_LIMIT);
  const region = env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_REGION;
  const endpoint = env.TIERDECK_S3_ENDPOINT || env.AWS_ENDPOINT_URL_S3 || undefined;
  const forcePathStyle = parseBoolean(env.TIERDECK_S3_FORCE_PATH_STYLE, Boolean(endpoint));
  const requestTimeoutMs = parseNumber(env.TIERDECK_REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS);

  const candidateConfig: ConsoleConfig = {
    policyFile: path.resolve(policyFile),
    logFile: path.resolve(logFile),
    logLevel,
    restoreDays: positiveInteger(restoreDays, DEFAULT_RESTORE_DAYS),
    statusLimit: positiveInteger(statusLimit, DEFAULT_STATUS_LIMIT),
    s3: {
      region,
      endpoint,
      forcePathStyle,
      requestTimeoutMs: positiveInteger(requestTimeoutMs, DEFAULT_REQUEST_TIMEOUT_MS)
    }
  };

  cachedConfig = configSchema.parse(candidateConfig);
  return cachedConfig;
}

/** Layers command-line flags over a loaded configuration. */
export function applyConfigOverrides(config: ConsoleConfig, overrides: ConsoleConfigOverrides): ConsoleConfig {
  return configSchema.parse({
    ...config,
    policyFile: overrides.policyFile ? path.resolve(overrides.policyFile) : config.policyFile,
    logFile: overrides.logFile ? path.resolve(overrides.logFile) : config.logFile,
    logLevel: overrides.logLevel ? resolveLogLevel(overrides.logLevel) : config.logLevel,
    s3: {
      ...config.s3,
      region: overrides.region || config.s3.region,
      endpoint: overrides.endpoint || config.s3.endpoint,
      forcePathStyle: config.s3.forcePathStyle || Boolean(overrides.endpoint)
    }
  });
}

export function resetCachedConsoleConfig(): void {
  cachedConfig = null;
}
