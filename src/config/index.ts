/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable; services receive the values they need
 * through their constructors.
 */
import dotenv from 'dotenv';
import { ConfigurationError } from '../errors';

dotenv.config();

export interface AppConfig {
  env: string;
  port: number;
  logLevel: string;
  openai: {
    apiKey: string;
    model: string;
    /** Upstream request timeout in ms. */
    timeoutMs: number;
  };
}

function parseIntOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    env: env.NODE_ENV || 'development',
    port: parseIntOr(env.PORT, 4000),
    logLevel: env.LOG_LEVEL || 'info',
    openai: {
      apiKey: env.OPENAI_API_KEY?.trim() || '',
      model: env.OPENAI_MODEL || 'gpt-4o-mini',
      timeoutMs: parseIntOr(env.OPENAI_TIMEOUT_MS, 8000),
    },
  };
}

/** Fails fast on settings the service cannot run without. */
export function assertConfig(cfg: AppConfig): void {
  if (!cfg.openai.apiKey) {
    throw new ConfigurationError('OPENAI_API_KEY is required');
  }
  if (cfg.openai.timeoutMs <= 0) {
    throw new ConfigurationError(`OPENAI_TIMEOUT_MS must be positive, got ${cfg.openai.timeoutMs}`);
  }
}

export const config = loadConfig();
