// src/config/env.ts

import dotenv from 'dotenv';
import fs from 'fs';
import { validateConfig, type InitConfig } from './ConfigValidator';

export interface EnvConfigOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Optional .env file; variables already in `env` take precedence */
  dotenvPath?: string;
}

/**
 * Builds an SDK configuration from environment variables:
 * MDBLIST_API_KEY, TMDB_API_KEY, TRAKT_CLIENT_ID, LOG_LEVEL, LOG_FORMAT,
 * HTTP_TIMEOUT_MS.
 */
export function loadConfigFromEnv(options: EnvConfigOptions = {}): InitConfig {
  const fromFile = options.dotenvPath ? dotenv.parse(fs.readFileSync(options.dotenvPath)) : {};
  const env: NodeJS.ProcessEnv = { ...fromFile, ...(options.env ?? process.env) };

  const timeout = env.HTTP_TIMEOUT_MS ? Number(env.HTTP_TIMEOUT_MS) : undefined;

  return validateConfig({
    credentials: {
      mdbListApiKey: nonEmpty(env.MDBLIST_API_KEY),
      tmdbApiKey: nonEmpty(env.TMDB_API_KEY),
      traktClientId: nonEmpty(env.TRAKT_CLIENT_ID),
    },
    ...(timeout !== undefined ? { http: { timeout } } : {}),
    logging: {
      level: nonEmpty(env.LOG_LEVEL),
      format: nonEmpty(env.LOG_FORMAT),
    },
  });
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
