// lib/config.ts
// Runtime configuration, read from the environment once and validated.

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import type { DuplicateSymbolPolicy, LogLevel } from '../types';
import { InvalidOptions } from './errors';

const BUNDLED_DB_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../data/db');

export type OpticalConstantsConfig = {
  /** Holds metadata/<collection>/*.json and data/<file>. */
  dbRoot: string;
  duplicateSymbols: DuplicateSymbolPolicy;
  logLevel: LogLevel;
};

const EnvSchema = z.object({
  OCDB_DB_ROOT: z.string().min(1).optional(),
  OCDB_DUPLICATE_SYMBOLS: z.enum(['reject', 'replace']).optional(),
  OCDB_LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
});

export const DEFAULT_CONFIG: OpticalConstantsConfig = {
  dbRoot: BUNDLED_DB_ROOT,
  duplicateSymbols: 'reject',
  logLevel: 'warn',
};

export function loadConfig(env: Record<string, string | undefined> = process.env): OpticalConstantsConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidOptions(`Invalid configuration ${issue.path.join('.')}: ${issue.message}`);
  }
  const e = parsed.data;
  return {
    dbRoot: e.OCDB_DB_ROOT ? path.resolve(e.OCDB_DB_ROOT) : DEFAULT_CONFIG.dbRoot,
    duplicateSymbols: e.OCDB_DUPLICATE_SYMBOLS ?? DEFAULT_CONFIG.duplicateSymbols,
    logLevel: e.OCDB_LOG_LEVEL ?? DEFAULT_CONFIG.logLevel,
  };
}
