/**
 * Runtime configuration.
 * Read once from the environment; invalid values fail fast at startup.
 */

import type { LogLevel } from './providers/ILogProvider.js';

export interface ScoringConfig {
  /** Fraction of a descendant's score each ancestor step keeps. */
  depthDecayFactor: number;
  /** Maximum edges an ancestor walk may follow. */
  ancestorLimit: number;
  /** Smallest reputation change that counts as material for notifications. */
  materialChangeThreshold: number;
}

export interface AppConfig {
  supabase: { url: string; serviceRoleKey: string } | null;
  axiom: { apiToken: string; dataset: string } | null;
  notifyWebhookUrl: string | null;
  logLevel: LogLevel;
  scoring: ScoringConfig;
}

export const DEFAULT_SCORING: ScoringConfig = {
  depthDecayFactor: 0.5,
  ancestorLimit: 1000,
  materialChangeThreshold: 0.01,
};

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  const depthDecayFactor = readNumber(env, 'DEPTH_DECAY_FACTOR', DEFAULT_SCORING.depthDecayFactor);
  if (depthDecayFactor <= 0 || depthDecayFactor > 1) {
    throw new Error('DEPTH_DECAY_FACTOR must be in (0, 1]');
  }

  const ancestorLimit = readNumber(env, 'ANCESTOR_LIMIT', DEFAULT_SCORING.ancestorLimit);
  if (!Number.isInteger(ancestorLimit) || ancestorLimit < 1) {
    throw new Error('ANCESTOR_LIMIT must be a positive integer');
  }

  const materialChangeThreshold = readNumber(
    env,
    'MATERIAL_CHANGE_THRESHOLD',
    DEFAULT_SCORING.materialChangeThreshold
  );
  if (materialChangeThreshold < 0) {
    throw new Error('MATERIAL_CHANGE_THRESHOLD must not be negative');
  }

  return {
    supabase:
      env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY
        ? { url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY }
        : null,
    axiom:
      env.AXIOM_API_KEY && env.AXIOM_DATASET
        ? { apiToken: env.AXIOM_API_KEY, dataset: env.AXIOM_DATASET }
        : null,
    notifyWebhookUrl: env.NOTIFY_WEBHOOK_URL || null,
    logLevel,
    scoring: { depthDecayFactor, ancestorLimit, materialChangeThreshold },
  };
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as string[]).includes(value);
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}
