/**
 * Configuration.
 * Reads an optional consult.config.json, validates it against the schema and
 * falls back to defaults. Every field is optional.
 * Data path resolves relative to where the process is launched.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { logger } from './logger.js';

const PerformanceSpecSchema = (d: {
  response_time_ms: number; accuracy_threshold: number; availability_threshold: number;
  max_concurrent_requests: number; cache_timeout_ms: number;
}) => z
  .object({
    response_time_ms: z.number().int().positive().default(d.response_time_ms),
    accuracy_threshold: z.number().min(0).max(1).default(d.accuracy_threshold),
    availability_threshold: z.number().min(0).max(1).default(d.availability_threshold),
    max_concurrent_requests: z.number().int().positive().default(d.max_concurrent_requests),
    cache_timeout_ms: z.number().int().nonnegative().default(d.cache_timeout_ms),
  })
  .default({});

export const ConfigSchema = z.object({
  registry: z
    .object({
      max_agents: z.number().int().positive().default(100),
    })
    .default({}),

  performance: z
    .object({
      default: PerformanceSpecSchema({
        response_time_ms: 3_000, accuracy_threshold: 0.95, availability_threshold: 0.999,
        max_concurrent_requests: 100, cache_timeout_ms: 300_000,
      }),
      high: PerformanceSpecSchema({
        response_time_ms: 2_000, accuracy_threshold: 0.96, availability_threshold: 0.999,
        max_concurrent_requests: 200, cache_timeout_ms: 600_000,
      }),
      critical: PerformanceSpecSchema({
        response_time_ms: 1_000, accuracy_threshold: 1.0, availability_threshold: 0.999,
        max_concurrent_requests: 50, cache_timeout_ms: 60_000,
      }),
    })
    .default({}),

  failover: z
    .object({
      recovery_timeout_ms: z.number().int().nonnegative().default(30_000),
      max_backup_agents: z.number().int().nonnegative().default(3),
      enable_automatic_failover: z.boolean().default(true),
      health_check_interval_ms: z.number().int().positive().default(60_000),
      failure_threshold: z.number().int().positive().default(3),
    })
    .default({}),

  context: z
    .object({
      session_timeout_ms: z.number().int().positive().default(30 * 60_000),
      /** Keyword vocabulary for specialized contexts; bundled file when null */
      vocabulary_path: z.string().nullable().default(null),
    })
    .default({}),

  story: z
    .object({
      allowed_repository: z.string().default('backend-service'),
      required_title_markers: z.array(z.string()).default(['[BACKEND]', '[STORY]']),
      max_rewrite_iterations: z.number().int().nonnegative().default(2),
      max_acceptance_criteria: z.number().int().positive().default(25),
      max_open_questions: z.number().int().nonnegative().default(10),
      enable_loop_detection: z.boolean().default(true),
    })
    .default({}),

  monitor: z
    .object({
      interval_ms: z.number().int().positive().default(30_000),
      history_size: z.number().int().positive().default(100),
    })
    .default({}),

  agents: z
    .object({
      /** Default agent catalog; bundled file when null */
      catalog_path: z.string().nullable().default(null),
    })
    .default({}),

  storage: z
    .object({
      base_path: z.string().default(() => resolveDataPath()),
    })
    .default({}),

  audit: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
    })
    .default({}),
});

export type ConsultConfig = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

function resolveDataPath(): string {
  if (process.env.CONSULT_DATA_PATH) return resolve(process.env.CONSULT_DATA_PATH);
  return resolve(process.cwd(), 'data');
}

/**
 * Path of a JSON file shipped in the project's config/ directory.
 * Resolves from this module's location, so it works from src/ and dist/.
 */
export function bundledFile(name: string): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), '..', 'config', name);
}

let _config: ConsultConfig | null = null;

function readConfigFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    logger.error({ path, err }, 'Config file is not valid JSON, using defaults');
    return {};
  }
}

/**
 * Load and validate configuration.
 *
 * Looks at the explicit path, then `CONSULT_CONFIG`, then
 * `./consult.config.json`. `overrides` are merged section by section on top of
 * the file, which is how tests and embedders adjust single values.
 */
export function loadConfig(configPath?: string, overrides: ConfigInput = {}): ConsultConfig {
  if (_config) return _config;

  const candidates = [
    configPath,
    process.env.CONSULT_CONFIG,
    resolve(process.cwd(), 'consult.config.json'),
  ].filter((p): p is string => typeof p === 'string' && p.length > 0);

  let file: unknown = {};
  const found = candidates.find((p) => existsSync(p));
  if (found) file = readConfigFile(found);

  const merged = mergeSections(file, overrides);
  const result = ConfigSchema.safeParse(merged);
  if (result.success) {
    _config = result.data;
  } else {
    logger.error({ path: found ?? null, issues: result.error.issues }, 'Invalid configuration, using defaults');
    _config = ConfigSchema.parse({});
  }
  return _config;
}

export function getConfig(): ConsultConfig {
  if (!_config) return loadConfig();
  return _config;
}

/** Drop the cached config so the next getConfig() reloads. */
export function resetConfig(): void {
  _config = null;
}

function mergeSections(file: unknown, overrides: ConfigInput): Record<string, unknown> {
  const base: Record<string, unknown> = isRecord(file) ? { ...file } : {};
  for (const [key, value] of Object.entries(overrides)) {
    const current = base[key];
    base[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return base;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
