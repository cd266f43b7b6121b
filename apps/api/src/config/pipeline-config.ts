/**
 * Pipeline configuration
 * Environment variables (see .env.example) plus the agency list in config/agencies.json.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, resolve } from 'path';
import { z } from 'zod';
import { ConfigError, DEFAULT_QUALITY_GATE_CONFIG, errorMessage } from '@feedgate/domain';
import type { QualityGateConfig } from '@feedgate/domain';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z.string().optional(),
  STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  FEED_URL: z.string().url().optional(),
  AGENCY_ID: z.string().min(1).optional(),
  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FETCH_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  AGGREGATE_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  WEATHER_INTERVAL_MS: z.coerce.number().int().positive().default(300_000),
  WEATHER_API_BASE: z.string().url().default('https://api.open-meteo.com/v1'),
  WEATHER_CACHE_TTL_MS: z.coerce.number().int().positive().default(300_000),
  WEATHER_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(256),
  PROMOTION_WINDOW_MS: z.coerce.number().int().positive().default(600_000),
  AGENCIES_CONFIG_PATH: z.string().default('config/agencies.json'),
  CORS_ORIGIN: z.string().default('*'),
});

export type PipelineEnv = z.infer<typeof envSchema>;

const boundsSchema = z
  .object({
    minLat: z.number().min(-90).max(90),
    maxLat: z.number().min(-90).max(90),
    minLon: z.number().min(-180).max(180),
    maxLon: z.number().min(-180).max(180),
  })
  .refine((b) => b.minLat <= b.maxLat && b.minLon <= b.maxLon, {
    message: 'bounding box minimum exceeds maximum',
  });

const agencySchema = z.object({
  agencyId: z.string().min(1),
  name: z.string(),
  feedUrl: z.string().url().optional(),
  bounds: boundsSchema.optional(),
  weatherCenter: z
    .object({ latitude: z.number().min(-90).max(90), longitude: z.number().min(-180).max(180) })
    .optional(),
});

const agenciesFileSchema = z.object({ agencies: z.array(agencySchema) });

export type AgencyConfig = z.infer<typeof agencySchema>;

export interface PipelineConfig {
  env: PipelineEnv;
  agencies: AgencyConfig[];
  quality: QualityGateConfig;
}

/** Throws ZodError on invalid values. Empty variables count as unset. */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): PipelineEnv {
  return envSchema.parse(Object.fromEntries(Object.entries(env).filter(([, value]) => value !== '')));
}

function resolveConfigPath(path: string): string {
  if (isAbsolute(path)) return path;
  const besideApp = resolve(__dirname, '../..', path);
  return existsSync(besideApp) ? besideApp : resolve(process.cwd(), path);
}

export function loadAgencies(path: string): AgencyConfig[] {
  const fullPath = resolveConfigPath(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`cannot read agency config ${fullPath}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = agenciesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid agency config ${fullPath}: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  return parsed.data.agencies;
}

/** Default thresholds with each configured agency's service area. */
export function qualityConfigFor(agencies: readonly AgencyConfig[]): QualityGateConfig {
  const agencyBounds: Record<string, NonNullable<AgencyConfig['bounds']>> = {};
  for (const agency of agencies) {
    if (agency.bounds) agencyBounds[agency.agencyId] = agency.bounds;
  }
  return { ...DEFAULT_QUALITY_GATE_CONFIG, agencyBounds };
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsedEnv = loadEnv(env);
  const agencies = loadAgencies(parsedEnv.AGENCIES_CONFIG_PATH);
  return { env: parsedEnv, agencies, quality: qualityConfigFor(agencies) };
}
