// src/config.ts

/**
 * Centralized configuration for the selector: cache backend, checkpoint store and router tuning.
 */

// Load environment variables from .env.selector
import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { z } from 'zod'
import { ReasonedError } from '@freeroute/reasons'

// Resolve package root for both ts source (src) and built (dist/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const packageRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..')

// Try to load .env.selector from package root, with cwd fallback
const candidateEnvPaths = [
  path.join(packageRoot, '.env.selector'),
  path.join(process.cwd(), '.env.selector')
]
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p })
    break
  }
}

type EnvSource = Record<string, string | undefined>

const optionalText = z
  .string()
  .optional()
  .transform(v => (v && v.trim() !== '' ? v.trim() : undefined))

const SettingsSchema = z.object({
  CATALOG_TTL_SECONDS: z.coerce.number().int().min(0).default(3600),
  CATALOG_CACHE_KEY: z.string().min(1).default('catalog:free_candidates'),
  ROUTER_CHECKPOINT_DIR: z.string().min(1).default('.router-state'),
  ROUTER_CHECKPOINT_KEY: z.string().min(1).default('router_state.json'),
  CHECKPOINT_S3_BUCKET: optionalText,
  CHECKPOINT_S3_PREFIX: z.string().default(''),
  ROUTER_EXPLORATION: z.coerce.number().min(0).default(1.4),
  ROUTER_MIN_PULLS: z.coerce.number().int().min(0).default(1),
})

export type Settings = {
  cacheUrl?: string
  catalogTtlSeconds: number
  catalogCacheKey: string
  checkpointDir: string
  checkpointKey: string
  checkpointBucket?: string
  checkpointPrefix: string
  exploration: number
  minPulls: number
}

/**
 * Redis URL from CACHE_URL, or assembled from REDIS_* parts when only a password is provisioned.
 */
export function buildCacheUrl(env: EnvSource): string | undefined {
  if (env.CACHE_URL) return env.CACHE_URL

  const password = env.REDIS_PASSWORD
  if (!password) return undefined

  const username = env.REDIS_USERNAME || 'default'
  const host = env.REDIS_HOST || 'cache'
  const port = env.REDIS_PORT || '6379'
  const db = env.REDIS_DB || '0'
  return `redis://${username}:${password}@${host}:${port}/${db}`
}

export function loadSettings(env: EnvSource = process.env): Settings {
  // empty strings count as unset so that `FOO=` in an env file falls back to the default
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''))
  const res = SettingsSchema.safeParse(present)
  if (!res.success) {
    const issue = res.error.issues[0]
    throw ReasonedError.of('CONFIG_INVALID', {
      message: `Invalid configuration: ${issue.path.join('.')}: ${issue.message}`,
      context: { field: issue.path.join('.') }
    })
  }
  const v = res.data
  return {
    cacheUrl: buildCacheUrl(env),
    catalogTtlSeconds: v.CATALOG_TTL_SECONDS,
    catalogCacheKey: v.CATALOG_CACHE_KEY,
    checkpointDir: v.ROUTER_CHECKPOINT_DIR,
    checkpointKey: v.ROUTER_CHECKPOINT_KEY,
    checkpointBucket: v.CHECKPOINT_S3_BUCKET,
    checkpointPrefix: v.CHECKPOINT_S3_PREFIX,
    exploration: v.ROUTER_EXPLORATION,
    minPulls: v.ROUTER_MIN_PULLS,
  }
}
