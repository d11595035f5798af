/**
 * Scheduler Configuration Loader
 *
 * Loads store and server settings from .scheduler/config.yaml and the
 * store credential from GITHUB_TOKEN or .scheduler/credentials.json.
 */

import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigError, describeError } from './errors.js'
import type { StoreConfig } from './types.js'

const CONFIG_DIRNAME = '.scheduler'
const CONFIG_FILENAME = 'config.yaml'
const CREDENTIALS_FILENAME = 'credentials.json'

const DEFAULT_PATH = 'schedule.csv'
const DEFAULT_BRANCH = 'main'
const DEFAULT_API_BASE_URL = 'https://api.github.com'
const DEFAULT_MIRROR_BASE_URL = 'https://raw.githubusercontent.com'
const DEFAULT_PORT = 4321
const DEFAULT_HOST = '127.0.0.1'
const USER_AGENT = 'csv-scheduler'

const yamlConfigSchema = z.object({
  store: z
    .object({
      mode: z.enum(['github', 'mock']).optional(),
      repo: z
        .string()
        .regex(/^[^/\s]+\/[^/\s]+$/, 'Expected owner/name')
        .optional(),
      path: z.string().min(1).optional(),
      branch: z.string().min(1).optional(),
      apiBaseUrl: z.string().url().optional(),
      mirrorBaseUrl: z.string().url().optional(),
    })
    .optional(),
  server: z
    .object({
      port: z.number().int().min(1).max(65535).optional(),
      host: z.string().min(1).optional(),
    })
    .optional(),
})

type YamlConfig = z.infer<typeof yamlConfigSchema>

const credentialsSchema = z.object({
  token: z.string().min(1),
})

export type StoreMode = 'github' | 'mock'

export interface SchedulerConfig {
  configDir: string
  store: {
    mode: StoreMode
    repo: string | null
    path: string
    branch: string
    apiBaseUrl: string
    mirrorBaseUrl: string
  }
  server: {
    port: number
    host: string
  }
}

export interface LoadOptions {
  configDir?: string
  env?: NodeJS.ProcessEnv
}

export function findConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SCHEDULER_DIR) return path.resolve(env.SCHEDULER_DIR)

  // Walk up from cwd looking for an existing .scheduler/ directory
  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, CONFIG_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // None found: place it beside the repository root
  dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, '.git'))) {
      return path.join(dir, CONFIG_DIRNAME)
    }
    dir = path.dirname(dir)
  }
  return path.resolve(CONFIG_DIRNAME)
}

function loadYamlConfig(configDir: string): YamlConfig {
  const configPath = path.join(configDir, CONFIG_FILENAME)
  if (!existsSync(configPath)) {
    return {}
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    console.warn(`[Config] Could not parse ${configPath}: ${describeError(err)}. Using defaults.`)
    return {}
  }

  const parsed = yamlConfigSchema.safeParse(raw ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    console.warn(`[Config] Invalid ${configPath} (${issues}). Using defaults.`)
    return {}
  }
  return parsed.data
}

function parsePort(value: string | undefined): number | undefined {
  if (!value) return undefined
  const port = Number.parseInt(value, 10)
  return Number.isInteger(port) && port > 0 && port <= 65535 ? port : undefined
}

/**
 * Load scheduler configuration. Environment variables override the file.
 */
export function loadSchedulerConfig(options: LoadOptions = {}): SchedulerConfig {
  const env = options.env ?? process.env
  const configDir = options.configDir ?? findConfigDir(env)
  const yaml = loadYamlConfig(configDir)

  return {
    configDir,
    store: {
      mode: yaml.store?.mode ?? 'github',
      repo: env.SCHEDULER_REPO ?? yaml.store?.repo ?? null,
      path: env.SCHEDULER_PATH ?? yaml.store?.path ?? DEFAULT_PATH,
      branch: env.SCHEDULER_BRANCH ?? yaml.store?.branch ?? DEFAULT_BRANCH,
      apiBaseUrl: yaml.store?.apiBaseUrl ?? DEFAULT_API_BASE_URL,
      mirrorBaseUrl: yaml.store?.mirrorBaseUrl ?? DEFAULT_MIRROR_BASE_URL,
    },
    server: {
      port: parsePort(env.PORT) ?? yaml.server?.port ?? DEFAULT_PORT,
      host: yaml.server?.host ?? DEFAULT_HOST,
    },
  }
}

/**
 * Load the store credential. Returns null (read-only mode) when neither
 * GITHUB_TOKEN nor a valid credentials.json is present.
 */
export function loadStoreCredential(options: LoadOptions = {}): string | null {
  const env = options.env ?? process.env
  const fromEnv = env.GITHUB_TOKEN?.trim()
  if (fromEnv) return fromEnv

  const configDir = options.configDir ?? findConfigDir(env)
  const credentialsPath = path.join(configDir, CREDENTIALS_FILENAME)

  if (!existsSync(credentialsPath)) {
    console.warn(`[Config] No credential found (GITHUB_TOKEN or ${credentialsPath}). Read-only mode.`)
    return null
  }

  try {
    const parsed = credentialsSchema.safeParse(JSON.parse(readFileSync(credentialsPath, 'utf-8')))
    if (!parsed.success) {
      console.warn(`[Config] Invalid credentials file at ${credentialsPath}: missing token. Read-only mode.`)
      return null
    }
    return parsed.data.token
  } catch (err) {
    console.warn(`[Config] Could not load credentials: ${describeError(err)}. Read-only mode.`)
    return null
  }
}

/**
 * Assemble the explicit client configuration for a GitHub-backed store.
 */
export function buildStoreConfig(config: SchedulerConfig, token: string | null): StoreConfig {
  const { repo, path: blobPath, branch, apiBaseUrl, mirrorBaseUrl } = config.store
  if (!repo) {
    throw new ConfigError(
      `No repository configured: set store.repo in ${path.join(config.configDir, CONFIG_FILENAME)} or SCHEDULER_REPO`,
    )
  }

  return {
    repo,
    path: blobPath,
    branch,
    apiBaseUrl,
    mirrorBaseUrl,
    token,
    userAgent: USER_AGENT,
  }
}
