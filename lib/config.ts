/**
 * Configuration
 *
 * Process-wide settings, loaded lazily from the environment and overridable
 * with `configure()`:
 *
 * - GRAPH_OBJECT_ID_KEY     identifier key used by identity comparison
 * - GRAPH_OBJECT_MAX_DEPTH  nesting limit for toJSON()
 * - GRAPH_OBJECT_LOG_LEVEL  debug | info | warn | error
 * - DEBUG                   any value switches the default level to debug
 *
 * @module lib/config
 */

import { z } from 'zod'
import { ConfigError, type ConfigIssue } from './errors.js'
import { defaultLogLevel, logger, type Logger } from './logger.js'

const log = logger.child('config')

// =============================================================================
// Schema
// =============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

export const GraphObjectConfigSchema = z
  .object({
    /** Key holding a node's domain identifier */
    identifierKey: z.string().min(1),
    /** Maximum nesting depth toJSON() will export */
    maxDepth: z.number().int().positive().max(10_000),
    logLevel: LogLevelSchema,
  })
  .strict()

export type GraphObjectConfig = z.infer<typeof GraphObjectConfigSchema>

export const defaultConfig: GraphObjectConfig = {
  identifierKey: 'id',
  maxDepth: 100,
  logLevel: 'warn',
}

// =============================================================================
// Loading
// =============================================================================

let _config: GraphObjectConfig | null = null

function readEnv(name: string): string | undefined {
  return typeof process !== 'undefined' ? process.env?.[name] : undefined
}

function toIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.') || '<root>',
    message: issue.message,
  }))
}

/**
 * Take one environment override, or keep the default when it does not parse
 */
function envOverride<T>(name: string, schema: z.ZodType<T>, fallback: T): T {
  const raw = readEnv(name)
  if (raw === undefined || raw === '') return fallback

  const result = schema.safeParse(raw)
  if (result.success) return result.data

  log.warn(`Ignoring invalid ${name}`, { value: raw, issues: toIssues(result.error) })
  return fallback
}

function loadConfig(): GraphObjectConfig {
  return {
    identifierKey: envOverride('GRAPH_OBJECT_ID_KEY', GraphObjectConfigSchema.shape.identifierKey, defaultConfig.identifierKey),
    maxDepth: envOverride(
      'GRAPH_OBJECT_MAX_DEPTH',
      z.coerce.number().pipe(GraphObjectConfigSchema.shape.maxDepth),
      defaultConfig.maxDepth,
    ),
    logLevel: envOverride('GRAPH_OBJECT_LOG_LEVEL', LogLevelSchema, defaultLogLevel()),
  }
}

/**
 * Get the effective configuration
 */
export function getConfig(): GraphObjectConfig {
  if (_config) return _config

  _config = loadConfig()
  logger.setLevel(_config.logLevel)
  return _config
}

/**
 * Merge overrides into the current configuration.
 *
 * @throws ConfigError when the merged configuration does not validate
 */
export function configure(overrides: Partial<GraphObjectConfig>): GraphObjectConfig {
  const result = GraphObjectConfigSchema.safeParse({ ...getConfig(), ...overrides })
  if (!result.success) {
    throw new ConfigError(toIssues(result.error))
  }

  _config = result.data
  logger.setLevel(_config.logLevel)
  log.debug('configuration updated', { ...result.data })
  return _config
}

/**
 * Drop all overrides and reload from the environment
 */
export function resetConfig(): void {
  _config = null
  getConfig()
}

/**
 * Logger for one module, with the configured level already applied
 */
export function moduleLogger(context: string): Logger {
  getConfig()
  return logger.child(context)
}
