/**
 * Environment-driven configuration for clients built with NeoClient.fromEnv().
 *
 *   NEO_RPC_NODES       comma separated node URLs; wins over NEO_RPC_URL
 *   NEO_RPC_URL         a single node URL
 *   NEO_RPC_TIMEOUT_MS  per-request timeout in ms (optional)
 *   NEO_LOG_LEVEL       trace | debug | info | warn | error | silent
 *
 * With nothing set the client talks to a local node on the default RPC port.
 */

import { z } from 'zod'
import { ConfigError } from './errors'
import { LOG_LEVELS, type LogLevelName } from './utils/logger'

export const DEFAULT_RPC_URL = 'http://127.0.0.1:10332'

export type EnvLike = Partial<Record<string, string | undefined>>

export interface NeoConfig {
  nodes: string[]
  timeoutMs?: number
  logLevel: LogLevelName
}

const NodeUrl = z
  .string()
  .trim()
  .url('Must be an absolute URL')
  .refine((s) => /^https?:\/\//i.test(s), { message: 'Must be an http(s) URL' })

const NodeList = z
  .string()
  .transform((s) =>
    s
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
  )
  .pipe(z.array(NodeUrl).min(1, 'Must list at least one node'))

const EnvSchema = z.object({
  NEO_RPC_NODES: NodeList.optional(),
  NEO_RPC_URL: NodeUrl.optional(),
  NEO_RPC_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  NEO_LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
})

/** Treat empty variables as unset. */
function compact(env: EnvLike): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [k, v] of Object.entries(env)) {
    if (typeof v === 'string' && v.trim() !== '') out[k] = v
  }
  return out
}

export function loadConfig(env: EnvLike = process.env): NeoConfig {
  const parsed = EnvSchema.safeParse(compact(env))
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`)
    throw new ConfigError(`invalid configuration: ${issues.join('; ')}`, { data: parsed.error.issues })
  }
  const e = parsed.data
  return {
    nodes: e.NEO_RPC_NODES ?? [e.NEO_RPC_URL ?? DEFAULT_RPC_URL],
    timeoutMs: e.NEO_RPC_TIMEOUT_MS,
    logLevel: e.NEO_LOG_LEVEL
  }
}
