/**
 * TCP reachability check for a node URL: open a socket to its host and port,
 * then close it. Neither TLS nor HTTP is spoken and no RPC is sent, so a true
 * result only means the port accepts TCP connections.
 */

import { createConnection } from 'node:net'

export interface PingOptions {
  /** Give up after this many ms. Default: 5000. */
  timeoutMs?: number
}

const DEFAULT_PORTS: Record<string, number> = {
  'http:': 80,
  'https:': 443
}

/** Host and port a node URL points at, or null when the URL cannot be used. */
export function endpointOf(url: string): { host: string; port: number } | null {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return null
  }
  const port = parsed.port ? Number(parsed.port) : DEFAULT_PORTS[parsed.protocol]
  if (!parsed.hostname || port === undefined) return null
  // URL keeps IPv6 literals bracketed; net wants them bare.
  const host = parsed.hostname.replace(/^\[(.*)\]$/, '$1')
  return { host, port }
}

/** Resolves true when a TCP connection opens, false otherwise. Never rejects. */
export function ping(url: string, opts: PingOptions = {}): Promise<boolean> {
  const endpoint = endpointOf(url)
  if (!endpoint) return Promise.resolve(false)

  return new Promise<boolean>((resolve) => {
    const socket = createConnection(endpoint)
    const finish = (ok: boolean) => {
      socket.removeAllListeners()
      socket.destroy()
      resolve(ok)
    }
    socket.setTimeout(opts.timeoutMs ?? 5_000)
    socket.once('connect', () => finish(true))
    socket.once('timeout', () => finish(false))
    socket.once('error', () => finish(false))
  })
}
