/**
 * SDK version & runtime metadata.
 * The version should match package.json.
 */

export const version = '0.1.0'

const detectRuntimeTarget = (): 'node' | 'browser' | 'universal' => {
  if (typeof process !== 'undefined' && process.release?.name === 'node') return 'node'
  if (typeof globalThis === 'object' && 'window' in globalThis) return 'browser'
  return 'universal'
}

export const buildMeta = {
  version,
  target: detectRuntimeTarget()
}

/** Compact UA-style banner sent as the user-agent header on RPC calls. */
export function userAgent(): string {
  return `neo-rpc-sdk/${version} (${buildMeta.target})`
}
