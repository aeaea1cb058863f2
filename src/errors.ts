/**
 * Typed error helpers for the NEO RPC SDK.
 * - JSON-RPC error envelopes (RpcError)
 * - Non-200 responses (HttpError)
 * - Network failures and aborted calls (TransportError)
 * - Undecodable bodies and results that fail their schema (ParseError)
 * - Bad configuration (ConfigError)
 * - No reachable node among several (NodeSelectionError)
 */

import type { JsonRpcId } from './rpc/envelope'

interface BaseErrorOptions {
  code?: number
  data?: unknown
  cause?: unknown
  context?: Record<string, unknown>
}

/** Narrow error-like shapes without forcing instanceof checks across realms. */
export function isErrorLike(x: unknown): x is { message: string } {
  return typeof x === 'object' && x !== null && 'message' in x && typeof x.message === 'string'
}

/** Coerce unknown into an Error with best-effort message. */
export function ensureError(e: unknown, fallback = 'Unknown error'): Error {
  if (e instanceof Error) return e
  if (isErrorLike(e)) return new Error(e.message)
  if (typeof e === 'string') return new Error(e)
  try {
    return new Error(JSON.stringify(e) ?? fallback)
  } catch {
    return new Error(fallback)
  }
}

/** Base SDK error with optional machine-readable fields. */
export class BaseError extends Error {
  /** Optional numeric code (JSON-RPC error code or HTTP status). */
  readonly code?: number
  /** Arbitrary structured data (e.g., JSON-RPC error.data). */
  readonly data?: unknown
  override readonly cause?: unknown
  /** Additional context fields (safe to log). */
  readonly context?: Record<string, unknown>

  constructor(message: string, opts: BaseErrorOptions = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined)
    this.name = new.target.name
    this.code = opts.code
    this.data = opts.data
    this.cause = opts.cause
    this.context = opts.context
  }
}

/** JSON-RPC error envelope returned by the node. */
export class RpcError extends BaseError {
  readonly method: string
  readonly requestId: JsonRpcId | undefined

  constructor(method: string, message: string, opts: BaseErrorOptions & { id?: JsonRpcId } = {}) {
    super(message, opts)
    this.method = method
    this.requestId = opts.id
  }
}

/** The node answered with a status other than 200. */
export class HttpError extends BaseError {
  readonly status: number
  readonly statusText: string
  readonly bodyText?: string

  constructor(status: number, statusText: string, bodyText?: string, opts: BaseErrorOptions = {}) {
    super(`non-200 status code returned from NEO node, got: '${status}'`, { ...opts, code: status })
    this.status = status
    this.statusText = statusText
    this.bodyText = bodyText
  }
}

/** The request never produced a response (DNS, refused connection, abort, timeout). */
export class TransportError extends BaseError {}

/** The body was not JSON, or the result did not match the expected shape. */
export class ParseError extends BaseError {
  readonly method?: string

  constructor(message: string, opts: BaseErrorOptions & { method?: string } = {}) {
    super(message, opts)
    this.method = opts.method
  }
}

export class ConfigError extends BaseError {}

/** Outcome of probing one node during best-node selection. */
export interface NodeReport {
  url: string
  blockCount?: number
  error?: string
}

export class NodeSelectionError extends BaseError {
  readonly reports: readonly NodeReport[]

  constructor(message: string, reports: readonly NodeReport[]) {
    super(message, { context: { reports } })
    this.reports = reports
  }
}

export function isRpcError(e: unknown): e is RpcError {
  return e instanceof RpcError
}

/**
 * Map a JSON-RPC error object into an RpcError. The message keeps both the
 * code and the node's text so that callers matching on strings see both.
 */
export function rpcErrorFromObject(
  method: string,
  error: { code: number; message: string; data?: unknown },
  id?: JsonRpcId
): RpcError {
  return new RpcError(method, `error code: ${error.code}, error message: ${error.message}`, {
    id,
    code: error.code,
    data: error.data,
    context: { id, nodeMessage: error.message }
  })
}

/**
 * Human-friendly stringification of an error for logs.
 */
export function formatError(e: unknown): string {
  if (e instanceof BaseError) {
    const parts = [e.name, e.message]
    if (e instanceof RpcError) {
      parts.push(`method=${e.method}`)
      if (e.requestId !== undefined) parts.push(`id=${String(e.requestId)}`)
    }
    if (e.code !== undefined) parts.push(`code=${e.code}`)
    return parts.join(' | ')
  }
  const err = ensureError(e)
  return `${err.name}: ${err.message}`
}
