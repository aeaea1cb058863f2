/**
 * HTTP JSON-RPC 2.0 transport (fetch-based) for NEO nodes.
 *
 * Usage:
 *   import { createHttpClient } from 'neo-rpc-sdk/rpc'
 *   const rpc = createHttpClient('http://127.0.0.1:10332')
 *   const hash = await rpc.request('getbestblockhash')
 *
 * One POST per call. Failures surface in this order:
 *  - no complete response    → TransportError (network, abort, timeout)
 *  - status other than 200   → HttpError
 *  - body is not an envelope → ParseError
 *  - error.message non-empty → RpcError ("error code: …, error message: …")
 */

import {
  makeRequest,
  parseEnvelope,
  isJsonRpcFailure,
  failureOf,
  type JsonRpcParams,
  type RequestOptions,
  type RpcTransport
} from './envelope'
import { HttpError, ParseError, rpcErrorFromObject } from '../errors'
import { postJson } from '../utils/fetch'
import { logger, type ILogger } from '../utils/logger'
import { userAgent } from '../version'

/** Options for the HTTP JSON-RPC client. */
export interface HttpClientOptions {
  /** Extra headers to send with every request (e.g., API keys). */
  headers?: Record<string, string>
  /**
   * Default per-request timeout (ms). Can be overridden per call via RequestOptions.timeoutMs.
   * Default: none, the request lasts as long as the underlying fetch allows.
   */
  timeoutMs?: number
  /** Function to create JSON-RPC ids. Default is an incrementing integer counter starting at 1. */
  idFactory?: () => number | string
  /** Logger used for per-call debug lines. Default: the `rpc` scope of the SDK logger. */
  log?: ILogger
}

/** Factory to create an HTTP JSON-RPC transport bound to a node URL. */
export function createHttpClient(url: string, opts?: HttpClientOptions): HttpClient {
  return new HttpClient(url, opts)
}

export class HttpClient implements RpcTransport {
  readonly url: string
  private readonly headers: Record<string, string>
  private readonly timeoutMs: number | undefined
  private readonly idFactory: () => number | string
  private readonly log: ILogger
  private seq = 1

  constructor(url: string, opts: HttpClientOptions = {}) {
    this.url = normalizeUrl(url)
    this.headers = {
      'user-agent': userAgent(),
      ...(opts.headers ?? {})
    }
    this.timeoutMs = opts.timeoutMs
    this.idFactory = opts.idFactory ?? (() => this.seq++)
    this.log = opts.log ?? logger('rpc')
  }

  /** Perform a single JSON-RPC request and return the raw `result` field. */
  async request(method: string, params?: JsonRpcParams, opts?: RequestOptions): Promise<unknown> {
    const id = this.idFactory()
    const payload = makeRequest(method, params, id)
    const done = this.log.time(`${method}#${id} ${this.url}`)

    try {
      const res = await postJson(this.url, payload, {
        headers: this.headers,
        signal: opts?.signal,
        timeoutMs: opts?.timeoutMs ?? this.timeoutMs
      })

      if (res.status !== 200) {
        throw new HttpError(res.status, res.statusText, res.text, { context: { url: this.url, method } })
      }

      const envelope = parseEnvelope(parseJson(res.text, method))
      if (!envelope) {
        throw new ParseError(`invalid JSON-RPC envelope from NEO node for ${method}`, { method })
      }
      if (isJsonRpcFailure(envelope)) {
        throw rpcErrorFromObject(method, failureOf(envelope), envelope.id ?? id)
      }
      return envelope.result
    } finally {
      done()
    }
  }

  /** Create a client for the same node with additional headers (e.g., new API key). */
  withHeaders(headers: Record<string, string>): HttpClient {
    return new HttpClient(this.url, {
      headers: { ...this.headers, ...headers },
      timeoutMs: this.timeoutMs,
      idFactory: this.idFactory,
      log: this.log
    })
  }
}

// ──────────────────────────────────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────────────────────────────────

function parseJson(text: string, method: string): unknown {
  try {
    return JSON.parse(text)
  } catch (e) {
    const hint = text.length < 2048 ? `; body="${text}"` : ''
    throw new ParseError(`invalid JSON from NEO node for ${method}${hint}`, { method, cause: e })
  }
}

function normalizeUrl(u: string): string {
  // JSON-RPC posts to the exact URL; only stray whitespace is removed.
  return u.replace(/\s+/g, '')
}
