/**
 * JSON-RPC 2.0 envelope types, request construction and response classification.
 */

import { z } from 'zod'

export type JsonRpcId = string | number | null

export type JsonRpcParams = ReadonlyArray<unknown>

export interface JsonRpcRequest {
  jsonrpc: '2.0'
  method: string
  params: JsonRpcParams
  id: JsonRpcId
}

export interface JsonRpcErrorObject {
  code: number
  message: string
  data?: unknown
}

export interface JsonRpcSuccess {
  jsonrpc?: string
  id?: JsonRpcId
  result: unknown
}

export interface JsonRpcFailure {
  jsonrpc?: string
  id?: JsonRpcId
  error: JsonRpcErrorObject
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure

/** Options common to transports */
export interface RequestOptions {
  /** Abort the in-flight request */
  signal?: AbortSignal
  /** Per-request timeout (ms). Unset means the transport default. */
  timeoutMs?: number
}

/**
 * Minimal transport interface. The client only needs one call shape, so tests
 * and alternative transports can stand in for HTTP.
 */
export interface RpcTransport {
  readonly url: string
  request(method: string, params?: JsonRpcParams, opts?: RequestOptions): Promise<unknown>
}

// Nodes are loose about envelope fields: `id` may be echoed as a string and
// some builds send `error: null` on success, so only the object shape is enforced.
const envelopeSchema = z
  .object({
    jsonrpc: z.string().optional(),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
    result: z.unknown().optional(),
    error: z
      .object({
        code: z.number().optional(),
        message: z.string().optional(),
        data: z.unknown().optional()
      })
      .passthrough()
      .nullable()
      .optional()
  })
  .passthrough()

export type RawEnvelope = z.infer<typeof envelopeSchema>

/** Build a request envelope. Absent params are sent as an empty list. */
export function makeRequest(method: string, params: JsonRpcParams | undefined, id: JsonRpcId): JsonRpcRequest {
  return {
    jsonrpc: '2.0',
    method,
    params: params ?? [],
    id
  }
}

/** Validate that a decoded body is an envelope object; null when it is not. */
export function parseEnvelope(json: unknown): RawEnvelope | null {
  const parsed = envelopeSchema.safeParse(json)
  return parsed.success ? parsed.data : null
}

/** An envelope only counts as a failure when its error carries a message. */
export function isJsonRpcFailure(x: RawEnvelope): x is RawEnvelope & { error: { message: string } } {
  return !!x.error && typeof x.error.message === 'string' && x.error.message !== ''
}

/** Extract the error object of a failure envelope, defaulting a missing code to 0. */
export function failureOf(x: RawEnvelope & { error: { message: string } }): JsonRpcErrorObject {
  return {
    code: x.error.code ?? 0,
    message: x.error.message,
    ...(x.error.data !== undefined ? { data: x.error.data } : {})
  }
}

