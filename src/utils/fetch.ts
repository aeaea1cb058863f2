/**
 * Single-attempt fetch helpers with AbortSignal support and an optional timeout.
 *
 * Exports:
 *  - AbortError
 *  - mergeSignals(signals)
 *  - postJson(url, body, opts)
 *
 * Each call makes exactly one attempt. The timeout and the caller's signal
 * cover the whole exchange, body included.
 */

import { TransportError, ensureError } from '../errors'

export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortError'
  }
}

export interface MergedSignal {
  signal: AbortSignal | undefined
  /** Detach from the input signals. Call once the guarded work is over. */
  dispose: () => void
}

const noop = () => {}

/** Utility: merge multiple AbortSignals into one. If any aborts, the merged aborts. */
export function mergeSignals(signals: Array<AbortSignal | undefined | null>): MergedSignal {
  const list = signals.filter((s): s is AbortSignal => !!s)
  if (list.length === 0) return { signal: undefined, dispose: noop }
  if (list.length === 1) return { signal: list[0], dispose: noop }
  const ctl = new AbortController()
  if (list.some((s) => s.aborted)) {
    ctl.abort(new AbortError())
    return { signal: ctl.signal, dispose: noop }
  }
  const onAbort = () => ctl.abort(new AbortError())
  const dispose = () => {
    for (const s of list) s.removeEventListener('abort', onAbort)
  }
  for (const s of list) s.addEventListener('abort', onAbort, { once: true })
  ctl.signal.addEventListener('abort', dispose, { once: true })
  return { signal: ctl.signal, dispose }
}

export interface PostJsonOptions {
  headers?: Record<string, string>
  signal?: AbortSignal
  /** Abort the request after this many ms. Unset or 0 means no timeout. */
  timeoutMs?: number
}

/** Status line and full body text of a response. */
export interface PostJsonResult {
  status: number
  statusText: string
  text: string
}

/**
 * POST a JSON body once and read the whole response body. Resolves whatever
 * the status; rejects with TransportError when the exchange does not complete.
 */
export async function postJson(url: string, body: unknown, opts: PostJsonOptions = {}): Promise<PostJsonResult> {
  const timer = opts.timeoutMs && opts.timeoutMs > 0 ? new AbortController() : undefined
  const timeoutId = timer
    ? setTimeout(() => timer.abort(new AbortError(`Request timed out after ${opts.timeoutMs} ms`)), opts.timeoutMs)
    : undefined
  const merged = mergeSignals([opts.signal, timer?.signal])

  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        accept: 'application/json',
        ...(opts.headers ?? {})
      },
      body: JSON.stringify(body),
      signal: merged.signal
    })
    const text = await res.text()
    return { status: res.status, statusText: res.statusText, text }
  } catch (e) {
    const err = ensureError(e)
    const reason = timer?.signal.aborted ? ensureError(timer.signal.reason) : err
    throw new TransportError(`request to ${url} failed: ${reason.message}`, { cause: err, context: { url } })
  } finally {
    if (timeoutId !== undefined) clearTimeout(timeoutId)
    merged.dispose()
  }
}
