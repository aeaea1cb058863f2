import { getEventListeners } from 'node:events'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { createHttpClient } from '../src/rpc/http'
import { HttpError, ParseError, RpcError, TransportError } from '../src/errors'
import { version } from '../src/version'
import { startMockNode, unusedUrl, type MockNode } from './mock_node'

let node: MockNode

beforeEach(async () => {
  node = await startMockNode({
    getblockcount: () => ({ result: 1024 }),
    getblockhash: (params) => ({ result: `hash-of-${String(params[0])}` }),
    broken: () => ({ status: 500, raw: 'upstream exploded' }),
    garbage: () => ({ raw: '<html>not json</html>' }),
    scalar: () => ({ raw: '42' }),
    emptyerror: () => ({ raw: JSON.stringify({ jsonrpc: '2.0', id: 1, result: 'ok', error: { code: 0, message: '' } }) }),
    slow: () => ({ result: 'late', delayMs: 500 }),
    stalled: () => ({ stall: '{"jsonrpc":"2.0",' })
  })
})

afterEach(async () => {
  await node.close()
})

describe('HTTP JSON-RPC transport', () => {
  test('sends a JSON-RPC 2.0 envelope with empty params when none are given', async () => {
    const rpc = createHttpClient(node.url)
    await expect(rpc.request('getblockcount')).resolves.toBe(1024)

    expect(node.requests).toHaveLength(1)
    expect(node.requests[0].body).toEqual({ jsonrpc: '2.0', method: 'getblockcount', params: [], id: 1 })
    expect(node.requests[0].headers['content-type']).toBe('application/json')
    expect(node.requests[0].headers['user-agent']).toBe(`neo-rpc-sdk/${version} (node)`)
  })

  test('passes positional params and increments the id', async () => {
    const rpc = createHttpClient(node.url)
    await rpc.request('getblockcount')
    await expect(rpc.request('getblockhash', [7])).resolves.toBe('hash-of-7')

    expect(node.requests[1].body).toEqual({ jsonrpc: '2.0', method: 'getblockhash', params: [7], id: 2 })
  })

  test('merges extra headers', async () => {
    const rpc = createHttpClient(node.url, { headers: { 'x-api-key': 'test-secret' } }).withHeaders({ 'x-trace': 'abc' })
    await rpc.request('getblockcount')

    expect(node.requests[0].headers['x-api-key']).toBe('test-secret')
    expect(node.requests[0].headers['x-trace']).toBe('abc')
  })

  test('non-200 status raises HttpError with the status in the message', async () => {
    const rpc = createHttpClient(node.url)
    const err = await rpc.request('broken').catch((e: unknown) => e)

    expect(err).toBeInstanceOf(HttpError)
    if (!(err instanceof HttpError)) return
    expect(err.message).toBe("non-200 status code returned from NEO node, got: '500'")
    expect(err.status).toBe(500)
    expect(err.bodyText).toBe('upstream exploded')
  })

  test('error envelope raises RpcError carrying code and message', async () => {
    const rpc = createHttpClient(node.url)
    const err = await rpc.request('nosuchmethod').catch((e: unknown) => e)

    expect(err).toBeInstanceOf(RpcError)
    if (!(err instanceof RpcError)) return
    expect(err.message).toBe('error code: -32601, error message: Method not found')
    expect(err.code).toBe(-32601)
    expect(err.method).toBe('nosuchmethod')
    expect(err.requestId).toBe(1)
  })

  test('an error object with an empty message does not count as failure', async () => {
    const rpc = createHttpClient(node.url)
    await expect(rpc.request('emptyerror')).resolves.toBe('ok')
  })

  test('a body that is not JSON raises ParseError', async () => {
    const rpc = createHttpClient(node.url)
    const err = await rpc.request('garbage').catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ParseError)
    if (!(err instanceof ParseError)) return
    expect(err.message).toBe('invalid JSON from NEO node for garbage; body="<html>not json</html>"')
  })

  test('JSON that is not an envelope object raises ParseError', async () => {
    const rpc = createHttpClient(node.url)
    await expect(rpc.request('scalar')).rejects.toThrow('invalid JSON-RPC envelope from NEO node for scalar')
  })

  test('refused connection raises TransportError', async () => {
    const rpc = createHttpClient(await unusedUrl())
    await expect(rpc.request('getblockcount')).rejects.toBeInstanceOf(TransportError)
  })

  test('per-request timeout aborts the call', async () => {
    const rpc = createHttpClient(node.url)
    const err = await rpc.request('slow', [], { timeoutMs: 50 }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TransportError)
    if (!(err instanceof TransportError)) return
    expect(err.message).toBe(`request to ${node.url} failed: Request timed out after 50 ms`)
  })

  test('the timeout also covers a body that stops mid-way', async () => {
    const rpc = createHttpClient(node.url)
    const err = await rpc.request('stalled', [], { timeoutMs: 200 }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TransportError)
    if (!(err instanceof TransportError)) return
    expect(err.message).toBe(`request to ${node.url} failed: Request timed out after 200 ms`)
  })

  test('the client-wide timeout applies to the body as well', async () => {
    const rpc = createHttpClient(node.url, { timeoutMs: 200 })
    await expect(rpc.request('stalled')).rejects.toThrow(`request to ${node.url} failed: Request timed out after 200 ms`)
  })

  test('aborting while the body is read raises TransportError', async () => {
    const rpc = createHttpClient(node.url)
    const ctl = new AbortController()
    setTimeout(() => ctl.abort(), 100)

    await expect(rpc.request('stalled', [], { signal: ctl.signal })).rejects.toBeInstanceOf(TransportError)
  })

  test('a shared signal keeps no listeners once calls have finished', async () => {
    const rpc = createHttpClient(node.url)
    const ctl = new AbortController()

    for (let i = 0; i < 3; i++) {
      await rpc.request('getblockcount', [], { signal: ctl.signal, timeoutMs: 1_000 })
    }

    expect(getEventListeners(ctl.signal, 'abort')).toHaveLength(0)
  })

  test('an already aborted signal prevents the call', async () => {
    const rpc = createHttpClient(node.url)
    const ctl = new AbortController()
    ctl.abort()

    await expect(rpc.request('getblockcount', [], { signal: ctl.signal })).rejects.toBeInstanceOf(TransportError)
  })
})
