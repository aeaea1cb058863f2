import http from 'node:http'

/** What a handler may answer: a result, an error envelope, or a raw HTTP reply. */
export interface MockReply {
  result?: unknown
  error?: { code: number; message: string; data?: unknown }
  status?: number
  raw?: string
  delayMs?: number
  /** Send 200 headers and this partial body, then never finish the response. */
  stall?: string
}

export type MockHandler = (params: unknown[]) => MockReply

export interface RecordedRequest {
  body: Record<string, unknown>
  headers: http.IncomingHttpHeaders
}

export interface MockNode {
  url: string
  requests: RecordedRequest[]
  close(): Promise<void>
}

function portOf(server: http.Server): number {
  const addr = server.address()
  if (!addr || typeof addr === 'string') throw new Error('no addr')
  return addr.port
}

function asRecord(x: unknown): Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x) ? Object.fromEntries(Object.entries(x)) : {}
}

/**
 * Lightweight JSON-RPC 2.0 node stand-in. Unknown methods answer with
 * -32601 "Method not found", like a real node.
 */
export async function startMockNode(handlers: Record<string, MockHandler>): Promise<MockNode> {
  const requests: RecordedRequest[] = []

  const server = http.createServer(async (req, res) => {
    const chunks: Buffer[] = []
    for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c))

    let body: Record<string, unknown>
    try {
      body = asRecord(JSON.parse(Buffer.concat(chunks).toString('utf8')))
    } catch {
      res.writeHead(400).end()
      return
    }
    requests.push({ body, headers: req.headers })

    const method = typeof body.method === 'string' ? body.method : ''
    const params = Array.isArray(body.params) ? body.params : []
    const handler = handlers[method]
    const reply: MockReply = handler ? handler(params) : { error: { code: -32601, message: 'Method not found' } }

    if (reply.delayMs) await new Promise((r) => setTimeout(r, reply.delayMs))
    if (res.destroyed) return
    if (reply.stall !== undefined) {
      res.writeHead(200, { 'content-type': 'application/json' })
      res.write(reply.stall)
      return
    }

    const payload =
      reply.raw ??
      JSON.stringify(
        reply.error
          ? { jsonrpc: '2.0', id: body.id, error: reply.error }
          : { jsonrpc: '2.0', id: body.id, result: reply.result }
      )
    res.writeHead(reply.status ?? 200, { 'content-type': 'application/json' }).end(payload)
  })

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const port = portOf(server)

  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections()
        server.close((err) => (err ? reject(err) : resolve()))
      })
  }
}

/** A URL on which nothing listens: bind a port, then release it. */
export async function unusedUrl(): Promise<string> {
  const server = http.createServer()
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve))
  const port = portOf(server)
  await new Promise<void>((resolve) => server.close(() => resolve()))
  return `http://127.0.0.1:${port}`
}
