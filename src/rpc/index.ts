/**
 * @module rpc
 * Public entry for the JSON-RPC layer used by the NEO client.
 *
 * - Typed JSON-RPC request/response shapes
 * - A minimal transport interface
 * - The concrete HTTP transport
 *
 * Usage:
 *   import { createHttpClient } from 'neo-rpc-sdk/rpc'
 *   const rpc = createHttpClient('http://127.0.0.1:10332')
 *   const height = await rpc.request('getblockcount')
 */

export * from './envelope'
export * from './http'
