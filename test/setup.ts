/* Test setup for neo-rpc-sdk (Vitest)
 * - Makes sure fetch/Headers/Response exist (undici) on runtimes without them
 * - Keeps the SDK logger quiet unless NEO_LOG_LEVEL asks otherwise
 */

import {
  fetch as undiciFetch,
  Headers as UndiciHeaders,
  Request as UndiciRequest,
  Response as UndiciResponse
} from 'undici'
import { setGlobalLogLevel } from '../src/utils/logger'

if (typeof globalThis.fetch !== 'function') {
  Object.assign(globalThis, {
    fetch: undiciFetch,
    Headers: UndiciHeaders,
    Request: UndiciRequest,
    Response: UndiciResponse
  })
}

if (!process.env.NEO_LOG_LEVEL) setGlobalLogLevel('silent')

export {}
