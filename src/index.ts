/**
 * @packageDocumentation
 * Public entry for neo-rpc-sdk: the NeoClient plus the pieces it is built from.
 */

export { version, userAgent } from './version'
export * from './errors'
export * from './client'
export * from './config'

// RPC
export * from './rpc/index'

// Result shapes
export * from './types/core'

// Node helpers
export * from './node/ping'
export * from './node/select'

// Shared utilities
export { utf8ToHex, utf8ToBytes, bytesToHex } from './utils/bytes'
export { logger, getLogger, setGlobalLogLevel, getGlobalLogLevel, setLogHandler } from './utils/logger'
export type { ILogger, LogHandler, LogLevelName, LogMeta } from './utils/logger'
export { AbortError, mergeSignals, postJson } from './utils/fetch'
export type { MergedSignal, PostJsonOptions, PostJsonResult } from './utils/fetch'
