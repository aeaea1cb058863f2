/**
 * Result shapes served by a NEO 2.x node over JSON-RPC.
 *
 * Each view is a zod schema plus its inferred type. Schemas are permissive:
 * unknown keys pass through, and fields that vary between node builds or
 * only appear on confirmed data are optional.
 *
 * Conventions:
 *  - Hashes are 0x-prefixed hex strings as returned by the node.
 *  - Asset amounts stay decimal strings ("10", "0.5"); they are never parsed into floats.
 *  - Times are UNIX seconds.
 */

import { z } from 'zod'

//// ────────────────────────────────────────────────────────────────────────────
// Primitives
////

export const StringResult = z.string()
export const IntegerResult = z.number().int().nonnegative()
export const StringArrayResult = z.array(z.string())

// Amounts come back as strings from most nodes and as numbers from a few.
const Amount = z.union([z.string(), z.number()]).transform((v) => String(v))

//// ────────────────────────────────────────────────────────────────────────────
// Transactions
////

export const Witness = z
  .object({
    invocation: z.string(),
    verification: z.string()
  })
  .passthrough()

export type Witness = z.infer<typeof Witness>

export const Vin = z
  .object({
    txid: z.string(),
    vout: z.number().int()
  })
  .passthrough()

export type Vin = z.infer<typeof Vin>

export const Vout = z
  .object({
    n: z.number().int(),
    asset: z.string(),
    value: Amount,
    address: z.string()
  })
  .passthrough()

export type Vout = z.infer<typeof Vout>

export const TxAttribute = z
  .object({
    usage: z.union([z.string(), z.number()]),
    data: z.string()
  })
  .passthrough()

export const Transaction = z
  .object({
    txid: z.string(),
    size: z.number().int().optional(),
    type: z.string().optional(),
    version: z.number().int().optional(),
    attributes: z.array(TxAttribute).default([]),
    vin: z.array(Vin).default([]),
    vout: z.array(Vout).default([]),
    sys_fee: Amount.optional(),
    net_fee: Amount.optional(),
    scripts: z.array(Witness).default([]),
    blockhash: z.string().optional(),
    confirmations: z.number().int().optional(),
    blocktime: z.number().int().optional()
  })
  .passthrough()

export type Transaction = z.infer<typeof Transaction>

//// ────────────────────────────────────────────────────────────────────────────
// Blocks
////

export const Block = z
  .object({
    hash: z.string(),
    size: z.number().int().optional(),
    version: z.number().int().optional(),
    previousblockhash: z.string().optional(),
    merkleroot: z.string().optional(),
    time: z.number().int(),
    index: z.number().int().nonnegative(),
    nonce: z.string().optional(),
    nextconsensus: z.string().optional(),
    script: Witness.optional(),
    tx: z.array(Transaction).default([]),
    confirmations: z.number().int().optional(),
    nextblockhash: z.string().optional()
  })
  .passthrough()

export type Block = z.infer<typeof Block>

//// ────────────────────────────────────────────────────────────────────────────
// Wallet & address
////

export const Balance = z
  .object({
    balance: Amount,
    confirmed: Amount
  })
  .passthrough()

export type Balance = z.infer<typeof Balance>

/**
 * Fields are left unchecked here; NeoClient.validateAddress inspects them.
 * A result that is absent or not an object reads as null.
 */
export const AddressValidation = z.record(z.unknown()).nullish().catch(null)

export type AddressValidation = z.infer<typeof AddressValidation>

/** `sendtoaddress` answers with the full transaction; only the id is needed. */
export const SentTransaction = z.object({ txid: z.string() }).passthrough()

//// ────────────────────────────────────────────────────────────────────────────
// Node & account state
////

export const Version = z
  .object({
    port: z.number().int().optional(),
    nonce: z.number().int().optional(),
    useragent: z.string()
  })
  .passthrough()

export type Version = z.infer<typeof Version>

export const Peer = z
  .object({
    address: z.string(),
    port: z.number().int()
  })
  .passthrough()

export type Peer = z.infer<typeof Peer>

export const Peers = z
  .object({
    unconnected: z.array(Peer).default([]),
    bad: z.array(Peer).default([]),
    connected: z.array(Peer).default([])
  })
  .passthrough()

export type Peers = z.infer<typeof Peers>

export const AccountBalance = z
  .object({
    asset: z.string(),
    value: Amount
  })
  .passthrough()

export const AccountState = z
  .object({
    version: z.number().int().optional(),
    script_hash: z.string(),
    frozen: z.boolean().default(false),
    votes: z.array(z.string()).default([]),
    balances: z.array(AccountBalance).default([])
  })
  .passthrough()

export type AccountState = z.infer<typeof AccountState>
