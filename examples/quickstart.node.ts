/**
 * @file quickstart.node.ts
 * Minimal Node demo using the SDK.
 *
 * What it does:
 *  1) Builds a client from NEO_* env vars (picks the best node when several are listed).
 *  2) Prints the chain height, the tip block and the mempool size.
 *  3) (Optional) Validates ADDRESS if set.
 *
 * Env:
 *   NEO_RPC_URL / NEO_RPC_NODES  (default: http://127.0.0.1:10332)
 *   ADDRESS                      (optional: a NEO address to validate)
 */

import { NeoClient, formatError, logger } from '../src/index'

const log = logger('quickstart')

async function main(): Promise<void> {
  const neo = await NeoClient.fromEnv()
  log.info(`using node ${neo.node}`)

  if (!(await neo.ping())) {
    log.warn(`${neo.node} does not accept TCP connections`)
    return
  }

  const height = await neo.getBlockCount()
  const tip = await neo.getBlockByIndex(height - 1)
  const mempool = await neo.getUnconfirmedTransactions()
  log.info(`height=${height} tip=${tip.hash} txs=${tip.tx.length} mempool=${mempool.length}`)

  const address = process.env.ADDRESS
  if (address) {
    log.info(`${address} valid: ${await neo.validateAddress(address)}`)
  }
}

main().catch((e: unknown) => {
  log.error(formatError(e))
  process.exitCode = 1
})
