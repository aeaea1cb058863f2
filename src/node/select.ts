/**
 * Best-node selection: ask every candidate for its block count, one after the
 * other, and keep the one furthest ahead.
 */

import { NodeSelectionError, formatError, type NodeReport } from '../errors'
import { logger, type ILogger } from '../utils/logger'

export type BlockCountProbe = (url: string) => Promise<number>

export interface SelectNodeOptions {
  log?: ILogger
}

export interface NodeSelection {
  url: string
  /** Block count reported by the chosen node; undefined when there was a single candidate. */
  blockCount?: number
  reports: NodeReport[]
}

/**
 * A single candidate is returned without being queried. Otherwise a node wins
 * only with a count strictly above every earlier one, starting from 0, so ties
 * go to the earlier URL and nodes reporting 0 blocks are never chosen.
 */
export async function selectBestNode(
  urls: readonly string[],
  probe: BlockCountProbe,
  opts: SelectNodeOptions = {}
): Promise<NodeSelection> {
  const log = opts.log ?? logger('select')

  if (urls.length === 1) {
    return { url: urls[0], reports: [] }
  }

  const reports: NodeReport[] = []
  let best: { url: string; blockCount: number } | undefined
  let highest = 0

  for (const url of urls) {
    let blockCount: number
    try {
      blockCount = await probe(url)
    } catch (e) {
      const error = formatError(e)
      log.debug(`skipping ${url}: ${error}`)
      reports.push({ url, error })
      continue
    }

    reports.push({ url, blockCount })
    log.debug(`${url} reports ${blockCount} blocks`)
    if (blockCount > highest) {
      highest = blockCount
      best = { url, blockCount }
    }
  }

  if (!best) {
    throw new NodeSelectionError('Unable to communicate with any nodes', reports)
  }

  log.info(`selected ${best.url} at block count ${best.blockCount}`)
  return { url: best.url, blockCount: best.blockCount, reports }
}
