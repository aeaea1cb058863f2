/**
 * NeoClient — typed wrappers over a NEO node's JSON-RPC methods.
 *
 * Usage:
 *   const neo = new NeoClient('http://127.0.0.1:10332')
 *   const height = await neo.getBlockCount()
 *   const block = await neo.getBlockByIndex(height - 1)
 *
 *   // or pick the most advanced of several nodes first
 *   const best = await NeoClient.fromNodes([urlA, urlB, urlC])
 *
 * Every call is one POST to `node`. Results are checked against the schemas in
 * ./types/core and a mismatch raises ParseError.
 */

import type { z } from 'zod'
import { loadConfig, type EnvLike } from './config'
import { ConfigError, ParseError } from './errors'
import { ping, type PingOptions } from './node/ping'
import { selectBestNode, type NodeSelection } from './node/select'
import { HttpClient, type HttpClientOptions } from './rpc/http'
import type { JsonRpcParams, RequestOptions, RpcTransport } from './rpc/envelope'
import {
  AccountState,
  AddressValidation,
  Balance,
  Block,
  IntegerResult,
  Peers,
  SentTransaction,
  StringArrayResult,
  StringResult,
  Transaction,
  Version,
  Vout
} from './types/core'
import { utf8ToHex } from './utils/bytes'
import { logger, setGlobalLogLevel, type ILogger } from './utils/logger'

/** Verbose flag for getblock / getrawtransaction: 1 asks for JSON instead of raw hex. */
const VERBOSE = 1

export interface NeoClientOptions extends HttpClientOptions {
  /** Build the transport for a node URL. Default: HttpClient with these options. */
  transport?: (url: string) => RpcTransport
}

export class NeoClient {
  private nodeUrl: string
  private readonly nodeUrls: readonly string[]
  private readonly opts: NeoClientOptions
  private readonly log: ILogger
  private rpc: RpcTransport

  constructor(nodeUrl: string | readonly string[], opts: NeoClientOptions = {}) {
    const urls = typeof nodeUrl === 'string' ? [nodeUrl] : [...nodeUrl]
    if (urls.length === 0) {
      throw new ConfigError("Length of 'nodeURIs' argument must be greater than 0")
    }
    this.nodeUrls = urls
    this.nodeUrl = urls[0]
    this.opts = opts
    this.log = opts.log ?? logger('client')
    this.rpc = this.transportFor(this.nodeUrl)
  }

  /**
   * Create a client over several nodes and switch to the one reporting the
   * highest block count. Rejects when none of them answers.
   */
  static async fromNodes(nodeUrls: readonly string[], opts: NeoClientOptions = {}): Promise<NeoClient> {
    const client = new NeoClient(nodeUrls, opts)
    await client.selectBestNode()
    return client
  }

  /** Create a client from NEO_* environment variables (see ./config). */
  static async fromEnv(env?: EnvLike, opts: NeoClientOptions = {}): Promise<NeoClient> {
    const cfg = loadConfig(env)
    setGlobalLogLevel(cfg.logLevel)
    const merged: NeoClientOptions = { ...opts, timeoutMs: opts.timeoutMs ?? cfg.timeoutMs }
    return cfg.nodes.length === 1 ? new NeoClient(cfg.nodes[0], merged) : NeoClient.fromNodes(cfg.nodes, merged)
  }

  /** URL of the node calls currently go to. */
  get node(): string {
    return this.nodeUrl
  }

  /** All candidate node URLs this client was created with. */
  get nodes(): readonly string[] {
    return this.nodeUrls
  }

  // ────────────────────────────────────────────────────────────────────────────
  // Blockchain queries
  // ────────────────────────────────────────────────────────────────────────────

  /** Hash of the best (tip) block in the chain. */
  getBestBlockHash(opts?: RequestOptions): Promise<string> {
    return this.call('getbestblockhash', [], StringResult, opts)
  }

  getBlockByHash(hash: string, opts?: RequestOptions): Promise<Block> {
    return this.call('getblock', [hash, VERBOSE], Block, opts)
  }

  getBlockByIndex(index: number, opts?: RequestOptions): Promise<Block> {
    return this.call('getblock', [index, VERBOSE], Block, opts)
  }

  /** Number of blocks in the chain (tip index + 1). */
  getBlockCount(opts?: RequestOptions): Promise<number> {
    return this.call('getblockcount', [], IntegerResult, opts)
  }

  getBlockHash(index: number, opts?: RequestOptions): Promise<string> {
    return this.call('getblockhash', [index], StringResult, opts)
  }

  /** Current number of peer connections of the node. */
  getConnectionCount(opts?: RequestOptions): Promise<number> {
    return this.call('getconnectioncount', [], IntegerResult, opts)
  }

  /**
   * Read a contract storage slot. The key is given as text and sent as the hex
   * of its UTF-8 bytes; the value comes back as the node's hex string.
   */
  getStorage(scriptHash: string, storageKey: string, opts?: RequestOptions): Promise<string> {
    return this.call('getstorage', [scriptHash, utf8ToHex(storageKey)], StringResult, opts)
  }

  getTransaction(hash: string, opts?: RequestOptions): Promise<Transaction> {
    return this.call('getrawtransaction', [hash, VERBOSE], Transaction, opts)
  }

  /** Output `index` of transaction `hash`. */
  getTransactionOutput(hash: string, index: number, opts?: RequestOptions): Promise<Vout> {
    return this.call('gettxout', [hash, index], Vout, opts)
  }

  /** Hashes of the transactions sitting in the node's memory pool. */
  getUnconfirmedTransactions(opts?: RequestOptions): Promise<string[]> {
    return this.call('getrawmempool', [], StringArrayResult, opts)
  }

  getVersion(opts?: RequestOptions): Promise<Version> {
    return this.call('getversion', [], Version, opts)
  }

  getPeers(opts?: RequestOptions): Promise<Peers> {
    return this.call('getpeers', [], Peers, opts)
  }

  getAccountState(address: string, opts?: RequestOptions): Promise<AccountState> {
    return this.call('getaccountstate', [address], AccountState, opts)
  }

  /**
   * Ask the node whether `address` is a valid public NEO address. True only
   * when the node echoes the same address and flags it valid; any other
   * answer shape, a missing or scalar result included, is false.
   */
  async validateAddress(address: string, opts?: RequestOptions): Promise<boolean> {
    const res = await this.call('validateaddress', [address], AddressValidation, opts)
    if (!res) return false
    return typeof res.address === 'string' && res.address === address && res.isvalid === true
  }

  // ────────────────────────────────────────────────────────────────────────────
  // Wallet (the node must have a wallet open)
  // ────────────────────────────────────────────────────────────────────────────

  getBalance(assetId: string, opts?: RequestOptions): Promise<Balance> {
    return this.call('getbalance', [assetId], Balance, opts)
  }

  getNewAddress(opts?: RequestOptions): Promise<string> {
    return this.call('getnewaddress', [], StringResult, opts)
  }

  /** Transfer `amount` of `assetId` to `toAddress`; resolves with the transaction id. */
  async sendToAddress(
    assetId: string,
    toAddress: string,
    amount: number | string,
    opts?: RequestOptions
  ): Promise<string> {
    const tx = await this.call('sendtoaddress', [assetId, toAddress, amount], SentTransaction, opts)
    return tx.txid
  }

  // ────────────────────────────────────────────────────────────────────────────
  // Node management
  // ────────────────────────────────────────────────────────────────────────────

  /**
   * Point the client at the candidate with the highest block count.
   * With a single candidate no request is made.
   */
  async selectBestNode(): Promise<NodeSelection> {
    const selection = await selectBestNode(
      this.nodeUrls,
      (url) => new NeoClient(url, this.opts).getBlockCount(),
      { log: this.log.child('select') }
    )
    if (selection.url !== this.nodeUrl) {
      this.nodeUrl = selection.url
      this.rpc = this.transportFor(selection.url)
    }
    return selection
  }

  /** TCP reachability of the current node. */
  ping(opts?: PingOptions): Promise<boolean> {
    return ping(this.nodeUrl, opts)
  }

  // ────────────────────────────────────────────────────────────────────────────
  // Internals
  // ────────────────────────────────────────────────────────────────────────────

  private transportFor(url: string): RpcTransport {
    return this.opts.transport ? this.opts.transport(url) : new HttpClient(url, this.opts)
  }

  private async call<S extends z.ZodTypeAny>(
    method: string,
    params: JsonRpcParams,
    schema: S,
    opts?: RequestOptions
  ): Promise<z.output<S>> {
    const result = await this.rpc.request(method, params, opts)
    const parsed = schema.safeParse(result)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'result'}: ${i.message}`)
      throw new ParseError(`unexpected result for ${method}: ${issues.join('; ')}`, {
        method,
        data: result,
        context: { node: this.nodeUrl }
      })
    }
    return parsed.data
  }
}
