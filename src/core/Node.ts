import { EventEmitter } from 'events';
import { Block } from './Block';
import { Transaction } from './Transaction';
import { Blockchain } from './blockchain/Blockchain';
import { ChainValidationReport } from './blockchain/validation';
import { TransactionPool } from './transaction/TransactionPool';
import { ProofOfWorkMiner, ProofSearch } from './mining/ProofOfWork';
import { LedgerStorage } from './storage/LedgerStorage';
import { LevelStorage, storagePathFor } from './storage/LevelStorage';
import { PersistenceFailureError } from './errors';
import { TransactionInput } from './types/ledger.types';
import { PeerRegistry } from '../network/PeerRegistry';
import { HttpPeerClient, PeerGateway } from '../network/PeerClient';
import { ConsensusResolver, ResolutionResult } from '../consensus/ConsensusResolver';
import { MempoolSynchronizer, MempoolSyncResult } from '../consensus/MempoolSynchronizer';
import { SyncErrorEvent, SyncCycleResult, SyncScheduler } from '../consensus/SyncScheduler';
import { NodeConfig } from '../config';
import { Mutex } from '../utils/Mutex';
import { Logger } from '../utils/logger';

export interface NodeDependencies {
  storage?: LedgerStorage;
  gateway?: PeerGateway;
  miner?: ProofSearch;
  logger?: Logger;
}

export type TransactionLookup =
  | { status: 'confirmed'; transaction: Transaction; blockIndex: number; blockHash: string }
  | { status: 'pending'; transaction: Transaction };

export interface NodeStatus {
  port: number;
  difficulty: number;
  chainLength: number;
  headHash: string;
  pendingTransactions: number;
  peers: number;
  syncRunning: boolean;
}

/**
 * Owner of the node's shared state: chain, mempool and peer set.
 *
 * The request layer and the background scheduler both go through this object.
 * Every read-modify-write of the chain or mempool runs under one coarse lock;
 * proof search and peer I/O never hold it.
 */
export class LedgerNode extends EventEmitter {
  private config: NodeConfig;
  private storage: LedgerStorage;
  private blockchain: Blockchain;
  private pool: TransactionPool;
  private peers: PeerRegistry;
  private miner: ProofSearch;
  private mutex: Mutex;
  private resolver: ConsensusResolver;
  private synchronizer: MempoolSynchronizer;
  private scheduler: SyncScheduler;
  private logger: Logger;
  private isRunning: boolean = false;

  constructor(config: NodeConfig, dependencies: NodeDependencies = {}) {
    super();
    this.config = config;
    this.logger = dependencies.logger ?? new Logger({ verbose: config.verbose });
    this.storage = dependencies.storage ?? new LevelStorage(storagePathFor(config.dataDir, config.port));
    this.miner = dependencies.miner ?? new ProofOfWorkMiner(config.difficulty);
    this.mutex = new Mutex();
    this.peers = new PeerRegistry();
    this.blockchain = new Blockchain(this.storage, this.miner.difficulty, this.logger.child('chain'));
    this.pool = new TransactionPool(this.storage, this.logger.child('mempool'));

    const gateway = dependencies.gateway ?? new HttpPeerClient(config.peerTimeoutMs);
    const context = {
      blockchain: this.blockchain,
      pool: this.pool,
      peers: this.peers,
      gateway,
      mutex: this.mutex,
      logger: this.logger.child('sync')
    };
    this.resolver = new ConsensusResolver(context);
    this.synchronizer = new MempoolSynchronizer(context);
    this.scheduler = new SyncScheduler(
      {
        resolve: () => this.resolver.resolve(),
        sync: () => this.synchronizer.sync()
      },
      config.syncIntervalMs
    );

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.resolver.on('chain:replaced', (event: { source: string; length: number; committed: number }) => {
      this.emit('chain:replaced', event);
    });

    this.scheduler.on('sync:error', (event: SyncErrorEvent) => {
      this.emit('sync:error', event);
    });

    this.scheduler.on('sync:cycle', (result: SyncCycleResult) => {
      this.emit('sync:cycle', result);
    });

    this.scheduler.on('scheduler:started', (intervalMs: number) => {
      this.emit('sync:started', intervalMs);
    });

    this.scheduler.on('scheduler:stopped', () => {
      this.emit('sync:stopped');
    });
  }

  public async initialize(): Promise<void> {
    await this.storage.open();
    await this.mutex.lock(async () => {
      await this.blockchain.loadFromDurable();
      await this.pool.loadFromDurable();
    });

    for (const peer of this.config.bootstrapPeers) {
      this.peers.register(peer);
    }

    this.isRunning = true;
    this.emit('node:initialized', this.getStatus());
  }

  public startSync(): void {
    this.scheduler.start();
  }

  public async submitTransaction(input: TransactionInput): Promise<Transaction> {
    const transaction = Transaction.create({
      nama: input.nama,
      nomorSertifikat: input.nomor_sertifikat,
      lokasi: input.lokasi,
      luas: input.luas,
      fileHash: input.file_hash
    });

    const pooled = await this.mutex.lock(() => this.pool.add(transaction));
    this.emit('transaction:submitted', pooled);
    return pooled;
  }

  /**
   * Mine the current mempool into a new block.
   * @returns The appended block, or null when there is nothing to mine
   * @throws ChainLinkageError when the head moved while the proof was searched
   */
  public async mine(): Promise<Block | null> {
    const { head, transactions } = await this.mutex.lock(() => {
      // Stale pool entries already on chain are never mined twice.
      const committed = this.blockchain.committedTxids();
      return {
        head: this.blockchain.head(),
        transactions: this.pool.snapshot().filter(tx => !committed.has(tx.txid))
      };
    });

    if (transactions.length === 0) {
      return null;
    }

    const proof = await this.miner.search(head.proof);

    return this.mutex.lock(async () => {
      const block = new Block(head.index + 1, Date.now(), transactions, proof, head.hash);
      try {
        await this.blockchain.append(block);
      } catch (error) {
        // Append keeps the block in memory when only the write failed.
        if (error instanceof PersistenceFailureError && this.blockchain.head() === block) {
          await this.pool.commit(this.blockchain.committedTxids());
        }
        throw error;
      }

      await this.pool.commit(this.blockchain.committedTxids());
      this.emit('block:mined', block);
      return block;
    });
  }

  /**
   * Register peers in order. Stops at the first malformed address.
   * @returns Canonical addresses of every registered peer
   */
  public registerPeers(addresses: string[]): string[] {
    for (const address of addresses) {
      this.peers.register(address);
    }
    this.emit('peers:registered', this.peers.list());
    return this.peers.list();
  }

  public resolveConflicts(): Promise<ResolutionResult> {
    return this.resolver.resolve();
  }

  public syncMempool(): Promise<MempoolSyncResult> {
    return this.synchronizer.sync();
  }

  public runSyncCycle(): Promise<SyncCycleResult> {
    return this.scheduler.runCycle();
  }

  public getChain(): Block[] {
    return this.blockchain.getChain();
  }

  public getLatestBlock(): Block {
    return this.blockchain.head();
  }

  public getMempool(): Transaction[] {
    return this.pool.snapshot();
  }

  public getPeers(): string[] {
    return this.peers.list();
  }

  public validateChain(): ChainValidationReport {
    return this.blockchain.validate();
  }

  public findTransaction(txid: string): TransactionLookup | null {
    const confirmed = this.blockchain.findTransaction(txid);
    if (confirmed) {
      return {
        status: 'confirmed',
        transaction: confirmed.transaction,
        blockIndex: confirmed.block.index,
        blockHash: confirmed.block.hash
      };
    }

    const pending = this.pool.get(txid);
    return pending ? { status: 'pending', transaction: pending } : null;
  }

  public getStatus(): NodeStatus {
    return {
      port: this.config.port,
      difficulty: this.blockchain.getDifficulty(),
      chainLength: this.blockchain.getLength(),
      headHash: this.blockchain.head().hash,
      pendingTransactions: this.pool.size(),
      peers: this.peers.size(),
      syncRunning: this.scheduler.isRunning()
    };
  }

  public async shutdown(): Promise<void> {
    await this.scheduler.stop();
    if (this.isRunning) {
      this.isRunning = false;
      await this.storage.close();
    }
    this.emit('node:shutdown');
  }

  public isNodeRunning(): boolean {
    return this.isRunning;
  }
}
