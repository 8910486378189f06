import { Transaction } from '../Transaction';
import { LedgerStorage } from '../storage/LedgerStorage';
import { TransactionRecord } from '../types/ledger.types';
import { ValidationFailureError } from '../errors';
import { Logger } from '../../utils/logger';

/**
 * Pool of transactions waiting to be mined.
 *
 * Entries are keyed by txid and kept in insertion order so block assembly is
 * deterministic. A transaction leaves the pool only through `commit`, after
 * the block holding it has been appended.
 */
export class TransactionPool {
  private pendingTransactions: Map<string, Transaction> = new Map();
  private storage: LedgerStorage;
  private logger: Logger;

  constructor(storage: LedgerStorage, logger: Logger = new Logger({ scope: 'mempool' })) {
    this.storage = storage;
    this.logger = logger;
  }

  /**
   * Add a transaction to the pool and persist the pool
   * @param transaction - Transaction to add
   * @returns The pooled transaction; an earlier one wins when the txid is already present
   */
  public async add(transaction: Transaction): Promise<Transaction> {
    const existing = this.pendingTransactions.get(transaction.txid);
    if (existing) {
      return existing;
    }

    this.pendingTransactions.set(transaction.txid, transaction);
    await this.persist();
    return transaction;
  }

  /**
   * Transactions for block assembly, in insertion order. Nothing is removed.
   */
  public snapshot(): Transaction[] {
    return Array.from(this.pendingTransactions.values());
  }

  /**
   * Remove transactions that made it into an appended block
   * @param includedTxids - Ids of the committed transactions
   * @returns Number of transactions removed
   */
  public async commit(includedTxids: Iterable<string>): Promise<number> {
    const removed: string[] = [];
    for (const txid of includedTxids) {
      if (this.pendingTransactions.delete(txid)) {
        removed.push(txid);
      }
    }

    if (removed.length > 0) {
      await this.persist();
    }
    return removed.length;
  }

  /**
   * Union a peer's pool into this one. Local entries win on txid collisions.
   * @param remoteTransactions - Transactions reported by a peer
   * @param exclude - Txids that must not be pooled again, e.g. already on chain
   * @returns Number of transactions added
   */
  public async merge(remoteTransactions: Iterable<Transaction>, exclude: ReadonlySet<string> = new Set()): Promise<number> {
    const added: Transaction[] = [];
    for (const transaction of remoteTransactions) {
      if (this.pendingTransactions.has(transaction.txid) || exclude.has(transaction.txid)) {
        continue;
      }
      this.pendingTransactions.set(transaction.txid, transaction);
      added.push(transaction);
    }

    if (added.length > 0) {
      await this.persist();
    }
    return added.length;
  }

  public async loadFromDurable(): Promise<void> {
    let records: TransactionRecord[] | null;
    try {
      records = await this.storage.loadMempool();
    } catch (error) {
      if (!(error instanceof ValidationFailureError)) {
        throw error;
      }
      this.logger.warn(`Stored mempool is unreadable, starting empty: ${error.message}`);
      records = null;
    }

    this.pendingTransactions.clear();
    for (const record of records ?? []) {
      const transaction = Transaction.fromJSON(record);
      this.pendingTransactions.set(transaction.txid, transaction);
    }
  }

  public async persist(): Promise<void> {
    await this.storage.saveMempool(this.snapshot().map(tx => tx.toJSON()));
  }

  public get(txid: string): Transaction | null {
    return this.pendingTransactions.get(txid) ?? null;
  }

  public has(txid: string): boolean {
    return this.pendingTransactions.has(txid);
  }

  public size(): number {
    return this.pendingTransactions.size;
  }
}
