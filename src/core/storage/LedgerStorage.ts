import { BlockRecord, TransactionRecord } from '../types/ledger.types';

/**
 * Durable home of a node's chain and mempool.
 * Loads return null when nothing has been stored yet.
 */
export interface LedgerStorage {
  open(): Promise<void>;
  close(): Promise<void>;
  loadChain(): Promise<BlockRecord[] | null>;
  saveChain(blocks: BlockRecord[]): Promise<void>;
  loadMempool(): Promise<TransactionRecord[] | null>;
  saveMempool(transactions: TransactionRecord[]): Promise<void>;
}
