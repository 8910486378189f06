import { Level } from 'level';
import { join } from 'path';
import { z } from 'zod';
import { LedgerStorage } from './LedgerStorage';
import {
  BlockRecord,
  BlockRecordSchema,
  TransactionRecord,
  TransactionRecordSchema
} from '../types/ledger.types';
import { PersistenceFailureError, ValidationFailureError, describeError } from '../errors';

const CHAIN_KEY = 'chain';
const MEMPOOL_KEY = 'mempool';

const StoredChainSchema = z.array(BlockRecordSchema);
const StoredMempoolSchema = z.array(TransactionRecordSchema);

/**
 * Each listening port gets its own database so several local nodes can coexist.
 */
export function storagePathFor(dataDir: string, port: number): string {
  return join(dataDir, `node-${port}`);
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'LEVEL_NOT_FOUND';
}

export class LevelStorage implements LedgerStorage {
  private db: Level<string, string>;
  private location: string;

  constructor(location: string) {
    this.location = location;
    this.db = new Level<string, string>(location);
  }

  public async open(): Promise<void> {
    try {
      await this.db.open();
    } catch (error) {
      throw new PersistenceFailureError(`Failed to open ledger database at ${this.location}: ${describeError(error)}`, { cause: error });
    }
  }

  public async close(): Promise<void> {
    await this.db.close();
  }

  public async loadChain(): Promise<BlockRecord[] | null> {
    return this.read(CHAIN_KEY, StoredChainSchema);
  }

  public async saveChain(blocks: BlockRecord[]): Promise<void> {
    await this.write(CHAIN_KEY, blocks);
  }

  public async loadMempool(): Promise<TransactionRecord[] | null> {
    return this.read(MEMPOOL_KEY, StoredMempoolSchema);
  }

  public async saveMempool(transactions: TransactionRecord[]): Promise<void> {
    await this.write(MEMPOOL_KEY, transactions);
  }

  private async read<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    let raw: string;
    try {
      raw = await this.db.get(key);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new PersistenceFailureError(`Failed to read "${key}": ${describeError(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ValidationFailureError(`Stored "${key}" is not valid JSON`, { cause: error });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ValidationFailureError(`Stored "${key}" has an unexpected shape: ${result.error.message}`);
    }
    return result.data;
  }

  private async write(key: string, value: unknown): Promise<void> {
    try {
      await this.db.put(key, JSON.stringify(value));
    } catch (error) {
      throw new PersistenceFailureError(`Failed to write "${key}": ${describeError(error)}`, { cause: error });
    }
  }
}
