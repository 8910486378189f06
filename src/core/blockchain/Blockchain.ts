import { Block } from '../Block';
import { Transaction } from '../Transaction';
import { LedgerStorage } from '../storage/LedgerStorage';
import { BlockRecord } from '../types/ledger.types';
import { DEFAULT_DIFFICULTY, isValidProof } from '../mining/ProofOfWork';
import { ChainValidationReport, validateChain } from './validation';
import { ChainLinkageError, ValidationFailureError } from '../errors';
import { Logger } from '../../utils/logger';

export interface TransactionLocation {
  transaction: Transaction;
  block: Block;
}

/**
 * Ledger store: the ordered block sequence and its durable copy.
 *
 * Blocks only enter through `append`, which checks them against the current
 * head, or through a whole-chain `replace` driven by consensus.
 */
export class Blockchain {
  private chain: Block[];
  private readonly difficulty: number;
  private readonly storage: LedgerStorage;
  private readonly logger: Logger;

  constructor(storage: LedgerStorage, difficulty: number = DEFAULT_DIFFICULTY, logger: Logger = new Logger({ scope: 'chain' })) {
    this.storage = storage;
    this.difficulty = difficulty;
    this.logger = logger;
    this.chain = [Block.genesis()];
  }

  /**
   * Restore the chain from storage. Falls back to a fresh genesis when nothing
   * is stored or the stored chain cannot be trusted.
   */
  public async loadFromDurable(): Promise<void> {
    let records: BlockRecord[] | null;
    try {
      records = await this.storage.loadChain();
    } catch (error) {
      if (!(error instanceof ValidationFailureError)) {
        throw error;
      }
      this.logger.warn(`Stored chain is unreadable, starting from a new genesis block: ${error.message}`);
      records = null;
    }

    if (records && records.length > 0) {
      const blocks = records.map(record => Block.fromJSON(record));
      const report = validateChain(blocks, this.difficulty);
      if (report.valid) {
        this.chain = blocks;
        return;
      }
      const first = report.issues[0];
      this.logger.warn(`Stored chain failed validation at block ${first.index} (${first.reason}), starting from a new genesis block`);
    }

    this.chain = [Block.genesis()];
    await this.persist();
  }

  public async persist(): Promise<void> {
    await this.storage.saveChain(this.chain.map(block => block.toJSON()));
  }

  public genesis(): Block {
    return this.chain[0];
  }

  public head(): Block {
    return this.chain[this.chain.length - 1];
  }

  /**
   * Append a mined block on top of the current head and persist the chain.
   * @throws ChainLinkageError when the block does not extend the current head
   * @throws ValidationFailureError when its hash or proof is wrong
   */
  public async append(block: Block): Promise<Block> {
    const head = this.head();

    if (block.index !== head.index + 1) {
      throw new ChainLinkageError(block.index, `Block index ${block.index} does not follow head index ${head.index}`);
    }
    if (block.previousHash !== head.hash) {
      throw new ChainLinkageError(block.index, `Block ${block.index} previous hash does not match head ${head.hash}`);
    }
    if (!block.hasValidHash()) {
      throw new ValidationFailureError(`Block ${block.index} hash does not match its content`);
    }
    if (!isValidProof(head.proof, block.proof, this.difficulty)) {
      throw new ValidationFailureError(`Block ${block.index} proof ${block.proof} does not satisfy difficulty ${this.difficulty}`);
    }

    this.chain.push(block);
    await this.persist();
    return block;
  }

  /**
   * Swap in a whole chain adopted through consensus and persist it.
   */
  public async replace(blocks: readonly Block[]): Promise<void> {
    const report = validateChain(blocks, this.difficulty);
    if (!report.valid) {
      throw new ValidationFailureError(`Refusing to adopt an invalid chain: ${report.issues[0].message}`);
    }

    this.chain = [...blocks];
    await this.persist();
  }

  public validate(): ChainValidationReport {
    return validateChain(this.chain, this.difficulty);
  }

  public getChain(): Block[] {
    return [...this.chain];
  }

  public getLength(): number {
    return this.chain.length;
  }

  public getDifficulty(): number {
    return this.difficulty;
  }

  public getBlock(index: number): Block | null {
    return this.chain.find(block => block.index === index) ?? null;
  }

  public findTransaction(txid: string): TransactionLocation | null {
    for (const block of this.chain) {
      const transaction = block.transactions.find(tx => tx.txid === txid);
      if (transaction) {
        return { transaction, block };
      }
    }
    return null;
  }

  public committedTxids(): Set<string> {
    const txids = new Set<string>();
    for (const block of this.chain) {
      for (const txid of block.getTransactionIds()) {
        txids.add(txid);
      }
    }
    return txids;
  }
}
