import { Transaction } from './Transaction';
import { HashUtils } from '../crypto/hash';
import { BlockRecord, GENESIS_INDEX, GENESIS_PREVIOUS_HASH } from './types/ledger.types';

export class Block {
  public readonly index: number;
  public readonly timestamp: number;
  public readonly transactions: readonly Transaction[];
  public readonly proof: number;
  public readonly previousHash: string;
  public readonly hash: string;

  constructor(
    index: number,
    timestamp: number,
    transactions: readonly Transaction[],
    proof: number,
    previousHash: string,
    hash?: string
  ) {
    this.index = index;
    this.timestamp = timestamp;
    this.transactions = Object.freeze([...transactions]);
    this.proof = proof;
    this.previousHash = previousHash;
    this.hash = hash ?? this.calculateHash();
    Object.freeze(this);
  }

  /**
   * Digest of the block's canonical content. The recorded `hash` is not part of it.
   */
  public calculateHash(): string {
    return HashUtils.hashBlockContent({
      index: this.index,
      timestamp: this.timestamp,
      transactions: this.transactions.map(tx => tx.toJSON()),
      previous_hash: this.previousHash,
      proof: this.proof
    });
  }

  public hasValidHash(): boolean {
    return this.hash === this.calculateHash();
  }

  public getTransactionIds(): string[] {
    return this.transactions.map(tx => tx.txid);
  }

  public static genesis(timestamp: number = Date.now()): Block {
    return new Block(GENESIS_INDEX, timestamp, [], 0, GENESIS_PREVIOUS_HASH);
  }

  public toJSON(): BlockRecord {
    return {
      index: this.index,
      timestamp: this.timestamp,
      transactions: this.transactions.map(tx => tx.toJSON()),
      proof: this.proof,
      previous_hash: this.previousHash,
      hash: this.hash
    };
  }

  /**
   * Rebuild a block from its record, keeping the recorded hash as-is so
   * tampering stays detectable.
   */
  public static fromJSON(json: BlockRecord): Block {
    return new Block(
      json.index,
      json.timestamp,
      json.transactions.map(tx => Transaction.fromJSON(tx)),
      json.proof,
      json.previous_hash,
      json.hash
    );
  }
}
