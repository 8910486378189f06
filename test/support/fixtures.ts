import { Block } from '../../src/core/Block';
import { Transaction, TransactionData } from '../../src/core/Transaction';
import { proofOfWork } from '../../src/core/mining/ProofOfWork';
import { NodeConfig } from '../../src/config';
import { Logger } from '../../src/utils/logger';

export const GENESIS_TIMESTAMP = 1_700_000_000_000;

export const quietLogger = new Logger({ silent: true });

export function certificate(overrides: Partial<TransactionData> = {}): Transaction {
  return Transaction.create({
    nama: 'Siti Rahma',
    nomorSertifikat: 'SHM-0001',
    lokasi: 'Desa Sukamaju',
    luas: '100',
    timestamp: GENESIS_TIMESTAMP,
    ...overrides
  });
}

/**
 * Mine a valid chain of `length` blocks (genesis included). Block n carries
 * one certificate with txid `${prefix}-${n}`.
 */
export function mineChain(length: number, difficulty: number, prefix = 'tx'): Block[] {
  const chain = [Block.genesis(GENESIS_TIMESTAMP)];
  while (chain.length < length) {
    const previous = chain[chain.length - 1];
    const index = previous.index + 1;
    const proof = proofOfWork(previous.proof, difficulty);
    const transactions = [certificate({ txid: `${prefix}-${index}`, nomorSertifikat: `SHM-${index}` })];
    chain.push(new Block(index, GENESIS_TIMESTAMP + index * 1000, transactions, proof, previous.hash));
  }
  return chain;
}

export function testConfig(overrides: Partial<NodeConfig> = {}): NodeConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    difficulty: 2,
    dataDir: './data-test',
    syncIntervalMs: 5000,
    peerTimeoutMs: 1000,
    bootstrapPeers: [],
    verbose: false,
    ...overrides
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(res => {
    resolve = res;
  });
  return { promise, resolve };
}
