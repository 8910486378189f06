import { Block } from '../Block';
import { isValidProof } from '../mining/ProofOfWork';
import { GENESIS_INDEX, GENESIS_PREVIOUS_HASH } from '../types/ledger.types';

export type ChainIssueReason =
  | 'empty-chain'
  | 'genesis-sentinel'
  | 'index-sequence'
  | 'previous-hash'
  | 'hash-mismatch'
  | 'proof-of-work';

export interface ChainIssue {
  index: number;
  reason: ChainIssueReason;
  message: string;
}

export interface ChainValidationReport {
  valid: boolean;
  length: number;
  issues: ChainIssue[];
}

/**
 * Walk a chain and collect every integrity problem.
 *
 * Linkage is checked against the previous block's recorded hash, so a
 * tampered block is reported at its own index without flagging its neighbours.
 */
export function validateChain(blocks: readonly Block[], difficulty: number): ChainValidationReport {
  const issues: ChainIssue[] = [];

  if (blocks.length === 0) {
    issues.push({ index: 0, reason: 'empty-chain', message: 'Chain has no genesis block' });
    return { valid: false, length: 0, issues };
  }

  const genesis = blocks[0];
  if (genesis.previousHash !== GENESIS_PREVIOUS_HASH) {
    issues.push({
      index: genesis.index,
      reason: 'genesis-sentinel',
      message: `Genesis previous hash is "${genesis.previousHash}", expected "${GENESIS_PREVIOUS_HASH}"`
    });
  }
  if (genesis.index !== GENESIS_INDEX) {
    issues.push({
      index: genesis.index,
      reason: 'index-sequence',
      message: `Genesis index is ${genesis.index}, expected ${GENESIS_INDEX}`
    });
  }
  if (!genesis.hasValidHash()) {
    issues.push({
      index: genesis.index,
      reason: 'hash-mismatch',
      message: `Block ${genesis.index} hash does not match its content`
    });
  }

  for (let i = 1; i < blocks.length; i++) {
    const previous = blocks[i - 1];
    const current = blocks[i];

    if (current.index !== previous.index + 1) {
      issues.push({
        index: current.index,
        reason: 'index-sequence',
        message: `Block ${current.index} follows block ${previous.index}`
      });
    }

    if (current.previousHash !== previous.hash) {
      issues.push({
        index: current.index,
        reason: 'previous-hash',
        message: `Block ${current.index} does not link to block ${previous.index}`
      });
    }

    if (!current.hasValidHash()) {
      issues.push({
        index: current.index,
        reason: 'hash-mismatch',
        message: `Block ${current.index} hash does not match its content`
      });
    }

    if (!isValidProof(previous.proof, current.proof, difficulty)) {
      issues.push({
        index: current.index,
        reason: 'proof-of-work',
        message: `Block ${current.index} proof ${current.proof} does not satisfy difficulty ${difficulty}`
      });
    }
  }

  return { valid: issues.length === 0, length: blocks.length, issues };
}
