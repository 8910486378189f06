import { EventEmitter } from 'events';
import { Block } from '../core/Block';
import { Blockchain } from '../core/blockchain/Blockchain';
import { validateChain } from '../core/blockchain/validation';
import { TransactionPool } from '../core/transaction/TransactionPool';
import { LedgerError, LedgerErrorCode, PersistenceFailureError } from '../core/errors';
import { PeerRegistry } from '../network/PeerRegistry';
import { PeerChain, PeerGateway } from '../network/PeerClient';
import { Mutex } from '../utils/Mutex';
import { Logger } from '../utils/logger';

export interface SkippedPeer {
  peer: string;
  reason: LedgerErrorCode;
  message: string;
}

export interface ResolutionResult {
  replaced: boolean;
  length: number;
  source?: string;
  skipped: SkippedPeer[];
}

export interface ConsensusContext {
  blockchain: Blockchain;
  pool: TransactionPool;
  peers: PeerRegistry;
  gateway: PeerGateway;
  mutex: Mutex;
  logger?: Logger;
}

/**
 * Longest valid chain rule.
 *
 * Peers are trusted: an internally consistent longer chain from any registered
 * peer wins. Peer I/O and validation run outside the lock; only the adopt step
 * takes it.
 */
export class ConsensusResolver extends EventEmitter {
  private context: ConsensusContext;
  private logger: Logger;

  constructor(context: ConsensusContext) {
    super();
    this.context = context;
    this.logger = context.logger ?? new Logger({ scope: 'consensus' });
  }

  public async resolve(): Promise<ResolutionResult> {
    const { blockchain, peers, gateway } = this.context;
    const difficulty = blockchain.getDifficulty();
    const skipped: SkippedPeer[] = [];

    let maxLength = blockchain.getLength();
    let best: { peer: string; chain: Block[] } | null = null;

    for (const peer of peers.list()) {
      let remote: PeerChain;
      try {
        remote = await gateway.fetchChain(peer);
      } catch (error) {
        if (!(error instanceof LedgerError)) {
          throw error;
        }
        skipped.push({ peer, reason: error.code, message: error.message });
        this.logger.debug(`Skipping ${peer}: ${error.message}`);
        continue;
      }

      if (remote.length !== remote.chain.length) {
        skipped.push({
          peer,
          reason: 'VALIDATION_FAILURE',
          message: `Reported length ${remote.length} but sent ${remote.chain.length} blocks`
        });
        continue;
      }
      if (remote.length <= maxLength) {
        continue;
      }

      const report = validateChain(remote.chain, difficulty);
      if (!report.valid) {
        const issue = report.issues[0];
        skipped.push({ peer, reason: 'VALIDATION_FAILURE', message: issue.message });
        this.logger.debug(`Discarding chain from ${peer}: ${issue.message}`);
        continue;
      }

      maxLength = remote.length;
      best = { peer, chain: remote.chain };
    }

    if (!best) {
      return { replaced: false, length: blockchain.getLength(), skipped };
    }

    const candidate = best;
    return this.context.mutex.lock(async () => {
      // The local chain may have grown while peers were being queried.
      if (candidate.chain.length <= blockchain.getLength()) {
        return { replaced: false, length: blockchain.getLength(), skipped };
      }

      try {
        await blockchain.replace(candidate.chain);
      } catch (error) {
        // A failed write still leaves the adopted chain in memory.
        if (error instanceof PersistenceFailureError && blockchain.head() === candidate.chain[candidate.chain.length - 1]) {
          await this.context.pool.commit(blockchain.committedTxids());
        }
        throw error;
      }

      const committed = await this.context.pool.commit(blockchain.committedTxids());
      this.emit('chain:replaced', { source: candidate.peer, length: candidate.chain.length, committed });
      return { replaced: true, length: blockchain.getLength(), source: candidate.peer, skipped };
    });
  }
}
