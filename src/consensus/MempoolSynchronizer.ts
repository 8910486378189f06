import { Blockchain } from '../core/blockchain/Blockchain';
import { Transaction } from '../core/Transaction';
import { TransactionPool } from '../core/transaction/TransactionPool';
import { LedgerError } from '../core/errors';
import { PeerRegistry } from '../network/PeerRegistry';
import { PeerGateway } from '../network/PeerClient';
import { Mutex } from '../utils/Mutex';
import { Logger } from '../utils/logger';
import { SkippedPeer } from './ConsensusResolver';

export interface MempoolSyncResult {
  added: number;
  skipped: SkippedPeer[];
}

export interface MempoolSyncContext {
  blockchain: Blockchain;
  pool: TransactionPool;
  peers: PeerRegistry;
  gateway: PeerGateway;
  mutex: Mutex;
  logger?: Logger;
}

export class MempoolSynchronizer {
  private context: MempoolSyncContext;
  private logger: Logger;

  constructor(context: MempoolSyncContext) {
    this.context = context;
    this.logger = context.logger ?? new Logger({ scope: 'mempool-sync' });
  }

  /**
   * Pull every peer's pool and merge it into ours. Transactions already on the
   * local chain are not pooled again.
   */
  public async sync(): Promise<MempoolSyncResult> {
    const { blockchain, pool, peers, gateway, mutex } = this.context;
    const skipped: SkippedPeer[] = [];
    let added = 0;

    for (const peer of peers.list()) {
      let remote: Transaction[];
      try {
        remote = await gateway.fetchMempool(peer);
      } catch (error) {
        if (!(error instanceof LedgerError)) {
          throw error;
        }
        skipped.push({ peer, reason: error.code, message: error.message });
        this.logger.debug(`Skipping ${peer}: ${error.message}`);
        continue;
      }

      added += await mutex.lock(() => pool.merge(remote, blockchain.committedTxids()));
    }

    return { added, skipped };
  }
}
