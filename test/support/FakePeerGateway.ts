import { Block } from '../../src/core/Block';
import { Transaction } from '../../src/core/Transaction';
import { NetworkUnavailableError } from '../../src/core/errors';
import { PeerChain, PeerGateway } from '../../src/network/PeerClient';

interface FakePeer {
  chain?: Block[];
  reportedLength?: number;
  mempool?: Transaction[];
  failure?: Error;
}

/**
 * Peers answered from memory. Unknown peers behave as unreachable.
 */
export class FakePeerGateway implements PeerGateway {
  private peers: Map<string, FakePeer> = new Map();
  public chainRequests: string[] = [];
  public mempoolRequests: string[] = [];

  setPeer(peer: string, state: FakePeer): this {
    this.peers.set(peer, state);
    return this;
  }

  async fetchChain(peer: string): Promise<PeerChain> {
    this.chainRequests.push(peer);
    const state = this.lookup(peer);
    const chain = state.chain ?? [];
    return { chain: [...chain], length: state.reportedLength ?? chain.length };
  }

  async fetchMempool(peer: string): Promise<Transaction[]> {
    this.mempoolRequests.push(peer);
    return [...(this.lookup(peer).mempool ?? [])];
  }

  private lookup(peer: string): FakePeer {
    const state = this.peers.get(peer);
    if (!state) {
      throw new NetworkUnavailableError(peer, 'connect ECONNREFUSED');
    }
    if (state.failure) {
      throw state.failure;
    }
    return state;
  }
}
