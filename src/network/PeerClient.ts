import { z } from 'zod';
import { Block } from '../core/Block';
import { Transaction } from '../core/Transaction';
import { ChainResponseSchema, MempoolResponseSchema } from '../core/types/ledger.types';
import { NetworkUnavailableError, ValidationFailureError, describeError } from '../core/errors';

export const DEFAULT_PEER_TIMEOUT_MS = 5000;

export interface PeerChain {
  chain: Block[];
  length: number;
}

/**
 * What the node needs from its peers. Implementations must throw
 * NetworkUnavailableError or ValidationFailureError, never hang.
 */
export interface PeerGateway {
  fetchChain(peer: string): Promise<PeerChain>;
  fetchMempool(peer: string): Promise<Transaction[]>;
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export class HttpPeerClient implements PeerGateway {
  private timeoutMs: number;

  constructor(timeoutMs: number = DEFAULT_PEER_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  public async fetchChain(peer: string): Promise<PeerChain> {
    const body = await this.getJson(peer, '/chain', ChainResponseSchema);
    return {
      chain: body.chain.map(record => Block.fromJSON(record)),
      length: body.length
    };
  }

  public async fetchMempool(peer: string): Promise<Transaction[]> {
    const body = await this.getJson(peer, '/mempool', MempoolResponseSchema);
    return body.map(record => Transaction.fromJSON(record));
  }

  private async getJson<T>(peer: string, path: string, schema: z.ZodType<T>): Promise<T> {
    const signal = AbortSignal.timeout(this.timeoutMs);
    let response: Response;
    try {
      response = await fetch(`http://${peer}${path}`, {
        headers: { Accept: 'application/json' },
        signal
      });
    } catch (error) {
      throw new NetworkUnavailableError(peer, describeError(error), { cause: error });
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new NetworkUnavailableError(peer, `GET ${path} returned ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      // The timeout covers the body too.
      if (signal.aborted || isAbortError(error)) {
        throw new NetworkUnavailableError(peer, `GET ${path} timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw new ValidationFailureError(`Peer ${peer} sent malformed JSON for ${path}`, { cause: error });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationFailureError(`Peer ${peer} sent an unexpected ${path} payload: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
