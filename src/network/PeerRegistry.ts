import { InvalidAddressError } from '../core/errors';

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Reduce a peer address to its canonical `host:port` form.
 * Accepts both `http://host:port` and bare `host:port`.
 * @throws InvalidAddressError when no host can be parsed
 */
export function normalizePeerAddress(address: string): string {
  const trimmed = address.trim();
  if (trimmed.length === 0) {
    throw new InvalidAddressError(address, 'address is empty');
  }

  const candidate = SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`;
  let url: URL;
  try {
    url = new URL(candidate);
  } catch (error) {
    throw new InvalidAddressError(address, 'no host component');
  }

  if (!url.hostname) {
    throw new InvalidAddressError(address, 'no host component');
  }
  return url.port ? `${url.hostname}:${url.port}` : url.hostname;
}

export class PeerRegistry {
  private peers: Set<string> = new Set();

  /**
   * Register a peer. Registering the same peer twice is a no-op.
   * @returns The canonical address
   */
  public register(address: string): string {
    const canonical = normalizePeerAddress(address);
    this.peers.add(canonical);
    return canonical;
  }

  public remove(address: string): boolean {
    return this.peers.delete(normalizePeerAddress(address));
  }

  public has(address: string): boolean {
    return this.peers.has(normalizePeerAddress(address));
  }

  public list(): string[] {
    return Array.from(this.peers);
  }

  public size(): number {
    return this.peers.size;
  }
}
