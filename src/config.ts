import { DEFAULT_DIFFICULTY } from './core/mining/ProofOfWork';
import { DEFAULT_PEER_TIMEOUT_MS } from './network/PeerClient';
import { DEFAULT_SYNC_INTERVAL_MS } from './consensus/SyncScheduler';

export const DEFAULT_PORT = 5000;

export interface NodeConfig {
  port: number;
  host: string;
  difficulty: number;
  dataDir: string;
  syncIntervalMs: number;
  peerTimeoutMs: number;
  bootstrapPeers: string[];
  verbose: boolean;
}

type Env = Record<string, string | undefined>;

function readInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Build the node configuration. The first CLI argument, when present, is the
 * listening port and wins over NODE_PORT.
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): NodeConfig {
  const port = readInteger('port', argv[0] ?? env.NODE_PORT, DEFAULT_PORT, 0);
  if (port > 65535) {
    throw new Error(`port must be <= 65535, got ${port}`);
  }

  return {
    port,
    host: env.NODE_HOST || '0.0.0.0',
    difficulty: readInteger('DIFFICULTY', env.DIFFICULTY, DEFAULT_DIFFICULTY, 0),
    dataDir: env.DATA_DIR || './data',
    syncIntervalMs: readInteger('SYNC_INTERVAL_MS', env.SYNC_INTERVAL_MS, DEFAULT_SYNC_INTERVAL_MS, 1),
    peerTimeoutMs: readInteger('PEER_TIMEOUT_MS', env.PEER_TIMEOUT_MS, DEFAULT_PEER_TIMEOUT_MS, 1),
    bootstrapPeers: (env.BOOTSTRAP_PEERS || '').split(',').map(peer => peer.trim()).filter(peer => peer),
    verbose: env.LOG_VERBOSE === 'true'
  };
}
