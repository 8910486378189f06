export type LedgerErrorCode =
  | 'INVALID_ADDRESS'
  | 'CHAIN_LINKAGE'
  | 'VALIDATION_FAILURE'
  | 'NETWORK_UNAVAILABLE'
  | 'PERSISTENCE_FAILURE';

/**
 * Base class for every failure the ledger core reports to its callers
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidAddressError extends LedgerError {
  public readonly address: string;

  constructor(address: string, reason: string) {
    super('INVALID_ADDRESS', `Invalid peer address "${address}": ${reason}`);
    this.address = address;
  }
}

export class ChainLinkageError extends LedgerError {
  public readonly blockIndex: number;

  constructor(blockIndex: number, message: string) {
    super('CHAIN_LINKAGE', message);
    this.blockIndex = blockIndex;
  }
}

export class ValidationFailureError extends LedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VALIDATION_FAILURE', message, options);
  }
}

export class NetworkUnavailableError extends LedgerError {
  public readonly peer: string;

  constructor(peer: string, message: string, options?: { cause?: unknown }) {
    super('NETWORK_UNAVAILABLE', `Peer ${peer} unavailable: ${message}`, options);
    this.peer = peer;
  }
}

export class PersistenceFailureError extends LedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILURE', message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
