import { createHash } from 'crypto';

export type CanonicalValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

/**
 * Hash utilities for the ledger
 * Uses SHA-256 for blocks, proofs and certificate files alike
 */
export class HashUtils {
  /**
   * Compute SHA-256 hash of data
   * @param data - Data to hash (string or Buffer)
   * @returns Hexadecimal hash string
   */
  public static hash(data: string | Buffer): string {
    return createHash('sha256').update(data).digest('hex');
  }

  /**
   * Serialize a value as JSON with object keys sorted at every depth.
   * Keys holding `undefined` are omitted, as JSON.stringify does.
   * @param value - Plain data to serialize
   * @returns Canonical JSON text without whitespace
   */
  public static canonicalize(value: CanonicalValue): string {
    if (value === undefined) {
      return 'null';
    }
    if (value === null || typeof value !== 'object') {
      return JSON.stringify(value);
    }
    if (Array.isArray(value)) {
      return `[${value.map(item => this.canonicalize(item)).join(',')}]`;
    }

    const entries = Object.keys(value)
      .filter(key => value[key] !== undefined)
      .sort()
      .map(key => `${JSON.stringify(key)}:${this.canonicalize(value[key])}`);
    return `{${entries.join(',')}}`;
  }

  /**
   * Hash the canonical serialization of a block's content
   * @param content - Block fields that take part in the digest
   * @returns Block hash
   */
  public static hashBlockContent(content: { [key: string]: CanonicalValue }): string {
    return this.hash(this.canonicalize(content));
  }

  /**
   * Fingerprint an uploaded certificate file
   * @param bytes - Raw file content
   * @returns File hash
   */
  public static hashFile(bytes: Buffer): string {
    return this.hash(bytes);
  }
}
