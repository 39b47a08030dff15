import { createHash } from 'crypto';
import { BlockPayload } from '../types/block.types';

export interface BlockDigestFields {
  index: number;
  previousHash: string;
  timestamp: number;
  payload: BlockPayload;
  nonce: number;
}

/**
 * Cryptographic hash utilities for the chain
 * Uses SHA-256 for all hashing operations
 */
export class HashUtils {
  public static readonly DIGEST_LENGTH = 64;

  private static readonly HEX_DIGEST = /^[0-9a-f]{64}$/;

  /**
   * Compute SHA-256 hash of data
   * @returns Lowercase hexadecimal hash string
   */
  public static hash(data: string | Buffer): string {
    return createHash('sha256').update(data).digest('hex');
  }

  /**
   * Serialize a payload with object keys sorted recursively, so two payloads
   * holding the same fields always hash the same regardless of insertion order
   */
  public static canonicalize(payload: BlockPayload): string {
    if (payload === null || typeof payload !== 'object') {
      return JSON.stringify(payload);
    }
    if (Array.isArray(payload)) {
      return '[' + payload.map(item => this.canonicalize(item)).join(',') + ']';
    }
    const pairs = Object.keys(payload).sort().map(key => {
      return JSON.stringify(key) + ':' + this.canonicalize(payload[key]);
    });
    return '{' + pairs.join(',') + '}';
  }

  /**
   * Digest of a block: index, previous hash, timestamp, canonical payload and
   * nonce concatenated in that order
   */
  public static hashBlockFields(fields: BlockDigestFields): string {
    return this.hash(
      fields.index.toString() +
      fields.previousHash +
      fields.timestamp.toString() +
      this.canonicalize(fields.payload) +
      fields.nonce.toString()
    );
  }

  /**
   * Proof-of-work predicate
   * @param difficulty - Required number of leading '0' hex characters
   */
  public static meetsDifficulty(hash: string, difficulty: number): boolean {
    return hash.startsWith('0'.repeat(difficulty));
  }

  public static isValidDifficulty(difficulty: number): boolean {
    return Number.isInteger(difficulty) && difficulty >= 0 && difficulty <= this.DIGEST_LENGTH;
  }

  public static isHexDigest(value: string): boolean {
    return this.HEX_DIGEST.test(value);
  }
}
