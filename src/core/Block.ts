import { performance } from 'perf_hooks';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { HashUtils } from './crypto';
import { DEFAULT_CONFIG } from '../config';
import {
  ChainDataError,
  InvalidDifficultyError,
  MiningAbortedError,
  NonceExhaustedError
} from './errors';
import { BlockPayload, MiningOptions, MiningResult, SerializedBlock } from './types/block.types';

export const GENESIS_PREVIOUS_HASH = '0';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isBlockPayload(value: unknown): value is BlockPayload {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isBlockPayload);
  }
  return isRecord(value) && Object.values(value).every(isBlockPayload);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

export class Block {
  public readonly index: number;
  public previousHash: string;
  public readonly timestamp: number;
  public readonly payload: BlockPayload;
  private currentNonce: number;
  private currentHash: string;

  constructor(
    index: number,
    previousHash: string,
    timestamp: number,
    payload: BlockPayload,
    nonce: number = 0
  ) {
    this.index = index;
    this.previousHash = previousHash;
    this.timestamp = timestamp;
    this.payload = payload;
    this.currentNonce = nonce;
    this.currentHash = this.calculateHash();
  }

  public get nonce(): number {
    return this.currentNonce;
  }

  /** Cached digest; re-derive with calculateHash() to check it */
  public get hash(): string {
    return this.currentHash;
  }

  public calculateHash(): string {
    return HashUtils.hashBlockFields({
      index: this.index,
      previousHash: this.previousHash,
      timestamp: this.timestamp,
      payload: this.payload,
      nonce: this.currentNonce
    });
  }

  /**
   * Point the block at a new predecessor and re-derive its hash
   */
  public link(previousHash: string): void {
    this.previousHash = previousHash;
    this.currentHash = this.calculateHash();
  }

  public meetsDifficulty(difficulty: number): boolean {
    return HashUtils.meetsDifficulty(this.currentHash, difficulty);
  }

  /**
   * Proof of work: starting from the current nonce, increment until the hash
   * carries `difficulty` leading zeros. Blocks the event loop until done.
   */
  public mine(difficulty: number): MiningResult {
    this.assertDifficulty(difficulty);
    const started = performance.now();
    let attempts = 1;

    this.currentHash = this.calculateHash();
    while (!this.meetsDifficulty(difficulty)) {
      this.nextNonce();
      attempts++;
    }

    return this.result(attempts, started);
  }

  /**
   * Same search as mine(), yielding to the event loop every `checkInterval`
   * attempts so that `signal` can interrupt it
   * @throws MiningAbortedError once the signal is aborted
   */
  public async mineAsync(difficulty: number, options: MiningOptions = {}): Promise<MiningResult> {
    this.assertDifficulty(difficulty);
    const checkInterval = options.checkInterval ?? DEFAULT_CONFIG.miningCheckInterval;
    if (!Number.isInteger(checkInterval) || checkInterval < 1) {
      throw new RangeError(`checkInterval must be a positive integer, got ${checkInterval}`);
    }
    if (options.signal?.aborted) {
      throw new MiningAbortedError(this.index, 0);
    }

    const started = performance.now();
    let attempts = 1;

    this.currentHash = this.calculateHash();
    while (!this.meetsDifficulty(difficulty)) {
      if (attempts % checkInterval === 0) {
        await yieldToEventLoop();
        if (options.signal?.aborted) {
          throw new MiningAbortedError(this.index, attempts);
        }
      }
      this.nextNonce();
      attempts++;
    }

    return this.result(attempts, started);
  }

  private nextNonce(): void {
    if (this.currentNonce >= Number.MAX_SAFE_INTEGER) {
      throw new NonceExhaustedError(this.index);
    }
    this.currentNonce++;
    this.currentHash = this.calculateHash();
  }

  private assertDifficulty(difficulty: number): void {
    if (!HashUtils.isValidDifficulty(difficulty)) {
      throw new InvalidDifficultyError(difficulty);
    }
  }

  private result(attempts: number, started: number): MiningResult {
    return {
      nonce: this.currentNonce,
      hash: this.currentHash,
      attempts,
      durationMs: performance.now() - started
    };
  }

  public toJSON(): SerializedBlock {
    return {
      index: this.index,
      previousHash: this.previousHash,
      timestamp: this.timestamp,
      payload: this.payload,
      nonce: this.currentNonce,
      hash: this.currentHash
    };
  }

  /**
   * Rebuild a block exactly as stored. The stored hash is kept even when it no
   * longer matches the fields, so tampering stays detectable.
   */
  public static fromJSON(json: unknown): Block {
    if (!isRecord(json)) {
      throw new ChainDataError('Block must be an object');
    }
    const { index, previousHash, timestamp, payload, nonce, hash } = json;
    if (!isNonNegativeInteger(index)) {
      throw new ChainDataError('Block index must be a non-negative integer');
    }
    if (typeof previousHash !== 'string' || typeof hash !== 'string') {
      throw new ChainDataError(`Block ${index} hashes must be strings`);
    }
    if (!HashUtils.isHexDigest(hash)) {
      throw new ChainDataError(`Block ${index} hash is not a SHA-256 hex digest`);
    }
    // genesis carries the sentinel instead of a digest
    if (index > 0 && !HashUtils.isHexDigest(previousHash)) {
      throw new ChainDataError(`Block ${index} previous hash is not a SHA-256 hex digest`);
    }
    if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
      throw new ChainDataError(`Block ${index} timestamp must be a finite number`);
    }
    if (!isNonNegativeInteger(nonce)) {
      throw new ChainDataError(`Block ${index} nonce must be a non-negative integer`);
    }
    if (!isBlockPayload(payload)) {
      throw new ChainDataError(`Block ${index} payload is not serializable`);
    }

    const block = new Block(index, previousHash, timestamp, payload, nonce);
    block.currentHash = hash;
    return block;
  }
}
