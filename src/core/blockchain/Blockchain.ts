import { EventEmitter } from 'events';
import { Block, GENESIS_PREVIOUS_HASH } from '../Block';
import { HashUtils } from '../crypto';
import { DEFAULT_CONFIG } from '../../config';
import { ChainDataError, ChainError, InvalidDifficultyError, SequenceError } from '../errors';
import { createLogger } from '../../utils/logger';
import {
  BlockPayload,
  ChainFailureKind,
  ChainInfo,
  ChainValidationResult,
  MiningOptions,
  MiningRecord,
  MiningResult,
  MiningStats,
  SerializedChain,
  ValidationOptions
} from '../types/block.types';

export const GENESIS_PAYLOAD = 'Genesis Block';

export interface BlockchainOptions {
  genesisTimestamp?: number;
  /** Default poll interval for appendAsync() */
  miningCheckInterval?: number;
}

const logger = createLogger('Blockchain');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Single-writer hash-linked chain secured by proof of work.
 *
 * Emits `blockMined` with `(block, result)` after every append.
 */
export class Blockchain extends EventEmitter {
  private readonly chain: Block[];
  private readonly chainDifficulty: number;
  private readonly miningCheckInterval: number;
  private readonly miningRecords: MiningRecord[] = [];
  private mining = false;

  constructor(difficulty: number, options: BlockchainOptions = {}) {
    super();
    if (!HashUtils.isValidDifficulty(difficulty)) {
      throw new InvalidDifficultyError(difficulty);
    }
    this.chainDifficulty = difficulty;
    this.miningCheckInterval = options.miningCheckInterval ?? DEFAULT_CONFIG.miningCheckInterval;
    this.chain = [Blockchain.createGenesisBlock(options.genesisTimestamp ?? Date.now())];
  }

  /**
   * The unmined origin block; its hash need not meet any difficulty
   */
  public static createGenesisBlock(timestamp: number): Block {
    return new Block(0, GENESIS_PREVIOUS_HASH, timestamp, GENESIS_PAYLOAD);
  }

  public get difficulty(): number {
    return this.chainDifficulty;
  }

  public get length(): number {
    return this.chain.length;
  }

  public latest(): Block {
    return this.chain[this.chain.length - 1];
  }

  public getBlock(index: number): Block | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.chain.length) {
      return undefined;
    }
    return this.chain[index];
  }

  public getBlocks(): readonly Block[] {
    return this.chain;
  }

  /**
   * Build the block that would continue the chain, without mining it
   */
  public nextBlock(payload: BlockPayload, timestamp: number = Date.now()): Block {
    return new Block(this.chain.length, this.latest().hash, timestamp, payload);
  }

  /**
   * Link the block to the current tip, mine it and append it.
   * Any previousHash the caller set is replaced.
   * @throws SequenceError when the block index does not continue the chain
   */
  public append(block: Block): MiningResult {
    this.beginAppend(block);
    const result = this.mineLocked(block);
    this.announce(block, result);
    return result;
  }

  /**
   * Like append(), but mines without blocking the event loop and can be
   * cancelled through `options.signal`. An aborted block is not appended.
   */
  public async appendAsync(block: Block, options: MiningOptions = {}): Promise<MiningResult> {
    this.beginAppend(block);
    const result = await this.mineLockedAsync(block, options);
    this.announce(block, result);
    return result;
  }

  private mineLocked(block: Block): MiningResult {
    try {
      block.link(this.latest().hash);
      const result = block.mine(this.chainDifficulty);
      this.record(block, result);
      return result;
    } finally {
      this.mining = false;
    }
  }

  private async mineLockedAsync(block: Block, options: MiningOptions): Promise<MiningResult> {
    try {
      block.link(this.latest().hash);
      const result = await block.mineAsync(this.chainDifficulty, {
        checkInterval: options.checkInterval ?? this.miningCheckInterval,
        signal: options.signal
      });
      this.record(block, result);
      return result;
    } finally {
      this.mining = false;
    }
  }

  public addBlock(payload: BlockPayload, timestamp: number = Date.now()): Block {
    const block = this.nextBlock(payload, timestamp);
    this.append(block);
    return block;
  }

  private beginAppend(block: Block): void {
    if (this.mining) {
      throw new ChainError('Another block is already being mined', 'MINING_IN_PROGRESS');
    }
    if (block.index !== this.chain.length) {
      throw new SequenceError(this.chain.length, block.index);
    }
    this.mining = true;
  }

  private record(block: Block, result: MiningResult): void {
    this.chain.push(block);
    this.miningRecords.push({ ...result, index: block.index, timestamp: block.timestamp });
    logger.debug(`Block ${block.index} mined after ${result.attempts} attempts: ${block.hash}`);
  }

  /**
   * Runs after the lock is released, so listeners may append the next block.
   * The block is already part of the chain; a failing listener is logged.
   */
  private announce(block: Block, result: MiningResult): void {
    try {
      this.emit('blockMined', block, result);
    } catch (error) {
      logger.error(`blockMined listener failed for block ${block.index}`, error);
    }
  }

  public isValid(): boolean {
    return this.validate().valid;
  }

  /**
   * Walk the chain from block 1 and report the first failing block.
   * Genesis is never checked.
   */
  public validate(options: ValidationOptions = {}): ChainValidationResult {
    for (let i = 1; i < this.chain.length; i++) {
      const currentBlock = this.chain[i];
      const previousBlock = this.chain[i - 1];

      if (currentBlock.hash !== currentBlock.calculateHash()) {
        return this.failure(i, ChainFailureKind.HASH_MISMATCH, `Block ${i} hash does not match its contents`);
      }

      if (currentBlock.previousHash !== previousBlock.hash) {
        return this.failure(i, ChainFailureKind.LINKAGE_BROKEN, `Block ${i} does not reference block ${i - 1}`);
      }

      if (options.checkProofOfWork && !currentBlock.meetsDifficulty(this.chainDifficulty)) {
        return this.failure(
          i,
          ChainFailureKind.INSUFFICIENT_WORK,
          `Block ${i} hash has fewer than ${this.chainDifficulty} leading zeros`
        );
      }
    }

    return { valid: true };
  }

  private failure(index: number, failure: ChainFailureKind, message: string): ChainValidationResult {
    logger.debug(message);
    return { valid: false, index, failure, message };
  }

  /**
   * Effort and timing of every block mined by this instance
   */
  public getMiningStats(): MiningStats {
    const records = this.miningRecords.map(record => ({ ...record }));
    const totalAttempts = records.reduce((total, record) => total + record.attempts, 0);
    const totalDurationMs = records.reduce((total, record) => total + record.durationMs, 0);

    return {
      blocks: records.length,
      totalAttempts,
      totalDurationMs,
      averageAttempts: records.length === 0 ? 0 : totalAttempts / records.length,
      records
    };
  }

  public getChainInfo(): ChainInfo {
    return {
      length: this.chain.length,
      difficulty: this.chainDifficulty,
      latestHash: this.latest().hash,
      valid: this.isValid()
    };
  }

  public toJSON(): SerializedChain {
    return {
      difficulty: this.chainDifficulty,
      blocks: this.chain.map(block => block.toJSON())
    };
  }

  /**
   * Restore a chain without re-mining it. The result may still fail
   * validate(); only the shape and index sequence are checked here.
   */
  public static fromJSON(json: unknown, options: Omit<BlockchainOptions, 'genesisTimestamp'> = {}): Blockchain {
    if (!isRecord(json)) {
      throw new ChainDataError('Chain must be an object with a blocks array');
    }
    const { difficulty, blocks: rawBlocks } = json;
    if (!Array.isArray(rawBlocks)) {
      throw new ChainDataError('Chain must be an object with a blocks array');
    }
    if (typeof difficulty !== 'number') {
      throw new ChainDataError('Chain difficulty must be a number');
    }
    if (!HashUtils.isValidDifficulty(difficulty)) {
      throw new ChainDataError(`Chain difficulty must be an integer between 0 and 64, got ${difficulty}`);
    }
    const blocks = rawBlocks.map((value: unknown) => Block.fromJSON(value));
    if (blocks.length === 0) {
      throw new ChainDataError('Chain must contain a genesis block');
    }
    blocks.forEach((block, position) => {
      if (block.index !== position) {
        throw new ChainDataError(`Block at position ${position} has index ${block.index}`);
      }
    });

    const restored = new Blockchain(difficulty, { ...options, genesisTimestamp: blocks[0].timestamp });
    restored.chain.splice(0, restored.chain.length, ...blocks);
    return restored;
  }
}
