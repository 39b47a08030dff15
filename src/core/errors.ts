/**
 * Base class for every error raised by the chain library
 */
export class ChainError extends Error {
  public readonly code: string;

  constructor(message: string, code: string = 'CHAIN_ERROR') {
    super(message);
    this.name = new.target.name;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when an appended block does not continue the index sequence
 */
export class SequenceError extends ChainError {
  constructor(public readonly expected: number, public readonly received: number) {
    super(`Block index ${received} does not continue the chain (expected ${expected})`, 'SEQUENCE_ERROR');
  }
}

export class InvalidDifficultyError extends ChainError {
  constructor(public readonly difficulty: number) {
    super(`Difficulty must be an integer between 0 and 64, got ${difficulty}`, 'INVALID_DIFFICULTY');
  }
}

export class MiningAbortedError extends ChainError {
  constructor(public readonly index: number, public readonly attempts: number) {
    super(`Mining of block ${index} aborted after ${attempts} attempts`, 'MINING_ABORTED');
  }
}

export class NonceExhaustedError extends ChainError {
  constructor(public readonly index: number) {
    super(`Nonce space exhausted while mining block ${index}`, 'NONCE_EXHAUSTED');
  }
}

/**
 * Malformed serialized block or chain data
 */
export class ChainDataError extends ChainError {
  constructor(message: string) {
    super(message, 'CHAIN_DATA_ERROR');
  }
}
