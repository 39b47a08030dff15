export { Block, GENESIS_PREVIOUS_HASH, isBlockPayload } from './core/Block';
export { Blockchain, ChainStore, GENESIS_PAYLOAD } from './core/blockchain';
export { HashUtils } from './core/crypto';
export {
  ChainError,
  SequenceError,
  InvalidDifficultyError,
  MiningAbortedError,
  NonceExhaustedError,
  ChainDataError
} from './core/errors';
export { ChainFailureKind } from './core/types/block.types';
export { loadConfig, DEFAULT_CONFIG } from './config';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger';

export type { BlockchainOptions } from './core/blockchain';
export type { BlockDigestFields } from './core/crypto';
export type {
  BlockPayload,
  PayloadPrimitive,
  SerializedBlock,
  SerializedChain,
  MiningOptions,
  MiningResult,
  MiningRecord,
  MiningStats,
  ChainValidationResult,
  ValidationOptions,
  ChainInfo
} from './core/types/block.types';
export type { ChainConfig, LogLevel } from './config';
export type { Logger } from './utils/logger';
