export type PayloadPrimitive = string | number | boolean | null;

export type BlockPayload =
  | PayloadPrimitive
  | BlockPayload[]
  | { [key: string]: BlockPayload };

export interface SerializedBlock {
  index: number;
  previousHash: string;
  timestamp: number;
  payload: BlockPayload;
  nonce: number;
  hash: string;
}

export interface SerializedChain {
  difficulty: number;
  blocks: SerializedBlock[];
}

export interface MiningOptions {
  /** Aborts the nonce search; polled every `checkInterval` attempts */
  signal?: AbortSignal;
  checkInterval?: number;
}

export interface MiningResult {
  nonce: number;
  hash: string;
  attempts: number;
  durationMs: number;
}

export interface MiningRecord extends MiningResult {
  index: number;
  timestamp: number;
}

export interface MiningStats {
  blocks: number;
  totalAttempts: number;
  totalDurationMs: number;
  averageAttempts: number;
  records: MiningRecord[];
}

export enum ChainFailureKind {
  HASH_MISMATCH = 'HashMismatch',
  LINKAGE_BROKEN = 'LinkageBroken',
  INSUFFICIENT_WORK = 'InsufficientWork'
}

export type ChainValidationResult =
  | { valid: true }
  | { valid: false; index: number; failure: ChainFailureKind; message: string };

export interface ValidationOptions {
  checkProofOfWork?: boolean;
}

export interface ChainInfo {
  length: number;
  difficulty: number;
  latestHash: string;
  valid: boolean;
}
