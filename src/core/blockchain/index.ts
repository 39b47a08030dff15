export { Blockchain, GENESIS_PAYLOAD } from './Blockchain';
export { ChainStore } from './ChainStore';

export type { BlockchainOptions } from './Blockchain';
