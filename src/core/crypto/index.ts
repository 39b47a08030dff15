export { HashUtils } from './hash';
export type { BlockDigestFields } from './hash';
