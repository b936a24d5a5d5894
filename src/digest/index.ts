/**
 * Digest: Barrel Export
 */
export { NodeDigestSink } from './DigestSink.js';
export type { DigestSink, NodeDigestAlgorithm } from './DigestSink.js';
export { Fnv1a64 } from './Fnv1a64.js';
