export { contentHash } from './content-hash';
export { DomainInferrer } from './domain-inferrer';
export { ItemDeduplicator } from './item-deduplicator';
export { TextChunker } from './text-chunker';
export { TextNormalizer } from './text-normalizer';
