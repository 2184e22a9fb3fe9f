export { ChunkExtractor } from './chunk-extractor';
export type { ChunkExtractorOptions } from './chunk-extractor';
export { ExtractionPrompts, planAttempt } from './extraction-prompts';
export type { Attempt, PromptStrategy } from './extraction-prompts';
