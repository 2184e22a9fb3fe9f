export { ExtractionResponseParser } from './extraction-response-parser';
export type { ResponseParseOptions } from './extraction-response-parser';
export { VerbatimValidator } from './verbatim-validator';
export type {
  VerbatimCheckOptions,
  VerbatimCheckResult,
} from './verbatim-validator';
