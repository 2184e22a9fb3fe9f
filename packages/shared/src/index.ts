export {
  AsyncQueue,
  type QueuePopResult,
} from './utils/async-queue';
export { callWithTimeout } from './utils/call-with-timeout';
export {
  GenerationTimeoutError,
  RateLimitError,
} from './utils/generation-errors';
export { PermitGate } from './utils/permit-gate';
export { detectRateLimit } from './utils/rate-limit-detector';
export { RingBuffer } from './utils/ring-buffer';
export {
  AiTextGenerator,
  type AiTextGeneratorOptions,
  type GenerationRequest,
  type TextGenerator,
} from './utils/text-generator';
