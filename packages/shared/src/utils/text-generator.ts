import { type LanguageModel, generateText } from 'ai';

/**
 * Single request to the text-generation capability
 */
export interface GenerationRequest {
  /**
   * Model identifier understood by the generator
   */
  model: string;

  /**
   * System prompt (optional)
   */
  systemPrompt?: string;

  /**
   * User prompt
   */
  prompt: string;

  /**
   * Time budget for the call in milliseconds
   */
  timeoutMs: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;
}

/**
 * Text-generation capability used by the pipeline.
 *
 * Implementations must not retry on their own; retries, backoff and
 * concurrency are handled by the caller. They may throw on timeout,
 * network failure or rate limiting, and may return malformed text.
 */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

/**
 * Options for AiTextGenerator
 */
export interface AiTextGeneratorOptions {
  /**
   * Map a model identifier to an AI SDK model (default: pass the id through,
   * which the SDK resolves via its global provider)
   */
  resolveModel?: (modelId: string) => LanguageModel;

  /**
   * Temperature for generation (default: 0)
   */
  temperature?: number;
}

/**
 * AiTextGenerator - TextGenerator backed by the AI SDK's generateText
 *
 * SDK-level retries are disabled (`maxRetries: 0`) so that every failure
 * surfaces to the extractor, which owns the retry policy and reports
 * rate-limit responses to the rate controller.
 *
 * @example
 * ```typescript
 * import { createOpenAI } from '@ai-sdk/openai';
 *
 * const ollama = createOpenAI({ baseURL: 'http://localhost:11434/v1' });
 * const generator = new AiTextGenerator({
 *   resolveModel: (id) => ollama.chat(id),
 * });
 * ```
 */
export class AiTextGenerator implements TextGenerator {
  private readonly resolveModel: (modelId: string) => LanguageModel;
  private readonly temperature: number;

  constructor(options: AiTextGeneratorOptions = {}) {
    this.resolveModel = options.resolveModel ?? ((modelId) => modelId);
    this.temperature = options.temperature ?? 0;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const timeoutSignal = AbortSignal.timeout(request.timeoutMs);
    const abortSignal = request.abortSignal
      ? AbortSignal.any([request.abortSignal, timeoutSignal])
      : timeoutSignal;

    const result = await generateText({
      model: this.resolveModel(request.model),
      system: request.systemPrompt,
      prompt: request.prompt,
      temperature: this.temperature,
      maxRetries: 0,
      abortSignal,
    });

    return result.text;
  }
}
