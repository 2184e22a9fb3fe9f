import type { LanguageModel } from 'ai';

import { generateText } from 'ai';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { AiTextGenerator } from './text-generator';

vi.mock('ai', () => ({
  generateText: vi.fn(),
}));

describe('AiTextGenerator', () => {
  beforeEach(() => {
    vi.mocked(generateText).mockResolvedValue({
      text: '{"domains":["strategy"]}',
    } as Awaited<ReturnType<typeof generateText>>);
  });

  test('returns the generated text', async () => {
    const generator = new AiTextGenerator();

    const text = await generator.generate({
      model: 'qwen2.5',
      prompt: 'Extract',
      timeoutMs: 1000,
    });

    expect(text).toBe('{"domains":["strategy"]}');
  });

  test('passes prompts through with SDK retries disabled', async () => {
    const generator = new AiTextGenerator({ temperature: 0.2 });

    await generator.generate({
      model: 'qwen2.5',
      systemPrompt: 'System',
      prompt: 'User',
      timeoutMs: 1000,
    });

    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'qwen2.5',
        system: 'System',
        prompt: 'User',
        temperature: 0.2,
        maxRetries: 0,
        abortSignal: expect.any(AbortSignal),
      }),
    );
  });

  test('resolves model ids through the configured resolver', async () => {
    const model = { modelId: 'resolved' } as unknown as LanguageModel;
    const resolveModel = vi.fn(() => model);
    const generator = new AiTextGenerator({ resolveModel });

    await generator.generate({ model: 'alias', prompt: 'p', timeoutMs: 1000 });

    expect(resolveModel).toHaveBeenCalledWith('alias');
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({ model }),
    );
  });

  test('aborts the SDK call when the caller aborts', async () => {
    const generator = new AiTextGenerator();
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await generator.generate({
      model: 'qwen2.5',
      prompt: 'p',
      timeoutMs: 1000,
      abortSignal: controller.signal,
    });

    const call = vi.mocked(generateText).mock.calls[0][0];
    expect(call.abortSignal?.aborted).toBe(true);
  });
});
