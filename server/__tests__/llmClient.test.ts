import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const mockOpenAICreate = vi.fn();

vi.mock('openai', () => {
  return {
    OpenAI: class MockOpenAI {
      chat = {
        completions: {
          create: mockOpenAICreate
        }
      };
    }
  };
});

describe('LLM client', () => {
  const originalKey = process.env.OPENAI_API_KEY;
  const originalBaseUrl = process.env.OPENAI_BASE_URL;

  beforeEach(() => {
    vi.resetModules();
    mockOpenAICreate.mockReset();
    process.env.OPENAI_API_KEY = 'test-secret';
    delete process.env.OPENAI_BASE_URL;
  });

  afterEach(() => {
    if (originalKey === undefined) delete process.env.OPENAI_API_KEY;
    else process.env.OPENAI_API_KEY = originalKey;
    if (originalBaseUrl !== undefined) process.env.OPENAI_BASE_URL = originalBaseUrl;
  });

  it('detects the provider from the model name', async () => {
    const { detectProvider } = await import('../llm/client');

    expect(detectProvider('gpt-4o')).toBe('openai');
    expect(detectProvider('gpt-4.1-mini')).toBe('openai');
    expect(detectProvider('gemini-2.5-flash')).toBe('gemini');
    expect(detectProvider('claude-sonnet-4-5')).toBe('claude');
    expect(() => detectProvider('mystery-model')).toThrow('Unknown model "mystery-model"');
  });

  it('routes unknown models to an OpenAI-compatible host when one is configured', async () => {
    process.env.OPENAI_BASE_URL = 'http://localhost:8000/v1';
    const { detectProvider } = await import('../llm/client');

    expect(detectProvider('local/research-model')).toBe('openai');
  });

  it('sends generation settings to OpenAI and returns the text', async () => {
    mockOpenAICreate.mockResolvedValue({ choices: [{ message: { content: 'An answer.' } }] });
    const { generateText } = await import('../llm/client');

    const response = await generateText({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'Hello' }],
      temperature: 0.3,
      maxTokens: 400,
    });

    expect(response).toEqual({ text: 'An answer.', provider: 'openai', model: 'gpt-4o' });
    expect(mockOpenAICreate).toHaveBeenCalledWith({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'Hello' }],
      temperature: 0.3,
      max_tokens: 400,
    });
  });

  it('fails a generation that outlives its deadline', async () => {
    mockOpenAICreate.mockReturnValue(new Promise(() => {}));
    const { generateText } = await import('../llm/client');
    const { GenerationFailureError } = await import('../utils/errorHandler');

    const pending = generateText({ model: 'gpt-4o', messages: [{ role: 'user', content: 'Hello' }], timeoutMs: 10 });

    await expect(pending).rejects.toBeInstanceOf(GenerationFailureError);
    await expect(pending).rejects.toThrow('[LLM Client] gpt-4o did not respond within 10ms');
  });

  it('wraps provider errors as generation failures', async () => {
    mockOpenAICreate.mockRejectedValue(new Error('429 Rate limit reached'));
    const { generateText } = await import('../llm/client');
    const { GenerationFailureError } = await import('../utils/errorHandler');

    const pending = generateText({ model: 'gpt-4o-mini', messages: [{ role: 'user', content: 'Hello' }] });

    await expect(pending).rejects.toBeInstanceOf(GenerationFailureError);
    await expect(pending).rejects.toThrow('[LLM Client] openai gpt-4o-mini: 429 Rate limit reached');
  });

  it('fails without a key for the selected provider', async () => {
    delete process.env.OPENAI_API_KEY;
    const { generateText } = await import('../llm/client');

    await expect(generateText({ model: 'gpt-4o', messages: [{ role: 'user', content: 'Hello' }] }))
      .rejects.toThrow('[LLM Client] openai gpt-4o: OPENAI_API_KEY is not set');
  });

  it('exposes generation through the LanguageModel interface', async () => {
    mockOpenAICreate.mockResolvedValue({ choices: [{ message: { content: 'Composed.' } }] });
    const { createLanguageModel } = await import('../response');

    const text = await createLanguageModel('gpt-4o').generate(
      [{ role: 'system', content: 'Be brief.' }, { role: 'user', content: 'Hi' }],
      { maxTokens: 100, temperature: 0, timeoutMs: 1000 },
    );

    expect(text).toBe('Composed.');
    expect(mockOpenAICreate.mock.calls[0][0].max_tokens).toBe(100);
  });
});
