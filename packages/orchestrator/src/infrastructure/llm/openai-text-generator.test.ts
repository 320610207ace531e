import { describe, it, expect, vi, beforeEach } from 'vitest';
import { OpenAITextGenerator, type ChatCompletionClient } from './openai-text-generator.js';
import { ResponseCache } from './response-cache.js';

const completion = (content: string | null) => ({
  id: 'chatcmpl-test',
  object: 'chat.completion',
  created: 0,
  model: 'test-model',
  choices: [
    { index: 0, finish_reason: 'stop', logprobs: null, message: { role: 'assistant', content, refusal: null } },
  ],
});

describe('OpenAITextGenerator', () => {
  let create: ReturnType<typeof vi.fn>;
  let client: ChatCompletionClient;

  beforeEach(() => {
    create = vi.fn();
    client = { create };
  });

  it('sends the system and user prompts with the configured settings', async () => {
    create.mockResolvedValue(completion('{"ok":true}'));
    const generator = new OpenAITextGenerator(client, {
      model: 'test-model',
      temperature: 0.3,
      maxTokens: 256,
    });

    expect(await generator.generate('clasifica esto', 'responde en JSON')).toBe('{"ok":true}');
    expect(create).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'responde en JSON' },
        { role: 'user', content: 'clasifica esto' },
      ],
      temperature: 0.3,
      max_tokens: 256,
      stream: false,
    });
  });

  it('rejects an empty completion', async () => {
    create.mockResolvedValue(completion(null));
    const generator = new OpenAITextGenerator(client, { model: 'm', temperature: 0, maxTokens: 1 });

    await expect(generator.generate('hola')).rejects.toThrow('No response from model');
  });

  it('serves repeated prompts from the cache', async () => {
    create.mockResolvedValue(completion('respuesta'));
    const generator = new OpenAITextGenerator(
      client,
      { model: 'm', temperature: 0, maxTokens: 1 },
      new ResponseCache(60_000),
    );

    await generator.generate('hola', 'sys');
    await generator.generate('hola', 'sys');
    await generator.generate('hola', 'otro sistema');

    expect(create).toHaveBeenCalledTimes(2);
  });
});

describe('ResponseCache', () => {
  it('expires entries after the ttl', () => {
    let now = 0;
    const cache = new ResponseCache(1_000, 10, () => now);
    cache.set('k', 'v');

    now = 999;
    expect(cache.get('k')).toBe('v');
    now = 1_000;
    expect(cache.get('k')).toBeUndefined();
  });

  it('evicts the oldest entry when full', () => {
    const cache = new ResponseCache(60_000, 2, () => 0);
    cache.set('a', '1');
    cache.set('b', '2');
    cache.set('c', '3');

    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(2);
  });

  it('derives distinct keys for differently split content', () => {
    expect(ResponseCache.keyFor('ab', 'c')).not.toBe(ResponseCache.keyFor('a', 'bc'));
    expect(ResponseCache.keyFor('x')).toMatch(/^[0-9a-f]{64}$/);
  });
});
