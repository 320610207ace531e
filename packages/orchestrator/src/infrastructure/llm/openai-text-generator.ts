/**
 * @file packages/orchestrator/src/infrastructure/llm/openai-text-generator.ts
 * @description TextGenerator over any OpenAI-compatible chat completions endpoint.
 */

import OpenAI from 'openai';
import type { OrchestratorConfig } from '@ventanilla/shared';
import type { TextGenerator } from '../../domain/interfaces/text-generator.interface.js';
import { ResponseCache } from './response-cache.js';

/** The one SDK call the generator makes. */
export interface ChatCompletionClient {
  create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.ChatCompletion>;
}

export interface GenerationSettings {
  model: string;
  temperature: number;
  maxTokens: number;
}

export class OpenAITextGenerator implements TextGenerator {
  constructor(
    private client: ChatCompletionClient,
    private settings: GenerationSettings,
    private cache: ResponseCache | null = null,
  ) {}

  /**
   * Builds the SDK client from config. The SDK enforces the timeout; retries
   * are disabled so a slow provider fails the turn's fallback path quickly.
   */
  static fromConfig(llm: OrchestratorConfig['llm']): OpenAITextGenerator {
    const openai = new OpenAI({
      apiKey: llm.apiKey ?? 'not-needed',
      baseURL: llm.baseUrl,
      timeout: llm.timeoutSeconds * 1000,
      maxRetries: 0,
    });
    return new OpenAITextGenerator(
      openai.chat.completions,
      { model: llm.model, temperature: llm.temperature, maxTokens: llm.maxTokens },
      llm.cacheTtlSeconds > 0 ? new ResponseCache(llm.cacheTtlSeconds * 1000) : null,
    );
  }

  async generate(prompt: string, systemPrompt?: string): Promise<string> {
    const key = ResponseCache.keyFor(this.settings.model, systemPrompt ?? '', prompt);
    const cached = this.cache?.get(key);
    if (cached !== undefined) return cached;

    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (systemPrompt) messages.push({ role: 'system', content: systemPrompt });
    messages.push({ role: 'user', content: prompt });

    const completion = await this.client.create({
      model: this.settings.model,
      messages,
      temperature: this.settings.temperature,
      max_tokens: this.settings.maxTokens,
      stream: false,
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) throw new Error('No response from model');

    this.cache?.set(key, content);
    return content;
  }
}
