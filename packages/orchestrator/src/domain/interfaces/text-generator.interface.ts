export interface TextGenerator {
  /**
   * Returns the model's completion for a prompt. Rejects on timeout or
   * provider failure; callers own the fallback.
   */
  generate(prompt: string, systemPrompt?: string): Promise<string>;
}
