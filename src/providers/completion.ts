/**
 * Completion Provider
 *
 * The single seam between the answer pipeline and a chat model.
 * Every backend (Groq, Anthropic, OpenAI, Ollama) is an AI SDK
 * LanguageModel wrapped in this interface, so tests can swap in a fake.
 */

import { generateText, type LanguageModel } from 'ai';

/** Supported LLM provider types */
export type ProviderType = 'anthropic' | 'openai' | 'ollama' | 'openai-compatible';

export interface CompletionOptions {
  /** System prompt sent ahead of the user message */
  system?: string;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Turns one prompt into one answer.
 */
export interface CompletionProvider {
  readonly name: ProviderType;
  readonly model: string;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * CompletionProvider backed by an AI SDK language model.
 */
export class LanguageModelCompletionProvider implements CompletionProvider {
  constructor(
    readonly name: ProviderType,
    readonly model: string,
    private readonly languageModel: LanguageModel,
    private readonly defaults: CompletionOptions = {}
  ) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const { text } = await generateText({
      model: this.languageModel,
      system: options.system ?? this.defaults.system,
      prompt,
      temperature: options.temperature ?? this.defaults.temperature,
      maxTokens: options.maxTokens ?? this.defaults.maxTokens,
    });
    return text.trim();
  }
}
