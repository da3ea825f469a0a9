import type { LlmConfig } from '../../config.js';
import { ConfigError } from '../../errors.js';
import { GroqChatCompletion } from './groq.js';
import { AnthropicChatCompletion } from './anthropic.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * One request, one reply. Implementations raise LlmTransportError on a
 * failed call and never retry.
 */
export interface ChatCompletion {
  complete(messages: ChatMessage[], temperature: number): Promise<string>;
}

export function createChatCompletion(config: LlmConfig): ChatCompletion {
  if (!config.apiKey) {
    throw new ConfigError(`No API key configured for LLM provider "${config.provider}".`);
  }

  console.log(`[llm] Using ${config.provider} (${config.model})`);

  switch (config.provider) {
    case 'anthropic':
      return new AnthropicChatCompletion(config);
    case 'groq':
      return new GroqChatCompletion(config);
  }
}
