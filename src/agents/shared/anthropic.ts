import Anthropic from '@anthropic-ai/sdk';
import { LlmTransportError } from '../../errors.js';
import type { LlmConfig } from '../../config.js';
import type { ChatCompletion, ChatMessage } from './llm.js';

/** The slice of the SDK client this adapter calls. */
export interface MessagesClient {
  messages: {
    create(params: {
      model: string;
      max_tokens: number;
      temperature: number;
      system?: string;
      messages: { role: 'user' | 'assistant'; content: string }[];
    }): Promise<{ content: { type: string; text?: string }[] }>;
  };
}

function isTurn(message: ChatMessage): message is ChatMessage & { role: 'user' | 'assistant' } {
  return message.role !== 'system';
}

export class AnthropicChatCompletion implements ChatCompletion {
  private readonly client: MessagesClient;

  constructor(
    private readonly config: Pick<LlmConfig, 'apiKey' | 'apiUrl' | 'model' | 'maxTokens' | 'timeoutMs'>,
    client?: MessagesClient,
  ) {
    this.client =
      client ??
      new Anthropic({
        apiKey: config.apiKey,
        baseURL: config.apiUrl,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  async complete(messages: ChatMessage[], temperature: number): Promise<string> {
    const system = messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');

    try {
      const response = await this.client.messages.create({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature,
        ...(system ? { system } : {}),
        messages: messages.filter(isTurn).map(({ role, content }) => ({ role, content })),
      });

      const block = response.content.find((b) => b.type === 'text');
      return block?.text ?? '';
    } catch (err) {
      if (err instanceof Anthropic.APIError) {
        throw new LlmTransportError(err.status ?? 0, err.message, 'Anthropic');
      }
      throw err;
    }
  }
}
