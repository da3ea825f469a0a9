import OpenAI from 'openai';
import { LlmTransportError } from '../../errors.js';
import type { LlmConfig } from '../../config.js';
import type { ChatCompletion, ChatMessage } from './llm.js';

/** The slice of the SDK client this adapter calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: ChatMessage[];
        temperature: number;
        max_tokens: number;
      }): Promise<{ choices: { message: { content: string | null } }[] }>;
    };
  };
}

/** OpenAI-compatible chat-completion endpoint (Groq by default). */
export class GroqChatCompletion implements ChatCompletion {
  private readonly client: ChatCompletionsClient;

  constructor(
    private readonly config: Pick<LlmConfig, 'apiKey' | 'apiUrl' | 'model' | 'maxTokens' | 'timeoutMs'>,
    client?: ChatCompletionsClient,
  ) {
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.apiUrl,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  async complete(messages: ChatMessage[], temperature: number): Promise<string> {
    try {
      const res = await this.client.chat.completions.create({
        model: this.config.model,
        messages,
        temperature,
        max_tokens: this.config.maxTokens,
      });
      return res.choices[0]?.message.content ?? '';
    } catch (err) {
      if (err instanceof OpenAI.APIError) {
        throw new LlmTransportError(err.status ?? 0, err.message, 'Groq');
      }
      throw err;
    }
  }
}
