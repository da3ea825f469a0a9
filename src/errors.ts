/**
 * Raised when the chat-completion endpoint answers with anything but success.
 * Callers never retry; the run ends.
 */
export class LlmTransportError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, provider = 'LLM') {
    super(`${provider} API error: ${status} - ${body}`);
    this.name = 'LlmTransportError';
    this.status = status;
    this.body = body;
  }
}

/** Missing credentials or unusable settings, detected before any network call. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
