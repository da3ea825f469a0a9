import { errorMessage } from '../../errors.js';
import { fetchWithTimeout, type FetchLike } from '../../utils/http.js';

export interface RunLogOptions {
  slackWebhookUrl?: string;
  fetchImpl?: FetchLike;
}

async function notifySlackFailure(
  functionName: string,
  errorMsg: string,
  webhookUrl: string,
  fetchImpl: FetchLike,
): Promise<void> {
  const text =
    `:warning: *Autoposter run failed* · \`${functionName}\`\n` +
    `Error: ${errorMsg}`;

  try {
    const res = await fetchWithTimeout(
      webhookUrl,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ text }),
      },
      10_000,
      fetchImpl,
    );
    if (!res.ok) console.error(`[runLogger] Slack notification failed: ${res.status}`);
  } catch (err) {
    console.error('[runLogger] Failed to send Slack failure notification:', err);
  }
}

/**
 * Wraps a run with start/finish logging and its duration.
 * Failures are logged, reported to Slack when a webhook is configured,
 * and rethrown.
 */
export async function withRunLog<T>(
  functionName: string,
  fn: () => Promise<T>,
  options: RunLogOptions = {},
): Promise<T> {
  const startTime = Date.now();
  console.log(`[${functionName}] Started at ${new Date(startTime).toISOString()}`);

  try {
    const result = await fn();
    console.log(`[${functionName}] Completed in ${Date.now() - startTime}ms`);
    return result;
  } catch (err) {
    const errorMsg = errorMessage(err);
    console.error(`[${functionName}] Failed after ${Date.now() - startTime}ms: ${errorMsg}`);
    if (options.slackWebhookUrl) {
      await notifySlackFailure(functionName, errorMsg, options.slackWebhookUrl, options.fetchImpl ?? fetch);
    }
    throw err;
  }
}
