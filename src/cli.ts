import { loadConfig, type AppConfig } from './config.js';
import { ConfigError } from './errors.js';
import { createChatCompletion } from './agents/shared/llm.js';
import { withRunLog } from './agents/shared/runLogger.js';
import { GoogleNewsFeed } from './agents/topicSource.js';
import { loadAuthTokens } from './composer/credentials.js';
import { LinkedInApi, LinkedInPublisher } from './composer/adapters/linkedin.js';
import { runPipeline, type PipelineDeps, type RunOutcome } from './pipeline.js';
import { startScheduler, type ScheduledRun } from './scheduler.js';
import type { AuthTokens } from './composer/types.js';

export interface CliFlags {
  dryRun: boolean;
  schedule: boolean;
}

export function parseArgs(argv: string[]): CliFlags {
  return {
    dryRun: argv.includes('--dry-run') || argv.includes('-d'),
    schedule: argv.includes('--schedule'),
  };
}

/**
 * Credential checks that must pass before any network call.
 * Returns the LinkedIn tokens, or null for a dry run without them.
 */
export async function preflight(config: AppConfig, flags: CliFlags): Promise<AuthTokens | null> {
  if (!config.llm.apiKey) {
    const keyName = config.llm.provider === 'groq' ? 'GROQ_API_KEY' : 'ANTHROPIC_API_KEY';
    throw new ConfigError(`${keyName} environment variable not set.`);
  }

  const tokens = await loadAuthTokens(config.linkedin);
  if (!tokens && !flags.dryRun) {
    throw new ConfigError(
      `LinkedIn tokens not found. Set LINKEDIN_ACCESS_TOKEN (and optionally LINKEDIN_PERSON_URN) ` +
        `or provide ${config.linkedin.tokenFile} from the OAuth flow.`,
    );
  }
  return tokens;
}

export function buildDeps(config: AppConfig, tokens: AuthTokens | null, flags: CliFlags): PipelineDeps {
  return {
    feed: new GoogleNewsFeed(config.search),
    llm: createChatCompletion(config.llm),
    publisher:
      tokens && !flags.dryRun ? new LinkedInPublisher(tokens, new LinkedInApi(config.linkedin)) : undefined,
    prompts: config.prompts,
    queries: config.search.queries,
    maxQueries: config.search.maxQueries,
    maxCandidates: config.maxCandidates,
    historyFile: config.historyFile,
    historyLimit: config.historyLimit,
  };
}

/** Returns the process exit code. */
export async function main(argv: string[], env: Record<string, string | undefined> = process.env): Promise<number> {
  const flags = parseArgs(argv);
  console.log(`[autoposter] ${new Date().toISOString()}${flags.dryRun ? ' (dry run)' : ''}`);

  let run: () => Promise<RunOutcome>;
  let scheduled: ScheduledRun | undefined;
  try {
    const config = loadConfig(env);
    const tokens = await preflight(config, flags);
    const deps = buildDeps(config, tokens, flags);
    run = () =>
      withRunLog('autoposter', () => runPipeline(deps, { dryRun: flags.dryRun }), {
        slackWebhookUrl: config.slackWebhookUrl,
      });

    if (flags.schedule) {
      if (!config.schedule.cron) throw new ConfigError('--schedule needs SCHEDULE_CRON to be set.');
      scheduled = startScheduler(config.schedule.cron, config.schedule.timezone, run);
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[autoposter] ERROR: ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (scheduled) {
    const task = scheduled;
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        console.log(`[autoposter] ${signal} received, stopping scheduler.`);
        task.stop();
      });
    }
    return 0;
  }

  try {
    const outcome = await run();
    return outcome.status === 'failed' ? 1 : 0;
  } catch (err) {
    console.error('[autoposter] Run failed:', err instanceof Error ? err.stack ?? err.message : err);
    return 1;
  }
}
