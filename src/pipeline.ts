import { collectCandidates, type SearchFeed } from './agents/topicSource.js';
import { shortlistCandidates } from './agents/shortlist.js';
import { selectTopic } from './agents/topicSelector.js';
import { generatePost } from './agents/contentGenerator.js';
import { appendHistory, buildHistoryEntry, loadHistory, recentTopics } from './composer/history.js';
import { ConfigError, errorMessage } from './errors.js';
import type { ChatCompletion } from './agents/shared/llm.js';
import type { PromptSet } from './prompts.js';
import type { PlatformAdapter, PublishResult, TopicDecision } from './composer/types.js';

export interface PipelineDeps {
  feed: SearchFeed;
  llm: ChatCompletion;
  /** Not needed for dry runs. */
  publisher?: PlatformAdapter;
  prompts: PromptSet;
  queries: string[];
  maxQueries: number;
  maxCandidates: number;
  historyFile: string;
  historyLimit: number;
}

export interface RunOptions {
  dryRun: boolean;
}

export type RunOutcome =
  | { status: 'dry-run'; decision: TopicDecision; content: string }
  | { status: 'published' | 'failed'; decision: TopicDecision; content: string; result: PublishResult };

const RULE = '='.repeat(60);

/**
 * search → shortlist → select → generate → publish → history.
 * Each stage finishes before the next one starts.
 */
export async function runPipeline(deps: PipelineDeps, { dryRun }: RunOptions): Promise<RunOutcome> {
  if (!dryRun && !deps.publisher) {
    throw new ConfigError('A publisher is required unless running with --dry-run.');
  }

  console.log('[pipeline] Step 1/4: searching for trending topics');
  const raw = await collectCandidates(deps.feed, deps.queries, deps.maxQueries);
  const candidates = shortlistCandidates(raw, deps.maxCandidates);
  console.log(`[pipeline] ${candidates.length} candidate topic(s)`);

  console.log('[pipeline] Step 2/4: picking a topic');
  const history = await loadHistory(deps.historyFile);
  const decision = await selectTopic(deps.llm, deps.prompts, candidates, recentTopics(history));

  console.log('[pipeline] Step 3/4: writing the post');
  const content = await generatePost(deps.llm, deps.prompts, decision);

  if (dryRun || !deps.publisher) {
    console.log('[pipeline] Dry run: not publishing.');
    console.log(RULE);
    console.log('FINAL POST CONTENT:');
    console.log(RULE);
    console.log(content);
    console.log(RULE);
    return { status: 'dry-run', decision, content };
  }

  console.log('[pipeline] Step 4/4: publishing');
  const result = await deps.publisher.publish(content);

  if (!result.success) {
    console.error(`[pipeline] Publish failed: ${result.error}`);
    return { status: 'failed', decision, content, result };
  }

  try {
    await appendHistory(
      deps.historyFile,
      buildHistoryEntry(decision.selected_topic, content, result.postId),
      deps.historyLimit,
    );
  } catch (err) {
    console.error(`[pipeline] Post is live but the history write failed: ${errorMessage(err)}`);
  }

  console.log(`[pipeline] Published${result.url ? `: ${result.url}` : '.'}`);
  return { status: 'published', decision, content, result };
}
