import { z } from 'zod';
import { POST_TYPES, type TopicCandidate, type TopicDecision } from '../composer/types.js';
import { formatCandidates, formatRecentTopics, renderTemplate, type PromptSet } from '../prompts.js';
import { parseJsonReply } from './shared/jsonReply.js';
import type { ChatCompletion } from './shared/llm.js';

export const SELECTION_TEMPERATURE = 0.5;

export const topicDecisionSchema = z.object({
  selected_topic: z.string().min(1),
  why_selected: z.string().default(''),
  post_angle: z.string().min(1),
  post_type: z.enum(POST_TYPES).catch('trend_analysis'),
});

export function fallbackDecision(candidates: TopicCandidate[]): TopicDecision {
  return {
    selected_topic: candidates[0]?.title ?? '',
    why_selected: 'First trending topic',
    post_angle: 'Share thoughts on this trend',
    post_type: 'trend_analysis',
  };
}

/**
 * Asks the model to pick one candidate and an angle for it.
 *
 * A reply that is not a usable decision falls back to the first candidate,
 * so a chatty model never stops the run. Transport errors still propagate.
 */
export async function selectTopic(
  llm: ChatCompletion,
  prompts: PromptSet,
  candidates: TopicCandidate[],
  recentTopics: string[] = [],
): Promise<TopicDecision> {
  const userPrompt = renderTemplate(prompts.topicPicker, {
    topics: formatCandidates(candidates),
    recent_topics: formatRecentTopics(recentTopics),
  });

  console.log(`[topic-selector] Asking the model to pick from ${candidates.length} topic(s)...`);
  const reply = await llm.complete(
    [
      { role: 'system', content: prompts.system },
      { role: 'user', content: userPrompt },
    ],
    SELECTION_TEMPERATURE,
  );

  const decision = parseJsonReply(reply, topicDecisionSchema);
  if (!decision) {
    console.warn(`[topic-selector] Could not parse decision, using first topic. Reply: ${reply.slice(0, 200)}`);
    return fallbackDecision(candidates);
  }

  console.log(`[topic-selector] Selected: ${decision.selected_topic.slice(0, 50)}`);
  console.log(`[topic-selector] Angle: ${decision.post_angle}`);
  return decision;
}
