import { renderTemplate, type PromptSet } from '../prompts.js';
import type { TopicDecision } from '../composer/types.js';
import type { ChatCompletion } from './shared/llm.js';

export const GENERATION_TEMPERATURE = 0.8;

/** Trims the reply and drops one pair of straight quotes wrapping all of it. */
export function cleanPostText(raw: string): string {
  const text = raw.trim();
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    return text.slice(1, -1);
  }
  return text;
}

export async function generatePost(
  llm: ChatCompletion,
  prompts: PromptSet,
  decision: TopicDecision,
): Promise<string> {
  const userPrompt = renderTemplate(prompts.postGenerator, {
    topic: decision.selected_topic,
    angle: decision.post_angle,
    post_type: decision.post_type,
  });

  console.log('[content-generator] Generating post...');
  const raw = await llm.complete(
    [
      { role: 'system', content: prompts.system },
      { role: 'user', content: userPrompt },
    ],
    GENERATION_TEMPERATURE,
  );

  const post = cleanPostText(raw);
  const words = post.split(/\s+/).filter(Boolean).length;
  console.log(`[content-generator] Generated ${words} words, ${post.length} chars`);
  return post;
}
