import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SELECTION_TEMPERATURE, selectTopic } from './topicSelector.js';
import { DEFAULT_PROMPTS } from '../prompts.js';
import { LlmTransportError } from '../errors.js';
import { ScriptedChat, candidate } from '../test/fakes.js';

const candidates = [candidate('Compose 1.7 released'), candidate('Kotlin 2.1 is out')];

const decision = {
  selected_topic: 'Kotlin 2.1 is out',
  why_selected: 'Fresh release with guard conditions',
  post_angle: 'What guard conditions change in everyday when-expressions',
  post_type: 'technical_tip',
};

describe('selectTopic', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends the persona and the numbered candidates', async () => {
    const llm = new ScriptedChat([JSON.stringify(decision)]);

    await selectTopic(llm, DEFAULT_PROMPTS, candidates, ['Older topic']);

    expect(llm.calls).toHaveLength(1);
    const [{ messages, temperature }] = llm.calls;
    expect(temperature).toBe(SELECTION_TEMPERATURE);
    expect(messages[0]).toEqual({ role: 'system', content: DEFAULT_PROMPTS.system });
    expect(messages[1].role).toBe('user');
    expect(messages[1].content).toContain('\n1. **Compose 1.7 released**\n   About Compose 1.7 released\n   Source: Test Source\n');
    expect(messages[1].content).toContain('\n2. **Kotlin 2.1 is out**\n');
    expect(messages[1].content).toContain('- Older topic');
  });

  it('returns the decision from a JSON reply', async () => {
    const llm = new ScriptedChat([JSON.stringify(decision)]);

    expect(await selectTopic(llm, DEFAULT_PROMPTS, candidates)).toEqual(decision);
  });

  it('reads a decision wrapped in a json code fence', async () => {
    const llm = new ScriptedChat(['```json\n' + JSON.stringify(decision, null, 2) + '\n```']);

    expect(await selectTopic(llm, DEFAULT_PROMPTS, candidates)).toEqual(decision);
  });

  it('falls back to the first candidate when the reply is not JSON', async () => {
    const llm = new ScriptedChat(['not json']);

    expect(await selectTopic(llm, DEFAULT_PROMPTS, candidates)).toEqual({
      selected_topic: 'Compose 1.7 released',
      why_selected: 'First trending topic',
      post_angle: 'Share thoughts on this trend',
      post_type: 'trend_analysis',
    });
  });

  it('falls back when required fields are missing', async () => {
    const llm = new ScriptedChat(['{"why_selected": "no topic here"}']);

    const result = await selectTopic(llm, DEFAULT_PROMPTS, candidates);

    expect(result.selected_topic).toBe('Compose 1.7 released');
    expect(result.post_type).toBe('trend_analysis');
  });

  it('maps an unknown post_type to trend_analysis', async () => {
    const llm = new ScriptedChat([JSON.stringify({ ...decision, post_type: 'listicle' })]);

    expect((await selectTopic(llm, DEFAULT_PROMPTS, candidates)).post_type).toBe('trend_analysis');
  });

  it('propagates transport failures', async () => {
    const llm = {
      complete: vi.fn(async () => {
        throw new LlmTransportError(500, 'upstream down');
      }),
    };

    await expect(selectTopic(llm, DEFAULT_PROMPTS, candidates)).rejects.toBeInstanceOf(LlmTransportError);
  });
});
