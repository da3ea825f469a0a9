import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { parseJsonReply, stripCodeFences } from './jsonReply.js';

const schema = z.object({ answer: z.number() });

describe('stripCodeFences', () => {
  it('removes a json-tagged fence', () => {
    expect(stripCodeFences('```json\n{"answer": 42}\n```')).toBe('{"answer": 42}');
  });

  it('removes an untagged fence', () => {
    expect(stripCodeFences('```\n{"answer": 42}\n```')).toBe('{"answer": 42}');
  });

  it('leaves unfenced text alone apart from whitespace', () => {
    expect(stripCodeFences('  {"answer": 42}\n')).toBe('{"answer": 42}');
  });
});

describe('parseJsonReply', () => {
  it('parses plain JSON', () => {
    expect(parseJsonReply('{"answer": 42}', schema)).toEqual({ answer: 42 });
  });

  it('parses fenced JSON the same as the inner JSON', () => {
    const inner = '{"answer": 7}';
    expect(parseJsonReply('```json\n' + inner + '\n```', schema)).toEqual(parseJsonReply(inner, schema));
  });

  it('returns null for text that is not JSON', () => {
    expect(parseJsonReply('not json', schema)).toBeNull();
  });

  it('returns null when the JSON does not match the schema', () => {
    expect(parseJsonReply('{"answer": "forty-two"}', schema)).toBeNull();
  });
});
