import { describe, it, expect } from 'vitest';
import { LlmJudgeEvaluator, parseVerdict } from '../evaluation/LlmJudgeEvaluator.js';
import { createMockProvider, textResponse } from './helpers/fixtures.js';

describe('parseVerdict', () => {
  it('reads a JSON verdict wrapped in prose or a code fence', () => {
    const content = 'Here is my rating:\n```json\n' +
      '{"overall": 8, "relevance": 9, "accuracy": "7", "completeness": 8, "clarity": 9, "helpfulness": 8}\n```';

    expect(parseVerdict(content)).toEqual({
      overall: 8,
      relevance: 9,
      accuracy: 7,
      completeness: 8,
      clarity: 9,
      helpfulness: 8,
    });
  });

  it('rejects missing fields, out-of-range scores and non-JSON replies', () => {
    expect(parseVerdict('{"overall": 8}')).toBeNull();
    expect(parseVerdict(
      '{"overall": 11, "relevance": 9, "accuracy": 7, "completeness": 8, "clarity": 9, "helpfulness": 8}'
    )).toBeNull();
    expect(parseVerdict('I would rate this highly.')).toBeNull();
  });
});

describe('LlmJudgeEvaluator', () => {
  it('asks the judge model without tools', async () => {
    const provider = createMockProvider();
    provider.runWithTools.mockResolvedValueOnce(textResponse('not a verdict'));
    const evaluator = new LlmJudgeEvaluator({ provider, model: 'judge-model' });

    await evaluator.evaluate({ query: 'hello', response: 'Hi!', handlersUsed: [], sessionId: 'session_a' });

    const request = provider.runWithTools.mock.calls[0]?.[0];
    expect(request?.model).toBe('judge-model');
    expect(request?.tools).toBeUndefined();
    expect(request?.input[1]).toEqual({
      role: 'user',
      content: 'Customer query:\nhello\n\nAssistant reply:\nHi!',
    });
  });
});
