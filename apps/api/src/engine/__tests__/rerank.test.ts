import { describe, it, expect } from 'vitest';
import { LLMReranker, buildRerankPrompt, createReranker, parseRankedOrder } from '../rerank.js';
import { ScriptedChatModel, makeItem } from '../../__tests__/fakes.js';

const candidates = [
  makeItem('java', 'Java Developer Skills Test', 'Knowledge & Skills', 'Core Java'),
  makeItem('team', 'Teamwork Assessment', 'Personality & Behavior', 'Cooperation'),
  makeItem('verbal', 'Verbal Reasoning Test', 'Cognitive Ability'),
  makeItem('python', 'Python Developer Skills Test', 'Knowledge & Skills', 'Python'),
];

describe('parseRankedOrder', () => {
  it('should read a clean comma-separated answer', () => {
    expect(parseRankedOrder('3,1,4,2', 4)).toEqual([2, 0, 3, 1]);
  });

  it('should drop out-of-range numbers and repeats', () => {
    expect(parseRankedOrder('2, 9, 2, 0, 1', 3)).toEqual([1, 0, 2]);
  });

  it('should append omitted candidates in their original order', () => {
    expect(parseRankedOrder('4', 5)).toEqual([3, 0, 1, 2, 4]);
  });

  it('should fall back to the original order for an answer without numbers', () => {
    expect(parseRankedOrder('I cannot rank these.', 3)).toEqual([0, 1, 2]);
  });

  it('should pick numbers out of free-form text', () => {
    expect(parseRankedOrder('Ranked order:\n1) #2\n2) #3', 3)).toEqual([0, 1, 2]);
    expect(parseRankedOrder('Best: [3], then [1]', 3)).toEqual([2, 0, 1]);
  });

  it('should always return a permutation', () => {
    const replies = ['', '5,5,5', '10, -2, 3', 'one two', '2,1,2,1,3,3'];
    for (const reply of replies) {
      const order = parseRankedOrder(reply, 6);
      expect([...order].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5]);
    }
  });
});

describe('buildRerankPrompt', () => {
  it('should number each candidate with its type and description', () => {
    const prompt = buildRerankPrompt('Java backend engineer', candidates.slice(0, 3));

    expect(prompt).toContain('Job Description/Query:\nJava backend engineer');
    expect(prompt).toContain('1. Java Developer Skills Test (Knowledge & Skills): Core Java');
    expect(prompt).toContain('3. Verbal Reasoning Test (Cognitive Ability): No description');
    expect(prompt).toContain('least relevant (3)');
  });
});

describe('LLMReranker', () => {
  it('should reorder and truncate by the model answer', async () => {
    const model = new ScriptedChatModel('gemini', '4, 1, 2, 3');
    const reranker = new LLMReranker([model]);

    const outcome = await reranker.rankWithDiagnostics('Python developer', candidates, 2);

    expect(outcome.items.map((i) => i.id)).toEqual(['python', 'java']);
    expect(outcome.degraded).toBe(false);
    expect(outcome.provider).toBe('gemini');
    expect(model.prompts).toHaveLength(1);
  });

  it('should try the next model when the first fails', async () => {
    const gemini = new ScriptedChatModel('gemini', new Error('429 quota exceeded'));
    const openai = new ScriptedChatModel('openai', '2,3');
    const reranker = new LLMReranker([gemini, openai]);

    const outcome = await reranker.rankWithDiagnostics('teamwork', candidates, 4);

    expect(outcome.items.map((i) => i.id)).toEqual(['team', 'verbal', 'java', 'python']);
    expect(outcome.provider).toBe('openai');
  });

  it('should keep the input order when every model fails', async () => {
    const reranker = new LLMReranker([
      new ScriptedChatModel('gemini', new Error('timed out')),
      new ScriptedChatModel('openai', new Error('invalid api key')),
    ]);

    const outcome = await reranker.rankWithDiagnostics('anything', candidates, 3);

    expect(outcome.items.map((i) => i.id)).toEqual(['java', 'team', 'verbal']);
    expect(outcome.degraded).toBe(true);
    expect(outcome.reason).toBe('gemini: timed out; openai: invalid api key');
  });

  it('should not call a model for fewer than two candidates', async () => {
    const model = new ScriptedChatModel('gemini', '1');
    const reranker = new LLMReranker([model]);

    expect(await reranker.rerank('query', candidates.slice(0, 1), 5)).toEqual(candidates.slice(0, 1));
    expect(await reranker.rerank('query', [], 5)).toEqual([]);
    expect(model.prompts).toHaveLength(0);
  });

  it('should only return items from the input, each once', async () => {
    const reranker = new LLMReranker([new ScriptedChatModel('openai', '3,3,7,1')]);

    const items = await reranker.rerank('query', candidates, 10);

    expect(items).toHaveLength(candidates.length);
    expect(new Set(items.map((i) => i.id))).toEqual(new Set(candidates.map((c) => c.id)));
  });
});

describe('createReranker', () => {
  it('should return null when disabled', () => {
    expect(createReranker({ enabled: false, gemini: { apiKey: 'test-key', model: 'm' } })).toBeNull();
  });

  it('should return null without credentials', () => {
    expect(createReranker({ enabled: true })).toBeNull();
  });

  it('should prefer Gemini over OpenAI', () => {
    const reranker = createReranker({
      enabled: true,
      gemini: { apiKey: 'test-key', model: 'gemini-1.5-pro' },
      openai: { apiKey: 'test-key', model: 'gpt-4o-mini' },
    });

    expect(reranker?.getProviders()).toEqual(['gemini', 'openai']);
  });
});
