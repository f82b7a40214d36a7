/**
 * Unit Tests: Decision Layer - Intent Classification
 *
 * Covers the pattern classifier (identifiers, rules, slots, coreference,
 * threshold) and the IntentAnalyzer's optional LLM fallback.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import type { ConversationTurn, Query } from '@shared/schema';

const mockOpenAICreate = vi.fn();

vi.mock('openai', () => {
  return {
    OpenAI: class MockOpenAI {
      chat = {
        completions: {
          create: mockOpenAICreate
        }
      };
    }
  };
});

import {
  classifyIntent,
  DEFAULT_CONFIDENCE_POLICY,
  GENERIC_CLARIFICATION,
  IntentAnalyzer,
  type IntentInterpreter,
} from '../decisionLayer';

function makeQuery(text: string): Query {
  return Object.freeze({ text, userId: 'user-1', conversationId: null, timestamp: new Date('2026-01-05T10:00:00Z') });
}

function assistantTurn(parameters: Record<string, unknown>, intentType: ConversationTurn['intentType'] = null): ConversationTurn {
  return { role: 'assistant', content: 'Earlier answer', intentType, parameters, createdAt: new Date('2026-01-05T09:00:00Z') };
}

function userTurn(content: string): ConversationTurn {
  return { role: 'user', content, createdAt: new Date('2026-01-05T09:00:00Z') };
}

describe('classifyIntent - pattern rules', () => {
  it('classifies a topic search with keywords and the default limit', () => {
    const result = classifyIntent(makeQuery('Find papers about deep learning'));

    expect(result.intent).toEqual({
      type: 'search_papers',
      confidence: 0.9,
      parameters: { keywords: ['deep learning'], limit: 6 },
    });
    expect(result.detectionMethod).toBe('pattern');
    expect(result.matchedRule).toBe('topical_paper_search');
    expect(result.reason).toBe('search_papers matched');
    expect(result.clarificationQuestions).toEqual([]);
  });

  it('extracts a year bound and several keywords', () => {
    const since = classifyIntent(makeQuery('Find papers on graph neural networks since 2020'));
    expect(since.intent).toEqual({
      type: 'search_papers',
      confidence: 0.9,
      parameters: { keywords: ['graph neural networks'], limit: 6, yearFrom: 2020 },
    });

    const several = classifyIntent(makeQuery('Search for papers about transformers, attention and memory'));
    expect(several.intent.type).toBe('search_papers');
    expect(several.intent.parameters).toEqual({ keywords: ['transformers', 'attention', 'memory'], limit: 6 });
  });

  it('keeps a topical paper search whose topic names another intent', () => {
    const citations = classifyIntent(makeQuery('Find papers about citation analysis'));
    expect(citations.intent).toEqual({
      type: 'search_papers',
      confidence: 0.9,
      parameters: { keywords: ['citation analysis'], limit: 6 },
    });

    const authors = classifyIntent(makeQuery('Find papers about author disambiguation'));
    expect(authors.intent).toEqual({
      type: 'search_papers',
      confidence: 0.9,
      parameters: { keywords: ['author disambiguation'], limit: 6 },
    });

    const trends = classifyIntent(makeQuery('Show me papers about emerging trends in NLP'));
    expect(trends.intent.type).toBe('search_papers');
    expect(trends.intent.parameters).toEqual({ keywords: ['emerging trends in NLP'], limit: 6 });
    expect(trends.matchedRule).toBe('topical_paper_search');
  });

  it('classifies an author question by name', () => {
    const result = classifyIntent(makeQuery('Who is Geoffrey Hinton?'));

    expect(result.intent).toEqual({
      type: 'author_info',
      confidence: 0.75,
      parameters: { authorName: 'Geoffrey Hinton', limit: 6 },
    });
    expect(result.matchedRule).toBe('author_noun');
  });

  it('classifies a trend question with field and time range', () => {
    const result = classifyIntent(makeQuery('Show me trending papers in machine learning over the last 2 years'));

    expect(result.intent).toEqual({
      type: 'trend_analysis',
      confidence: 0.9,
      parameters: { field: 'machine learning', timeRange: '2years' },
    });
    expect(result.matchedRule).toBe('trend_request');
  });

  it('classifies a keyword question with an explicit limit', () => {
    const result = classifyIntent(makeQuery('What are the top 10 keywords in computer vision?'));

    expect(result.intent).toEqual({
      type: 'keyword_analysis',
      confidence: 0.9,
      parameters: { field: 'computer vision', limit: 10 },
    });
  });

  it('returns unknown with confidence 0 when nothing matches', () => {
    const result = classifyIntent(makeQuery('hello there'));

    expect(result.intent).toEqual({ type: 'unknown', confidence: 0, parameters: {} });
    expect(result.detectionMethod).toBe('default');
    expect(result.reason).toBe('no pattern matched');
    expect(result.clarificationQuestions).toEqual([...GENERIC_CLARIFICATION]);
  });

  it('is deterministic for the same input', () => {
    const turns = [assistantTurn({ authorName: 'Ada Lovelace' })];
    const first = classifyIntent(makeQuery('Show me his papers'), turns);
    const second = classifyIntent(makeQuery('Show me his papers'), turns);

    expect(second).toEqual(first);
  });

  it('returns frozen intents', () => {
    const { intent } = classifyIntent(makeQuery('Find papers about deep learning'));

    expect(Object.isFrozen(intent)).toBe(true);
    expect(Object.isFrozen(intent.parameters)).toBe(true);
  });
});

describe('classifyIntent - structured identifiers', () => {
  it('routes an arXiv identifier to citation analysis', () => {
    const result = classifyIntent(makeQuery('Analyze citations of 1706.03762 with depth 3'));

    expect(result.intent).toEqual({
      type: 'citation_analysis',
      confidence: 0.95,
      parameters: { paperId: '1706.03762', depth: 3 },
    });
    expect(result.detectionMethod).toBe('identifier');
    expect(result.matchedRule).toBe('identifier:arxiv');
  });

  it('routes a DOI to citation analysis with the default depth', () => {
    const result = classifyIntent(makeQuery('Who cited 10.1038/nature14539?'));

    expect(result.intent).toEqual({
      type: 'citation_analysis',
      confidence: 0.95,
      parameters: { paperId: '10.1038/nature14539', depth: 2 },
    });
    expect(result.matchedRule).toBe('identifier:doi');
  });
});

describe('classifyIntent - missing slots and threshold', () => {
  it('downgrades to unknown and asks for the missing slot', () => {
    const result = classifyIntent(makeQuery('Find papers'));

    expect(result.intent.type).toBe('unknown');
    expect(result.intent.confidence).toBeCloseTo(0.55);
    expect(result.candidateType).toBe('search_papers');
    expect(result.reason).toBe('search_papers is missing required keywords');
    expect(result.clarificationQuestions).toEqual([
      'What topic of papers would you like to search? Please provide more specific keywords.',
    ]);
  });

  it('downgrades a match below the configured threshold', () => {
    const result = classifyIntent(makeQuery('keywords please'), [], { ...DEFAULT_CONFIDENCE_POLICY, threshold: 0.6 });

    expect(result.intent.type).toBe('unknown');
    expect(result.intent.confidence).toBe(0.55);
    expect(result.candidateType).toBe('keyword_analysis');
    expect(result.reason).toBe('keyword_analysis confidence 0.55 is below threshold 0.6');
    expect(result.clarificationQuestions).toEqual([...GENERIC_CLARIFICATION]);
  });

  it('accepts the same cue match at the default threshold', () => {
    const result = classifyIntent(makeQuery('keywords please'));

    expect(result.intent).toEqual({ type: 'keyword_analysis', confidence: 0.55, parameters: { limit: 20 } });
    expect(result.matchedRule).toBe('keyword_cue');
  });
});

describe('classifyIntent - coreference', () => {
  it('resolves an author pronoun from an earlier turn at reduced confidence', () => {
    const turns = [
      userTurn('Who is Geoffrey Hinton?'),
      assistantTurn({ authorName: 'Geoffrey Hinton', limit: 6 }, 'author_info'),
    ];

    const result = classifyIntent(makeQuery('Show me his papers'), turns);

    expect(result.intent.type).toBe('author_info');
    expect(result.intent.parameters).toEqual({ authorName: 'Geoffrey Hinton', limit: 6 });
    expect(result.intent.confidence).toBeCloseTo(0.675);
    expect(result.resolvedFromContext).toEqual(['authorName']);
    expect(result.reason).toBe('author_info with authorName resolved from earlier turns');
  });

  it('resolves "this paper" to the paper discussed earlier', () => {
    const turns = [assistantTurn({ paperTitle: 'Attention Is All You Need', paperId: 'p-1' }, 'search_papers')];

    const result = classifyIntent(makeQuery('Who cites this paper?'), turns);

    expect(result.intent.type).toBe('citation_analysis');
    expect(result.intent.parameters).toEqual({ paperId: 'p-1', paperTitle: 'Attention Is All You Need', depth: 2 });
    expect(result.intent.confidence).toBeCloseTo(0.81);
    expect(result.resolvedFromContext).toEqual(['paper']);
  });

  it('prefers the most recent turn that carries the value', () => {
    const turns = [
      assistantTurn({ authorName: 'Ada Lovelace' }),
      assistantTurn({ authorName: 'Alan Turing' }),
      userTurn('thanks'),
    ];

    const result = classifyIntent(makeQuery('Show me his papers'), turns);

    expect(result.intent.parameters).toEqual({ authorName: 'Alan Turing', limit: 6 });
  });

  it('ignores turns outside the context window', () => {
    const turns = [
      assistantTurn({ authorName: 'Geoffrey Hinton' }),
      userTurn('Find papers about deep learning'),
      assistantTurn({ keywords: ['deep learning'] }),
    ];

    const result = classifyIntent(makeQuery('Show me his papers'), turns, { ...DEFAULT_CONFIDENCE_POLICY, contextWindow: 2 });

    expect(result.intent.type).toBe('unknown');
    expect(result.intent.confidence).toBeCloseTo(0.4);
    expect(result.candidateType).toBe('author_info');
    expect(result.resolvedFromContext).toEqual([]);
  });
});

describe('IntentAnalyzer', () => {
  let logSpy: MockInstance<typeof console.log>;
  let warnSpy: MockInstance<typeof console.warn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
  });

  it('does not call the interpreter when the fallback is disabled', async () => {
    const interpreter = vi.fn<IntentInterpreter>();
    const analyzer = new IntentAnalyzer({ interpreter });

    const result = await analyzer.analyze(makeQuery('Tell me something interesting'), []);

    expect(result.intent.type).toBe('unknown');
    expect(interpreter).not.toHaveBeenCalled();
  });

  it('does not call the interpreter when a pattern matched', async () => {
    const interpreter = vi.fn<IntentInterpreter>();
    const analyzer = new IntentAnalyzer({ interpreter, llmFallback: true });

    const result = await analyzer.analyze(makeQuery('Find papers about deep learning'), []);

    expect(result.intent.type).toBe('search_papers');
    expect(interpreter).not.toHaveBeenCalled();
  });

  it('accepts an LLM proposal that passes slot validation and threshold', async () => {
    const interpreter = vi.fn<IntentInterpreter>().mockResolvedValue({
      intentType: 'search_papers',
      confidence: 0.8,
      keywords: ['graph neural networks'],
    });
    const analyzer = new IntentAnalyzer({ interpreter, llmFallback: true });

    const result = await analyzer.analyze(makeQuery('Tell me something interesting'), []);

    expect(result.intent).toEqual({
      type: 'search_papers',
      confidence: 0.8,
      parameters: { keywords: ['graph neural networks'], limit: 6 },
    });
    expect(result.detectionMethod).toBe('llm');
    expect(result.matchedRule).toBe('llm_fallback');
  });

  it('passes only the context window to the interpreter', async () => {
    const interpreter = vi.fn<IntentInterpreter>().mockResolvedValue({ intentType: 'unknown', confidence: 0.2 });
    const analyzer = new IntentAnalyzer({
      interpreter,
      llmFallback: true,
      policy: { ...DEFAULT_CONFIDENCE_POLICY, contextWindow: 1 },
    });
    const turns = [userTurn('first'), userTurn('second')];

    await analyzer.analyze(makeQuery('Tell me something interesting'), turns);

    expect(interpreter).toHaveBeenCalledWith('Tell me something interesting', [turns[1]]);
  });

  it('keeps the pattern result when the LLM proposal is below threshold', async () => {
    const interpreter = vi.fn<IntentInterpreter>().mockResolvedValue({
      intentType: 'author_info',
      confidence: 0.3,
      authorName: 'Grace Hopper',
    });
    const analyzer = new IntentAnalyzer({ interpreter, llmFallback: true });

    const result = await analyzer.analyze(makeQuery('Tell me something interesting'), []);

    expect(result.intent).toEqual({ type: 'unknown', confidence: 0, parameters: {} });
    expect(result.detectionMethod).toBe('default');
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('keeps the pattern result when the LLM proposal misses a required slot', async () => {
    const interpreter = vi.fn<IntentInterpreter>().mockResolvedValue({ intentType: 'author_info', confidence: 0.9 });
    const analyzer = new IntentAnalyzer({ interpreter, llmFallback: true });

    const result = await analyzer.analyze(makeQuery('Tell me something interesting'), []);

    expect(result.intent.type).toBe('unknown');
    expect(result.detectionMethod).toBe('default');
  });

  it('keeps the pattern result when the interpreter fails', async () => {
    const interpreter = vi.fn<IntentInterpreter>().mockRejectedValue(new Error('rate limited'));
    const analyzer = new IntentAnalyzer({ interpreter, llmFallback: true });

    const result = await analyzer.analyze(makeQuery('Tell me something interesting'), []);

    expect(result.intent.type).toBe('unknown');
    expect(warnSpy).toHaveBeenCalledWith('[Intent] LLM fallback did not resolve the question: rate limited');
  });
});

describe('interpretQuery', () => {
  const originalKey = process.env.OPENAI_API_KEY;

  beforeEach(() => {
    vi.resetModules();
    mockOpenAICreate.mockReset();
    process.env.OPENAI_API_KEY = 'test-secret';
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    if (originalKey === undefined) delete process.env.OPENAI_API_KEY;
    else process.env.OPENAI_API_KEY = originalKey;
    vi.restoreAllMocks();
  });

  function toolCallResponse(args: string) {
    return {
      choices: [{
        message: {
          tool_calls: [{ id: 'call-1', type: 'function', function: { name: 'classify_research_intent', arguments: args } }],
        },
      }],
    };
  }

  it('returns the validated proposal from the forced tool call', async () => {
    mockOpenAICreate.mockResolvedValue(toolCallResponse(JSON.stringify({
      intentType: 'trend_analysis',
      confidence: 0.7,
      field: 'robotics',
      timeRange: '5years',
    })));
    const { interpretQuery } = await import('../decisionLayer/llmInterpretation');

    const proposal = await interpretQuery('What is going on in robotics lately?', [], 'test-model');

    expect(proposal).toEqual({ intentType: 'trend_analysis', confidence: 0.7, field: 'robotics', timeRange: '5years' });
    const request = mockOpenAICreate.mock.calls[0][0];
    expect(request.model).toBe('test-model');
    expect(request.tool_choice).toEqual({ type: 'function', function: { name: 'classify_research_intent' } });
    expect(request.messages[1].content).toBe('Question: What is going on in robotics lately?');
  });

  it('includes earlier turns in the user message', async () => {
    mockOpenAICreate.mockResolvedValue(toolCallResponse(JSON.stringify({ intentType: 'unknown', confidence: 0.1 })));
    const { interpretQuery } = await import('../decisionLayer/llmInterpretation');

    await interpretQuery('and his students?', [assistantTurn({ authorName: 'Ada Lovelace' })], 'test-model');

    const request = mockOpenAICreate.mock.calls[0][0];
    expect(request.messages[1].content).toBe(
      'Earlier turns:\nassistant: Earlier answer {"authorName":"Ada Lovelace"}\n\nQuestion: and his students?',
    );
  });

  it('rejects a response without a tool call', async () => {
    mockOpenAICreate.mockResolvedValue({ choices: [{ message: { content: 'search_papers' } }] });
    const { interpretQuery } = await import('../decisionLayer/llmInterpretation');

    await expect(interpretQuery('anything', [], 'test-model')).rejects.toThrow('LLM returned no classification');
  });

  it('rejects arguments that do not match the proposal shape', async () => {
    mockOpenAICreate.mockResolvedValue(toolCallResponse(JSON.stringify({ intentType: 'summarize', confidence: 2 })));
    const { interpretQuery } = await import('../decisionLayer/llmInterpretation');

    await expect(interpretQuery('anything', [], 'test-model')).rejects.toThrow(
      'LLM classification did not match the expected shape',
    );
  });
});
