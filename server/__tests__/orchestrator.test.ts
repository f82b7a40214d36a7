/**
 * Integration Tests: Research Orchestrator
 *
 * Real analyzer, dispatcher, integrator and in-memory storage; only the data
 * service (ScriptedToolClient) and the language model are stubbed.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { ResearchOrchestrator, type DataServiceConnection } from '../assistant/orchestrator';
import type { ProtocolClientHealth } from '../dataService/types';
import { IntentAnalyzer } from '../decisionLayer';
import { ToolDispatcher } from '../mcp';
import { ResponseIntegrator, type LanguageModel } from '../response';
import { MemStorage } from '../storage';
import { QueryCancelledError } from '../utils/errorHandler';
import { ScriptedToolClient, type ScriptedReply } from './helpers/fakeToolClient';

const HEALTH: ProtocolClientHealth = {
  state: 'Ready',
  toolsCount: 8,
  tools: [],
  consecutiveFailures: 0,
  pendingRequests: 0,
};

type FakeConnection = {
  start: Mock<DataServiceConnection['start']>;
  shutdown: Mock<DataServiceConnection['shutdown']>;
  health: DataServiceConnection['health'];
};

function fakeConnection(): FakeConnection {
  return {
    start: vi.fn<DataServiceConnection['start']>(async () => 'Ready'),
    shutdown: vi.fn<DataServiceConnection['shutdown']>(async () => undefined),
    health: () => HEALTH,
  };
}

function setup(replies: Record<string, ScriptedReply>, answer = 'Here is what I found.') {
  const client = new ScriptedToolClient(replies);
  const storage = new MemStorage();
  const generate = vi.fn<LanguageModel['generate']>(async () => answer);
  const connection = fakeConnection();
  const orchestrator = new ResearchOrchestrator({
    analyzer: new IntentAnalyzer(),
    dispatcher: new ToolDispatcher(client),
    integrator: new ResponseIntegrator({ languageModel: { generate } }),
    storage,
    connection,
    contextWindow: 6,
  });
  return { client, storage, generate, connection, orchestrator };
}

const PAPERS_REPLY: ScriptedReply = {
  data: {
    papers: [
      { id: 'p-1', title: 'Deep Residual Learning', authors: ['Kaiming He'], year: 2016, citations: 150000 },
      { id: 'p-2', title: 'Batch Normalization', authors: ['Sergey Ioffe'], year: 2015 },
    ],
    count: 2,
  },
};

describe('ResearchOrchestrator', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('answers a paper search end to end and stores both turns', async () => {
    const { client, storage, generate, orchestrator } = setup(
      { search_papers: PAPERS_REPLY },
      'Two foundational papers are "Deep Residual Learning" and "Batch Normalization".',
    );

    const outcome = await orchestrator.handleQuery({ text: '  Find papers about deep learning ', userId: 'user-1' });

    expect(client.calls.map(c => [c.name, c.args])).toEqual([['search_papers', { query: 'deep learning', limit: 6 }]]);
    expect(generate).toHaveBeenCalledTimes(1);
    expect(outcome.response.message).toBe('Two foundational papers are "Deep Residual Learning" and "Batch Normalization".');
    expect(outcome.response.metadata.intentType).toBe('search_papers');
    expect(outcome.response.metadata.confidence).toBe(0.9);
    expect(outcome.response.metadata.degraded).toBe(false);
    expect(outcome.response.metadata.toolsUsed).toEqual(['search_papers']);

    expect(outcome.conversationId).not.toBeNull();
    const conversation = await storage.getConversation(outcome.conversationId ?? '');
    expect(conversation?.title).toBe('Find papers about deep learning');
    expect(conversation?.userId).toBe('user-1');

    const messages = await storage.getMessages(outcome.conversationId ?? '');
    expect(messages.map(m => [m.role, m.content])).toEqual([
      ['user', 'Find papers about deep learning'],
      ['assistant', 'Two foundational papers are "Deep Residual Learning" and "Batch Normalization".'],
    ]);
    expect(messages[1].intentType).toBe('search_papers');
    expect(messages[1].parameters).toEqual({
      keywords: ['deep learning'],
      limit: 6,
      paperTitle: 'Deep Residual Learning',
      paperId: 'p-1',
    });
  });

  it('resolves "this paper" in a follow-up from the stored conversation', async () => {
    const { client, orchestrator } = setup({
      search_papers: PAPERS_REPLY,
      get_paper_details: { data: { paper: { id: 'p-1', title: 'Deep Residual Learning' } } },
      get_paper_citations: { data: { citations: [] } },
      get_citation_network: { data: { nodes: [], edges: [] } },
    });

    const first = await orchestrator.handleQuery({ text: 'Find papers about deep learning', userId: 'user-1' });
    const second = await orchestrator.handleQuery({
      text: 'Who cites this paper?',
      userId: 'user-1',
      conversationId: first.conversationId,
    });

    expect(second.conversationId).toBe(first.conversationId);
    expect(second.response.metadata.intentType).toBe('citation_analysis');
    expect(second.response.metadata.confidence).toBeCloseTo(0.81);
    expect(client.calls.slice(1).map(c => [c.name, c.args])).toEqual([
      ['get_paper_details', { paper_id: 'p-1' }],
      ['get_paper_citations', { paper_id: 'p-1' }],
      ['get_citation_network', { paper_id: 'p-1', depth: 2 }],
    ]);
  });

  it('resolves a pronoun to the author discussed earlier', async () => {
    const { client, orchestrator } = setup({
      search_authors: { data: { authors: [{ id: 'a-1', name: 'Ada Lovelace' }] } },
      get_author_papers: { data: { papers: [{ title: 'Notes on the Analytical Engine' }] } },
    });

    const first = await orchestrator.handleQuery({ text: 'Who is Ada Lovelace?', userId: 'user-1' });
    await orchestrator.handleQuery({ text: 'Show me her papers', userId: 'user-1', conversationId: first.conversationId });

    const searches = client.calls.filter(c => c.name === 'search_authors');
    expect(searches.map(c => c.args)).toEqual([
      { query: 'Ada Lovelace', limit: 6 },
      { query: 'Ada Lovelace', limit: 6 },
    ]);
  });

  it('uses the turns supplied with the request instead of storage', async () => {
    const { client, storage, orchestrator } = setup({ search_authors: { data: { authors: [] } } });
    const getRecentTurns = vi.spyOn(storage, 'getRecentTurns');

    const outcome = await orchestrator.handleQuery({
      text: 'Show me his papers',
      userId: 'user-1',
      conversationId: 'conv-elsewhere',
      recentTurns: [{
        role: 'assistant',
        content: 'Alan Turing was a mathematician.',
        intentType: 'author_info',
        parameters: { authorName: 'Alan Turing' },
        createdAt: new Date('2026-01-01T00:00:00Z'),
      }],
    });

    expect(getRecentTurns).not.toHaveBeenCalled();
    expect(client.calls[0].args).toEqual({ query: 'Alan Turing', limit: 6 });
    // Unknown conversation ids start a new conversation
    expect(outcome.conversationId).not.toBe('conv-elsewhere');
  });

  it('still answers when the conversation cannot be stored', async () => {
    const { storage, orchestrator } = setup({ search_papers: PAPERS_REPLY });
    vi.spyOn(storage, 'appendTurns').mockRejectedValue(new Error('connection reset'));

    const outcome = await orchestrator.handleQuery({ text: 'Find papers about deep learning', userId: 'user-1' });

    expect(outcome.response.message).toBe('Here is what I found.');
    expect(outcome.conversationId).toBeNull();
  });

  it('answers without context when the conversation cannot be read', async () => {
    const { client, storage, orchestrator } = setup({ search_papers: PAPERS_REPLY });
    const first = await orchestrator.handleQuery({ text: 'Find papers about deep learning', userId: 'user-1' });
    vi.spyOn(storage, 'getRecentTurns').mockRejectedValue(new Error('connection refused'));

    const outcome = await orchestrator.handleQuery({
      text: 'Find papers about robotics',
      userId: 'user-1',
      conversationId: first.conversationId,
    });

    expect(outcome.response.message).toBe('Here is what I found.');
    expect(outcome.response.metadata.intentType).toBe('search_papers');
    expect(client.calls[1].args).toEqual({ query: 'robotics', limit: 6 });
    expect(outcome.conversationId).toBe(first.conversationId);
    expect(console.error).toHaveBeenCalledWith('[Orchestrator] connection refused', expect.any(String));
  });

  describe('cancellation', () => {
    it('stops before classification when already aborted', async () => {
      const { client, storage, orchestrator } = setup({ search_papers: PAPERS_REPLY });
      const createConversation = vi.spyOn(storage, 'createConversation');
      const controller = new AbortController();
      controller.abort();

      await expect(
        orchestrator.handleQuery({ text: 'Find papers about deep learning', userId: 'user-1' }, controller.signal),
      ).rejects.toThrow('Query cancelled during classification');
      expect(client.calls).toHaveLength(0);
      expect(createConversation).not.toHaveBeenCalled();
    });

    it('stores nothing when aborted during dispatch', async () => {
      const { generate, storage, orchestrator } = setup({ search_papers: { ...PAPERS_REPLY, delayMs: 30 } });
      const createConversation = vi.spyOn(storage, 'createConversation');
      const controller = new AbortController();

      const running = orchestrator.handleQuery({ text: 'Find papers about deep learning', userId: 'user-1' }, controller.signal);
      setTimeout(() => controller.abort(), 5);

      await expect(running).rejects.toBeInstanceOf(QueryCancelledError);
      await new Promise(resolve => setTimeout(resolve, 40));
      expect(generate).not.toHaveBeenCalled();
      expect(createConversation).not.toHaveBeenCalled();
    });
  });

  it('delegates lifecycle to the data service connection', async () => {
    const { connection, orchestrator } = setup({});

    await expect(orchestrator.start()).resolves.toBe('Ready');
    expect(orchestrator.health()).toEqual(HEALTH);
    await orchestrator.shutdown();

    expect(connection.start).toHaveBeenCalledTimes(1);
    expect(connection.shutdown).toHaveBeenCalledTimes(1);
  });
});
