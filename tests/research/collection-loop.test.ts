import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { CitationLedger } from '../../src/research/citations.js';
import { AgenticCollectionLoop, summarizeResults, type CollectionLoopOptions } from '../../src/research/collection-loop.js';
import { Conversation } from '../../src/research/conversation.js';
import { INTERRUPTED_TEXT, SKIPPED_TOOL_TEXT, finishRefusal, mustUseNudge } from '../../src/research/prompts.js';
import { ToolDispatcher, defineTool, type ToolHandlers } from '../../src/tools/dispatcher.js';
import { DataCollectionError, FatalProviderError, ToolError } from '../../src/utils/errors.js';
import { err, ok } from '../../src/utils/result.js';
import type { ContentBlock, Message } from '../../src/llm/types.js';
import { ScriptedModel, assistantText, assistantToolUse } from '../helpers/scripted-model.js';

function handlers(): ToolHandlers {
  return {
    search: defineTool('search', z.object({ query: z.string() }), async ({ query }) => {
      if (query === 'outage') throw new FatalProviderError('Maximum retries (8) exceeded');
      return query === 'broken'
        ? err(new ToolError('search', 'Search API returned 500'))
        : ok({ text: `results for ${query}` });
    }),
    get_content: defineTool('get_content', z.object({ url: z.string() }), async ({ url }) =>
      ok({ text: `Title: Page\n\nBody of ${url}  `, source: { url, title: 'Page' } })
    ),
    image_search: defineTool('image_search', z.object({ query: z.string() }), async () => ok({ text: '{"images":[]}' })),
    is_finished: defineTool('is_finished', z.object({}), async () => ok({ text: 'finished' })),
  };
}

function setup(script: Array<Message | Error>, options: Partial<CollectionLoopOptions> = {}, conversation = new Conversation()) {
  const model = new ScriptedModel(script);
  const ledger = new CitationLedger();
  const dispatcher = new ToolDispatcher(
    ['search', 'get_content', 'image_search', 'is_finished'],
    handlers()
  );
  const loop = new AgenticCollectionLoop(model, dispatcher, ledger, conversation, {
    channel: 'survey',
    modelId: 'test-model',
    systemPrompt: 'collect',
    maxIterations: 5,
    ...options,
  });
  return { model, ledger, conversation, loop };
}

function lastContent(conversation: Conversation): ContentBlock[] {
  return conversation.lastMessage('survey')?.content ?? [];
}

describe('AgenticCollectionLoop', () => {
  describe('termination', () => {
    it('should stop at the finish call and return the results before it', async () => {
      const { model, loop, conversation } = setup([
        assistantToolUse('t1', 'search', { query: 'ev sales' }),
        assistantToolUse('t2', 'get_content', { url: 'https://example.com/a' }),
        assistantToolUse('t3', 'search', { query: 'ev policy' }),
        assistantToolUse('t4', 'is_finished'),
      ]);

      const result = await loop.run('Research EVs');

      expect(result.outcome).toBe('finished');
      expect(result.iterations).toBe(4);
      expect(result.results.map((r) => r.text)).toEqual([
        'results for ev sales',
        'Title: Page\n\nBody of https://example.com/a\n\n[※1]',
        'results for ev policy',
      ]);
      expect(model.requests).toHaveLength(4);
      expect(conversation.count('survey')).toBe(9);
      expect(lastContent(conversation)).toEqual([
        { type: 'tool_result', toolUseId: 't4', content: [{ text: 'finished' }] },
      ]);
    });

    it('should call the model at temperature 0 with the dispatcher tools', async () => {
      const { model, loop } = setup([assistantToolUse('t1', 'is_finished')], { maxTokens: 1024 });

      await loop.run('Research EVs');

      const request = model.requests[0];
      expect(request.modelId).toBe('test-model');
      expect(request.systemPrompt).toBe('collect');
      expect(request.inference).toEqual({ temperature: 0, maxTokens: 1024, topP: undefined });
      expect(request.tools?.map((t) => t.name)).toEqual(['search', 'get_content', 'image_search', 'is_finished']);
      expect(request.messages).toEqual([{ role: 'user', content: [{ type: 'text', text: 'Research EVs' }] }]);
    });

    it('should finish when the model answers without a tool call', async () => {
      const { loop } = setup([assistantToolUse('t1', 'search', { query: 'ev' }), assistantText('All done.')]);

      const result = await loop.run('Research EVs');

      expect(result.outcome).toBe('finished');
      expect(result.iterations).toBe(2);
      expect(result.results).toHaveLength(1);
    });

    it('should stop at maxIterations and keep what was collected', async () => {
      const { model, loop } = setup(
        [
          assistantToolUse('t1', 'search', { query: 'a' }),
          assistantToolUse('t2', 'search', { query: 'b' }),
          assistantToolUse('t3', 'search', { query: 'c' }),
        ],
        { maxIterations: 3 }
      );

      const result = await loop.run('Research EVs');

      expect(result.outcome).toBe('exhausted');
      expect(result.iterations).toBe(3);
      expect(result.results.map((r) => r.text)).toEqual(['results for a', 'results for b', 'results for c']);
      expect(model.remaining).toBe(0);
    });
  });

  describe('tool results', () => {
    it('should feed tool failures back as error results and continue', async () => {
      const { loop, conversation } = setup([
        assistantToolUse('t1', 'search', { query: 'broken' }),
        assistantToolUse('t2', 'is_finished'),
      ]);

      const result = await loop.run('Research EVs');

      expect(result.results[0]).toMatchObject({ toolName: 'search', isError: true, text: 'Error: Search API returned 500' });
      const toolResultMessage = conversation.messages('survey')[2];
      expect(toolResultMessage.content).toEqual([
        { type: 'tool_result', toolUseId: 't1', status: 'error', content: [{ text: 'Error: Search API returned 500' }] },
      ]);
    });

    it('should register fetched pages with the ledger', async () => {
      const { loop, ledger } = setup([
        assistantToolUse('t1', 'get_content', { url: 'https://example.com/a' }),
        assistantToolUse('t2', 'get_content', { url: 'https://example.com/b' }),
        assistantToolUse('t3', 'get_content', { url: 'https://example.com/a' }),
        assistantToolUse('t4', 'is_finished'),
      ]);

      const result = await loop.run('Research EVs');

      expect(result.results.map((r) => r.citation)).toEqual(['[※1]', '[※2]', '[※1]']);
      expect(ledger.size).toBe(2);
    });

    it('should run only the first of several tool requests', async () => {
      const { loop, conversation } = setup([
        {
          role: 'assistant',
          content: [
            { type: 'tool_use', toolUseId: 't1', name: 'search', input: { query: 'a' } },
            { type: 'tool_use', toolUseId: 't2', name: 'search', input: { query: 'b' } },
          ],
        },
        assistantToolUse('t3', 'is_finished'),
      ]);

      const result = await loop.run('Research EVs');

      expect(result.results).toHaveLength(1);
      expect(conversation.messages('survey')[2].content).toEqual([
        { type: 'tool_result', toolUseId: 't1', content: [{ text: 'results for a' }] },
        { type: 'tool_result', toolUseId: 't2', status: 'error', content: [{ text: SKIPPED_TOOL_TEXT }] },
      ]);
    });

    it('should turn model failures into a DataCollectionError', async () => {
      const { loop } = setup([new FatalProviderError('Maximum retries (3) exceeded')]);

      const error = await loop.run('Research EVs').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DataCollectionError);
      expect(error).toHaveProperty('message', 'Collection on "survey" failed: Maximum retries (3) exceeded');
    });

    it('should turn model failures inside a tool into a DataCollectionError', async () => {
      const { loop, conversation } = setup([assistantToolUse('t1', 'search', { query: 'outage' })]);

      const error = await loop.run('Research EVs').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DataCollectionError);
      expect(error).toHaveProperty('message', 'Collection on "survey" failed: Maximum retries (8) exceeded');
      expect(conversation.count('survey')).toBe(2);
    });
  });

  describe('must-use policy', () => {
    it('should refuse to finish and nudge until the tool is used', async () => {
      const { model, loop } = setup(
        [
          assistantToolUse('t1', 'search', { query: 'ev' }),
          assistantToolUse('t2', 'is_finished'),
          assistantToolUse('t3', 'image_search', { query: 'ev' }),
          assistantToolUse('t4', 'is_finished'),
        ],
        { maxIterations: 4, mustUseTool: 'image_search' }
      );

      const result = await loop.run('Research EVs');

      expect(result.outcome).toBe('finished');
      expect(result.iterations).toBe(4);
      expect(result.mustUseSatisfied).toBe(true);
      expect(result.results.map((r) => r.toolName)).toEqual(['search', 'image_search']);

      // Third call sees the refused finish with the nudge merged into the same user turn
      expect(model.requests[2].messages.at(-1)).toEqual({
        role: 'user',
        content: [
          { type: 'tool_result', toolUseId: 't2', status: 'error', content: [{ text: finishRefusal('image_search') }] },
          { type: 'text', text: mustUseNudge('image_search') },
        ],
      });
    });

    it('should refuse a plain-text finish with a user turn', async () => {
      const { model, loop } = setup(
        [assistantText('Done.'), assistantToolUse('t1', 'image_search', { query: 'ev' }), assistantText('Done.')],
        { maxIterations: 10, mustUseTool: 'image_search' }
      );

      const result = await loop.run('Research EVs');

      expect(result.iterations).toBe(3);
      expect(model.requests[1].messages.at(-1)).toEqual({
        role: 'user',
        content: [{ type: 'text', text: finishRefusal('image_search') }],
      });
    });

    it('should report an unused tool when iterations run out', async () => {
      const { model, loop } = setup(
        [assistantToolUse('t1', 'search', { query: 'ev' }), assistantToolUse('t2', 'is_finished')],
        { maxIterations: 2, mustUseTool: 'image_search' }
      );

      const result = await loop.run('Research EVs');

      expect(result.outcome).toBe('finished');
      expect(result.mustUseSatisfied).toBe(false);
      expect(model.requests[0].messages).toEqual([
        {
          role: 'user',
          content: [
            { type: 'text', text: 'Research EVs' },
            { type: 'text', text: mustUseNudge('image_search') },
          ],
        },
      ]);
    });

    it('should ignore a must-use tool the loop does not offer', async () => {
      const { loop } = setup([assistantToolUse('t1', 'is_finished')], { mustUseTool: 'render_mermaid' });

      const result = await loop.run('Research EVs');

      expect(result.outcome).toBe('finished');
      expect(result.mustUseSatisfied).toBe(true);
    });
  });

  describe('resume', () => {
    function interruptedConversation(): Conversation {
      return new Conversation({
        survey: [
          { role: 'user', content: [{ type: 'text', text: 'Research EVs' }] },
          assistantToolUse('t1', 'search', { query: 'ev' }),
          { role: 'user', content: [{ type: 'tool_result', toolUseId: 't1', content: [{ text: 'results for ev' }] }] },
          assistantToolUse('t2', 'get_content', { url: 'https://example.com/a' }),
          {
            role: 'user',
            content: [
              { type: 'tool_result', toolUseId: 't2', content: [{ text: 'Title: Page A\n\nBody\n\n[※1]' }] },
            ],
          },
          assistantToolUse('t3', 'search', { query: 'lost' }),
        ],
      });
    }

    it('should answer the interrupted request and continue from the saved turns', async () => {
      const { model, loop, ledger } = setup(
        [assistantToolUse('t4', 'is_finished')],
        {},
        interruptedConversation()
      );

      const result = await loop.run('Research EVs');

      expect(result.iterations).toBe(4);
      expect(result.results.map((r) => r.toolUseId)).toEqual(['t1', 't2']);
      expect(result.results[1]).toMatchObject({ citation: '[※1]', source: { url: 'https://example.com/a', title: 'Page A' } });
      expect(ledger.allReferences().map((r) => r.url)).toEqual(['https://example.com/a']);
      expect(model.requests[0].messages).toHaveLength(7);
      expect(model.requests[0].messages[6]).toEqual({
        role: 'user',
        content: [{ type: 'tool_result', toolUseId: 't3', status: 'error', content: [{ text: INTERRUPTED_TEXT }] }],
      });
    });

    it('should not call the model for a channel that already finished', async () => {
      const conversation = new Conversation({
        survey: [
          { role: 'user', content: [{ type: 'text', text: 'Research EVs' }] },
          assistantToolUse('t1', 'search', { query: 'ev' }),
          { role: 'user', content: [{ type: 'tool_result', toolUseId: 't1', content: [{ text: 'results for ev' }] }] },
          assistantToolUse('t2', 'is_finished'),
          { role: 'user', content: [{ type: 'tool_result', toolUseId: 't2', content: [{ text: 'finished' }] }] },
        ],
      });
      const { model, loop } = setup([], {}, conversation);

      const result = await loop.run('Research EVs');

      expect(model.requests).toHaveLength(0);
      expect(result).toMatchObject({ outcome: 'finished', iterations: 2 });
      expect(result.results.map((r) => r.text)).toEqual(['results for ev']);
    });
  });
});

describe('summarizeResults', () => {
  it('should join successful results under a heading each', () => {
    const text = summarizeResults([
      { toolUseId: 'a', toolName: 'search', input: { query: 'ev' }, text: 'hits', isError: false, artifacts: [] },
      { toolUseId: 'b', toolName: 'search', input: { query: 'x' }, text: 'Error: nope', isError: true, artifacts: [] },
      {
        toolUseId: 'c',
        toolName: 'get_content',
        input: { url: 'https://example.com/a' },
        text: 'page\n\n[※1]',
        isError: false,
        source: { url: 'https://example.com/a', title: 'A' },
        artifacts: [],
      },
    ]);

    expect(text).toBe('### search: {"query":"ev"}\nhits\n\n### get_content: https://example.com/a\npage\n\n[※1]');
  });
});
