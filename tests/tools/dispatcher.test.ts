import { describe, it, expect, vi } from 'vitest';
import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ToolDispatcher, extractToolInvocation, type ToolHandlers } from '../../src/tools/dispatcher.js';
import { createToolHandlers, type ToolDependencies } from '../../src/tools/handlers.js';
import { ConfigurationError, FatalProviderError, ToolError } from '../../src/utils/errors.js';
import { err, ok } from '../../src/utils/result.js';
import type { ModelResponse } from '../../src/llm/types.js';

function dependencies(overrides: Partial<ToolDependencies> = {}): ToolDependencies {
  return {
    search: { search: vi.fn(async () => ok([{ title: 'EV', url: 'https://example.com/ev', description: 'd' }])) },
    reader: {
      fetchContent: vi.fn(async (url: string) =>
        ok({ url, title: 'EV report', text: 'Body text', contentType: 'text/html', kind: 'html' as const })
      ),
    },
    images: { collect: vi.fn(async () => ok([])) },
    reportDir: mkdtempSync(join(tmpdir(), 'deepreport-tools-')),
    ...overrides,
  };
}

describe('ToolDispatcher', () => {
  describe('construction', () => {
    it('should reject tool names without a definition', () => {
      expect(() => new ToolDispatcher(['teleport'], createToolHandlers(dependencies()))).toThrow(
        new ConfigurationError('Tool "teleport" has no definition')
      );
    });

    it('should reject tool names without a handler', () => {
      const handlers: ToolHandlers = {};
      expect(() => new ToolDispatcher(['search'], handlers)).toThrow('Tool "search" has no handler');
    });

    it('should advertise definitions in the requested order', () => {
      const dispatcher = new ToolDispatcher(['get_content', 'search', 'is_finished'], createToolHandlers(dependencies()));

      expect(dispatcher.definitions.map((d) => d.name)).toEqual(['get_content', 'search', 'is_finished']);
      expect(dispatcher.has('search')).toBe(true);
      expect(dispatcher.has('image_search')).toBe(false);
    });
  });

  describe('dispatch', () => {
    it('should return tool output as text', async () => {
      const dispatcher = new ToolDispatcher(['search'], createToolHandlers(dependencies()));

      const result = await dispatcher.dispatch('search', { query: 'ev' });

      expect(result.isError).toBe(false);
      expect(JSON.parse(result.text)).toEqual([{ title: 'EV', url: 'https://example.com/ev', description: 'd' }]);
    });

    it('should attach the source for fetched content', async () => {
      const dispatcher = new ToolDispatcher(['get_content'], createToolHandlers(dependencies()));

      const result = await dispatcher.dispatch('get_content', { url: 'https://example.com/ev' });

      expect(result).toEqual({
        text: 'Title: EV report\n\nBody text',
        isError: false,
        source: { url: 'https://example.com/ev', title: 'EV report' },
        artifacts: [],
      });
    });

    it('should reject tools outside the dispatch table', async () => {
      const dispatcher = new ToolDispatcher(['search'], createToolHandlers(dependencies()));

      const result = await dispatcher.dispatch('image_search', { query: 'x' });

      expect(result).toEqual({ text: 'Error: unknown tool "image_search"', isError: true, artifacts: [] });
    });

    it('should reject malformed arguments with a typed error', async () => {
      const dispatcher = new ToolDispatcher(['search'], createToolHandlers(dependencies()));

      const result = await dispatcher.dispatch('search', {});

      expect(result.text).toBe('Error: invalid arguments for search: query: Required');
      expect(result.isError).toBe(true);
    });

    it('should turn tool failures into the error sentinel', async () => {
      const deps = dependencies({
        search: { search: vi.fn(async () => err(new ToolError('search', 'Search API returned 500'))) },
      });
      const dispatcher = new ToolDispatcher(['search'], createToolHandlers(deps));

      const result = await dispatcher.dispatch('search', { query: 'ev' });

      expect(result).toEqual({ text: 'Error: Search API returned 500', isError: true, artifacts: [] });
    });

    it('should contain a handler that throws', async () => {
      const dispatcher = new ToolDispatcher(['search'], {
        search: {
          run: async () => {
            throw new Error('boom');
          },
        },
      });

      const result = await dispatcher.dispatch('search', { query: 'ev' });

      expect(result.text).toBe('Error: boom');
      expect(result.isError).toBe(true);
    });

    it('should let model failures raised inside a handler propagate', async () => {
      const dispatcher = new ToolDispatcher(['search'], {
        search: {
          run: async () => {
            throw new FatalProviderError('Maximum retries (8) exceeded');
          },
        },
      });

      await expect(dispatcher.dispatch('search', { query: 'ev' })).rejects.toBeInstanceOf(FatalProviderError);
    });

    it('should acknowledge is_finished', async () => {
      const dispatcher = new ToolDispatcher(['is_finished'], createToolHandlers(dependencies()));

      expect((await dispatcher.dispatch('is_finished', {})).text).toBe('finished');
    });
  });

  describe('write', () => {
    it('should append to a file inside the report directory', async () => {
      const deps = dependencies();
      const dispatcher = new ToolDispatcher(['write'], createToolHandlers(deps));

      await dispatcher.dispatch('write', { content: 'first', path: 'notes/a.md' });
      const result = await dispatcher.dispatch('write', { content: 'second', path: 'notes/a.md' });

      expect(result.text).toBe(`Appended to ${join('notes', 'a.md')}`);
      expect(readFileSync(join(deps.reportDir, 'notes', 'a.md'), 'utf-8')).toBe('first\nsecond\n');
    });

    it('should refuse paths outside the report directory', async () => {
      const dispatcher = new ToolDispatcher(['write'], createToolHandlers(dependencies()));

      const result = await dispatcher.dispatch('write', { content: 'x', path: '../escape.md' });

      expect(result.text).toBe('Error: path must stay inside the report directory: ../escape.md');
    });

    it('should report empty content and path together', async () => {
      const dispatcher = new ToolDispatcher(['write'], createToolHandlers(dependencies()));

      const result = await dispatcher.dispatch('write', { content: '', path: '' });

      expect(result.text).toBe('Error: content is empty, path is empty');
    });
  });
});

describe('extractToolInvocation', () => {
  const response: ModelResponse = {
    message: {
      role: 'assistant',
      content: [
        { type: 'text', text: 'Let me look.' },
        { type: 'tool_use', toolUseId: 'tooluse_a', name: 'search', input: { query: 'ev' } },
        { type: 'tool_use', toolUseId: 'tooluse_b', name: 'get_content', input: { url: 'https://example.com' } },
      ],
    },
    stopReason: 'tool_use',
  };

  it('should return the first tool request of a response', () => {
    expect(extractToolInvocation(response)).toEqual({ id: 'tooluse_a', name: 'search', input: { query: 'ev' } });
  });

  it('should accept a bare message', () => {
    expect(extractToolInvocation(response.message)?.name).toBe('search');
  });

  it('should return null when the message has only text', () => {
    expect(extractToolInvocation({ role: 'assistant', content: [{ type: 'text', text: 'Done.' }] })).toBeNull();
  });

  it('should skip malformed tool blocks', () => {
    const message = {
      role: 'assistant',
      content: [
        { type: 'tool_use', name: 'search' },
        { type: 'tool_use', toolUseId: 'tooluse_c', name: 'is_finished', input: {} },
      ],
    };

    expect(extractToolInvocation(message)).toEqual({ id: 'tooluse_c', name: 'is_finished', input: {} });
  });

  it.each([null, undefined, 42, 'text', { message: 'x' }, { content: 'not an array' }, { content: [null, 7] }])(
    'should return null for %j',
    (value) => {
      expect(extractToolInvocation(value)).toBeNull();
    }
  );
});
