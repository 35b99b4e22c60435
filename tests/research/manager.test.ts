import { describe, it, expect, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildResearchConfig, parseSettings } from '../../src/config/settings.js';
import { loadConversation } from '../../src/research/conversation.js';
import { ResearchManager, buildResearchText } from '../../src/research/manager.js';
import { FatalProviderError, ResearchStageError, ToolError } from '../../src/utils/errors.js';
import { err, ok, type Result } from '../../src/utils/result.js';
import type { ImageSearchHit } from '../../src/tools/search.js';
import { ScriptedModel, assistantText, assistantToolUse } from '../helpers/scripted-model.js';

const TOPIC = 'electric vehicle adoption in Japan';
const STARTED = new Date(2025, 0, 2, 3, 4, 5);

function setup(script: ConstructorParameters<typeof ScriptedModel>[0]) {
  const root = mkdtempSync(join(tmpdir(), 'deepreport-run-'));
  const settings = parseSettings({
    limits: {
      summary: {
        discussion_turns: 1,
        context_iterations: 2,
        survey_iterations: 3,
        visualization_iterations: 2,
        report_attempts: 2,
      },
    },
    report: { output_dir: join(root, 'reports'), conversation_dir: join(root, 'conversation') },
    pdf: { enabled: false },
  });
  const config = buildResearchConfig(settings, 'summary', { BRAVE_SEARCH_API_KEY: 'test-secret' });

  const model = new ScriptedModel(script);
  const search = {
    search: vi.fn(async (query: string) => ok([{ title: `About ${query}`, url: 'https://example.com/ev', description: 'EV facts' }])),
    imageSearch: vi.fn(async (_query: string, _count: number): Promise<Result<ImageSearchHit[], ToolError>> => ok([])),
  };
  const manager = new ResearchManager(config, { model, search, now: () => STARTED });
  return { root, model, search, manager };
}

function fullRunScript() {
  return [
    // context
    assistantToolUse('c1', 'search', { query: 'ev japan' }),
    assistantToolUse('c2', 'is_finished'),
    // discussion (1 turn) + strategy
    assistantText('Look at sales.'),
    assistantText('And charging.'),
    assistantText('Plan: sales and charging'),
    // survey (must use image_search, never does)
    assistantToolUse('s1', 'search', { query: 'ev sales japan' }),
    assistantToolUse('s2', 'is_finished'),
    assistantToolUse('s3', 'is_finished'),
    // visualization plan
    assistantText('[]'),
    // report
    assistantText('## Summary\n\nSales grew.\n\nEND OF REPORT'),
  ];
}

describe('ResearchManager', () => {
  it('should run every stage in order and write the report', async () => {
    const { root, model, search, manager } = setup(fullRunScript());

    const outcome = await manager.run(TOPIC);

    const reportDir = join(root, 'reports', '20250102_030405');
    expect(outcome).toEqual({
      reportDir,
      markdownPath: join(reportDir, 'report.md'),
      htmlPath: join(reportDir, 'report.html'),
      conversationPath: join(root, 'conversation', '20250102_030405.yaml'),
      truncated: false,
      mustUseSatisfied: true,
    });
    expect(model.requests).toHaveLength(10);
    expect(model.remaining).toBe(0);

    expect(readFileSync(outcome.markdownPath, 'utf-8')).toBe(
      `# ${TOPIC}\n\nCreated: 2025-01-02 03:04\n\n## Summary\n\nSales grew.\n`
    );
    expect(existsSync(join(reportDir, 'report.pdf'))).toBe(false);

    // The survey never used image_search, so the manager called it once itself
    expect(search.imageSearch).toHaveBeenCalledTimes(1);
    expect(search.imageSearch).toHaveBeenCalledWith(TOPIC, 10);
  });

  it('should report the must-use tool as unsatisfied when the forced call fails', async () => {
    const { search, manager } = setup(fullRunScript());
    search.imageSearch.mockResolvedValueOnce(err(new ToolError('image_search', 'Search API returned 429')));

    const outcome = await manager.run(TOPIC);

    expect(search.imageSearch).toHaveBeenCalledTimes(1);
    expect(outcome.mustUseSatisfied).toBe(false);
    expect(outcome.truncated).toBe(false);
  });

  it('should save every stage to the conversation file', async () => {
    const { manager } = setup(fullRunScript());

    const outcome = await manager.run(TOPIC);

    const saved = loadConversation(outcome.conversationPath);
    expect(saved.count('context', 'assistant')).toBe(2);
    expect(saved.count('proposer', 'assistant')).toBe(1);
    expect(saved.count('critic', 'assistant')).toBe(1);
    expect(saved.lastMessage('strategy')?.content).toEqual([{ type: 'text', text: 'Plan: sales and charging' }]);
    expect(saved.count('survey', 'assistant')).toBe(3);
    expect(saved.isEmpty('visualization')).toBe(true);
  });

  it('should pass the strategy and survey results to the report writer', async () => {
    const { model, manager } = setup(fullRunScript());

    await manager.run(TOPIC);

    const reportRequest = model.requests[9];
    expect(reportRequest.systemPrompt).toContain('## Research results');
    expect(reportRequest.systemPrompt).toContain('### search: {"query":"ev sales japan"}');
    expect(reportRequest.messages[0].content[0]).toMatchObject({ type: 'text' });
    expect(JSON.stringify(reportRequest.messages)).toContain('Plan: sales and charging');
  });

  it('should resume from a saved conversation without repeating finished stages', async () => {
    const first = setup(fullRunScript());
    const outcome = await first.manager.run(TOPIC);

    const second = setup([assistantText('[]'), assistantText('Again.\nEND OF REPORT')]);
    const resumed = await second.manager.run(TOPIC, { resumePath: outcome.conversationPath });

    // Only the visualization plan and the report are produced again
    expect(second.model.requests).toHaveLength(2);
    expect(resumed.conversationPath).toBe(outcome.conversationPath);
    expect(resumed.reportDir).toBe(join(second.root, 'reports', '20250102_030405'));
  });

  it('should name the failed stage', async () => {
    const { manager } = setup([new FatalProviderError('Maximum retries (8) exceeded')]);

    const error = await manager.run(TOPIC).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResearchStageError);
    expect(error).toHaveProperty('stage', 'context');
    expect(error).toHaveProperty(
      'message',
      'Stage "context" failed: Collection on "context" failed: Maximum retries (8) exceeded'
    );
  });
});

describe('buildResearchText', () => {
  it('should list results, images and figures in separate sections', () => {
    const text = buildResearchText(
      [{ toolUseId: 't1', toolName: 'search', input: { query: 'ev' }, text: 'hits', isError: false, artifacts: [] }],
      [{ kind: 'image', path: './images/a.png', title: 'Charger', description: 'A fast charger' }],
      [{ title: 'Sales', kind: 'graph', path: './graphs/s.mmd', mermaid: 'pie title Sales' }]
    );

    expect(text).toBe(
      '## Research results\n\n### search: {"query":"ev"}\nhits\n\n' +
        '## Images\n\n- ![Charger](./images/a.png): A fast charger\n\n' +
        '## Figures\n\n### Sales\n\n```mermaid\npie title Sales\n```'
    );
  });
});
