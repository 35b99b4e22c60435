/**
 * Tool Handlers
 *
 * Builds the dispatch table for one research run. Each entry binds a tool
 * name to its argument schema and the client that does the work.
 */
import { z } from 'zod';
import { GenerateGraphArgsSchema, RenderMermaidArgsSchema, generateGraph, renderDiagram } from '../charts/tools.js';
import type { ReportArtifact } from '../charts/types.js';
import { ok } from '../utils/result.js';
import type { ToolName } from './definitions.js';
import { defineTool, type ToolHandler } from './dispatcher.js';
import type { ImageCollector } from './images.js';
import type { BraveSearchClient } from './search.js';
import type { WebReader } from './web-reader.js';
import { appendToReportFile } from './write.js';

export interface ToolDependencies {
  search: Pick<BraveSearchClient, 'search'>;
  reader: Pick<WebReader, 'fetchContent'>;
  images: Pick<ImageCollector, 'collect'>;
  reportDir: string;
}

export const FINISHED_TEXT = 'finished';

const SavedFigureSchema = z.object({
  graphPath: z.string().optional(),
  diagramPath: z.string().optional(),
  title: z.string(),
  mermaid: z.string(),
});

const SavedImagesSchema = z.object({
  images: z.array(z.object({ path: z.string(), title: z.string(), description: z.string().default('') })),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Recovers the artifacts a tool reported from its result text. Used when a
 * resumed conversation replays earlier tool results.
 */
export function parseToolArtifacts(toolName: string, text: string): ReportArtifact[] {
  const data = parseJson(text);

  if (toolName === 'image_search') {
    const parsed = SavedImagesSchema.safeParse(data);
    if (!parsed.success) return [];
    return parsed.data.images.map((image) => ({
      kind: 'image',
      path: image.path,
      title: image.title,
      description: image.description,
    }));
  }

  if (toolName === 'generate_graph' || toolName === 'render_mermaid') {
    const parsed = SavedFigureSchema.safeParse(data);
    const path = parsed.success ? (parsed.data.graphPath ?? parsed.data.diagramPath) : undefined;
    if (!parsed.success || !path) return [];
    const kind = toolName === 'generate_graph' ? 'graph' : 'diagram';
    return [{ kind, path, title: parsed.data.title, mermaid: parsed.data.mermaid }];
  }

  return [];
}

export function createToolHandlers(deps: ToolDependencies): Record<ToolName, ToolHandler> {
  return {
    search: defineTool('search', z.object({ query: z.string().min(1) }), async ({ query }) => {
      const results = await deps.search.search(query);
      if (!results.ok) return results;
      return ok({ text: JSON.stringify(results.value, null, 2) });
    }),

    get_content: defineTool('get_content', z.object({ url: z.string().url() }), async ({ url }) => {
      const content = await deps.reader.fetchContent(url);
      if (!content.ok) return content;
      const { title, text } = content.value;
      return ok({ text: `Title: ${title}\n\n${text}`, source: { url, title } });
    }),

    image_search: defineTool(
      'image_search',
      z.object({ query: z.string().min(1), max_results: z.coerce.number().int().positive().optional() }),
      async ({ query, max_results }) => {
        const images = await deps.images.collect(query, max_results);
        if (!images.ok) return images;
        const artifacts: ReportArtifact[] = images.value.map((image) => ({
          kind: 'image',
          path: image.path,
          title: image.title,
          description: image.description,
        }));
        return ok({ text: JSON.stringify({ images: images.value }, null, 2), artifacts });
      }
    ),

    generate_graph: defineTool('generate_graph', GenerateGraphArgsSchema, async (args) => {
      const graph = await generateGraph(deps.reportDir, args);
      if (!graph.ok) return graph;
      const { path, title, mermaid } = graph.value;
      return ok({ text: JSON.stringify({ graphPath: path, title, mermaid }, null, 2), artifacts: [graph.value] });
    }),

    render_mermaid: defineTool('render_mermaid', RenderMermaidArgsSchema, async (args) => {
      const diagram = await renderDiagram(deps.reportDir, args);
      if (!diagram.ok) return diagram;
      const { path, title, mermaid } = diagram.value;
      return ok({ text: JSON.stringify({ diagramPath: path, title, mermaid }, null, 2), artifacts: [diagram.value] });
    }),

    write: defineTool('write', z.object({ content: z.string(), path: z.string() }), async ({ content, path }) => {
      const written = await appendToReportFile(deps.reportDir, content, path);
      if (!written.ok) return written;
      return ok({ text: `Appended to ${written.value}` });
    }),

    is_finished: defineTool('is_finished', z.object({}), async () => ok({ text: FINISHED_TEXT })),
  };
}
