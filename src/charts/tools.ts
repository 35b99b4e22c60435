/**
 * Chart Tools
 *
 * Handlers behind `generate_graph` and `render_mermaid`. Both validate their
 * arguments with zod, build or check the Mermaid source, and save it under the
 * report directory so the report generator can embed it.
 */
import { z } from 'zod';
import { ToolError, errorMessage } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';
import { buildGraphMermaid, saveMermaid, validateMermaid } from './mermaid.js';
import { GRAPH_TYPES, type ReportArtifact } from './types.js';

/**
 * Local models often send arrays as JSON strings; parse those before
 * validation and let zod report anything that still does not fit.
 */
function jsonArray<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => {
    if (typeof value !== 'string') return value;
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  }, schema);
}

export const GenerateGraphArgsSchema = z.object({
  graph_type: z.enum(GRAPH_TYPES),
  title: z.string().min(1),
  x_label: z.string().optional(),
  y_label: z.string().optional(),
  labels: jsonArray(z.array(z.coerce.string())).optional(),
  data: jsonArray(z.array(z.coerce.number())).optional(),
  series_labels: jsonArray(z.array(z.string())).optional(),
  multi_data: jsonArray(z.array(z.array(z.coerce.number()))).optional(),
  colors: jsonArray(z.array(z.string())).optional(),
});

export const RenderMermaidArgsSchema = z.object({
  mermaid_code: z.string().min(1),
  title: z.string().optional(),
});

export type GenerateGraphArgs = z.infer<typeof GenerateGraphArgsSchema>;
export type RenderMermaidArgs = z.infer<typeof RenderMermaidArgsSchema>;

export async function generateGraph(
  reportDir: string,
  args: GenerateGraphArgs
): Promise<Result<ReportArtifact, ToolError>> {
  const mermaid = buildGraphMermaid({
    graphType: args.graph_type,
    title: args.title,
    xLabel: args.x_label,
    yLabel: args.y_label,
    labels: args.labels,
    data: args.data,
    seriesLabels: args.series_labels,
    multiData: args.multi_data,
    colors: args.colors,
  });
  if (!mermaid.ok) {
    return mermaid;
  }

  try {
    const path = await saveMermaid(reportDir, 'graphs', mermaid.value);
    return ok({ kind: 'graph', path, title: args.title, mermaid: mermaid.value });
  } catch (error) {
    return err(new ToolError('generate_graph', `Could not save graph: ${errorMessage(error)}`, { cause: error }));
  }
}

export async function renderDiagram(
  reportDir: string,
  args: RenderMermaidArgs
): Promise<Result<ReportArtifact, ToolError>> {
  const code = validateMermaid(args.mermaid_code);
  if (!code.ok) {
    return code;
  }

  try {
    const path = await saveMermaid(reportDir, 'diagrams', code.value);
    return ok({ kind: 'diagram', path, title: args.title ?? '', mermaid: code.value });
  } catch (error) {
    return err(new ToolError('render_mermaid', `Could not save diagram: ${errorMessage(error)}`, { cause: error }));
  }
}
