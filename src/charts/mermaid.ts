/**
 * Mermaid Builders
 *
 * Converts chart definitions into Mermaid `xychart-beta` / `pie` source and checks
 * hand-written diagrams before they are saved.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ToolError } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';
import type { GraphDefinition } from './types.js';

export const DEFAULT_COLORS = [
  '#1f77b4',
  '#ff7f0e',
  '#2ca02c',
  '#d62728',
  '#9467bd',
  '#8c564b',
  '#e377c2',
  '#7f7f7f',
  '#bcbd22',
  '#17becf',
];

export const MERMAID_KEYWORDS = [
  'flowchart',
  'graph',
  'sequenceDiagram',
  'classDiagram',
  'stateDiagram',
  'stateDiagram-v2',
  'erDiagram',
  'journey',
  'gantt',
  'pie',
  'quadrantChart',
  'requirementDiagram',
  'gitGraph',
  'mindmap',
  'timeline',
  'zenuml',
  'sankey-beta',
  'xychart-beta',
  'block-beta',
  'packet-beta',
  'kanban',
  'architecture-beta',
];

function quote(text: string): string {
  return `"${text.replace(/"/g, "'")}"`;
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(4)));
}

export function buildGraphMermaid(graph: GraphDefinition): Result<string, ToolError> {
  const series = graph.multiData ?? (graph.data ? [graph.data] : []);
  if (series.length === 0 || series.some((values) => values.length === 0)) {
    return err(new ToolError('generate_graph', 'data or multi_data with at least one value is required'));
  }

  if (graph.graphType === 'pie') {
    const values = series[0];
    const labels = graph.labels ?? values.map((_, i) => `Item ${i + 1}`);
    if (labels.length !== values.length) {
      return err(new ToolError('generate_graph', `labels has ${labels.length} entries but data has ${values.length}`));
    }
    const lines = [`pie title ${graph.title}`];
    labels.forEach((label, i) => lines.push(`    ${quote(label)} : ${formatNumber(values[i])}`));
    return ok(lines.join('\n'));
  }

  const length = series[0].length;
  if (series.some((values) => values.length !== length)) {
    return err(new ToolError('generate_graph', 'every series in multi_data must have the same length'));
  }

  const labels = graph.labels ?? series[0].map((_, i) => String(i + 1));
  if (labels.length !== length) {
    return err(new ToolError('generate_graph', `labels has ${labels.length} entries but data has ${length}`));
  }

  const colors = graph.colors && graph.colors.length > 0 ? graph.colors : DEFAULT_COLORS;
  const palette = series.map((_, i) => colors[i % colors.length]).join(', ');
  const mark = graph.graphType === 'line' || graph.graphType === 'scatter' ? 'line' : 'bar';

  const lines = [
    `%%{init: {"themeVariables": {"xyChart": {"plotColorPalette": "${palette}"}}}}%%`,
    graph.graphType === 'horizontal_bar' ? 'xychart-beta horizontal' : 'xychart-beta',
    `    title ${quote(graph.title)}`,
    `    x-axis ${graph.xLabel ? `${quote(graph.xLabel)} ` : ''}[${labels.map(quote).join(', ')}]`,
  ];
  if (graph.yLabel) {
    lines.push(`    y-axis ${quote(graph.yLabel)}`);
  }

  series.forEach((values, i) => {
    const name = graph.seriesLabels?.[i];
    if (name) {
      lines.push(`    %% series ${i + 1}: ${name}`);
    }
    lines.push(`    ${mark} [${values.map(formatNumber).join(', ')}]`);
  });

  return ok(lines.join('\n'));
}

/**
 * Returns the trimmed code when its first statement is a known diagram
 * type. Front matter and init directives are skipped.
 */
export function validateMermaid(code: string): Result<string, ToolError> {
  const trimmed = code.trim();
  const lines = trimmed.split('\n').map((line) => line.trim());

  let i = 0;
  if (lines[0] === '---') {
    const end = lines.indexOf('---', 1);
    i = end === -1 ? lines.length : end + 1;
  }
  while (i < lines.length && (lines[i] === '' || lines[i].startsWith('%%'))) {
    i++;
  }

  const keyword = (lines[i] ?? '').split(/\s+/)[0];
  if (!MERMAID_KEYWORDS.includes(keyword)) {
    return err(
      new ToolError('render_mermaid', `Unknown Mermaid diagram type "${keyword}". Start with one of: ${MERMAID_KEYWORDS.join(', ')}`)
    );
  }

  return ok(trimmed);
}

/** Writes Mermaid source under the report dir and returns its relative path. */
export async function saveMermaid(reportDir: string, subdir: string, code: string): Promise<string> {
  const dir = join(reportDir, subdir);
  const fileName = `${crypto.randomUUID()}.mmd`;
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, fileName), `${code}\n`, 'utf-8');
  return `./${subdir}/${fileName}`;
}
