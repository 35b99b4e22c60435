/**
 * Tool Definitions
 *
 * JSON schemas advertised to the model. Each name here must have a handler
 * in the dispatch table before a ToolDispatcher will accept it.
 */
import { GRAPH_TYPES } from '../charts/types.js';
import type { ToolDefinition } from '../llm/types.js';

export const TOOL_NAMES = [
  'search',
  'get_content',
  'image_search',
  'generate_graph',
  'render_mermaid',
  'write',
  'is_finished',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Pseudo-tool that ends a collection loop. */
export const FINISH_TOOL: ToolName = 'is_finished';

export const TOOL_DEFINITIONS: Record<ToolName, ToolDefinition> = {
  search: {
    name: 'search',
    description: 'Searches the web for a sentence or keywords and returns titles, URLs and snippets as JSON.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Sentence or keywords to search for. Separate several keywords with spaces.',
        },
      },
      required: ['query'],
    },
  },
  get_content: {
    name: 'get_content',
    description: 'Fetches a URL and returns its text content. Non-text documents are summarized or described.',
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'The URL to read' },
      },
      required: ['url'],
    },
  },
  image_search: {
    name: 'image_search',
    description: 'Searches for images, downloads them into the report and returns their paths and descriptions.',
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Keywords describing the images. Separate several keywords with spaces.',
        },
        max_results: {
          type: 'integer',
          description: 'Maximum number of images to save (default 5, at most 10)',
        },
      },
      required: ['query'],
    },
  },
  generate_graph: {
    name: 'generate_graph',
    description: 'Builds a chart from data and saves it as a Mermaid diagram for the report.',
    inputSchema: {
      type: 'object',
      properties: {
        graph_type: {
          type: 'string',
          description: 'Chart type: line, bar, pie, scatter or horizontal_bar',
          enum: [...GRAPH_TYPES],
        },
        title: { type: 'string', description: 'Chart title' },
        x_label: { type: 'string', description: 'X axis label (line, bar and scatter charts)' },
        y_label: { type: 'string', description: 'Y axis label (line, bar and scatter charts)' },
        labels: {
          type: 'array',
          description: 'Category labels (x axis values or pie slices)',
          items: { type: 'string' },
        },
        data: {
          type: 'array',
          description: 'Values to plot for a single series',
          items: { type: 'number' },
        },
        series_labels: {
          type: 'array',
          description: 'Names of each series when multi_data is given',
          items: { type: 'string' },
        },
        multi_data: {
          type: 'array',
          description: 'Several series, one array of numbers per series',
          items: { type: 'array', items: { type: 'number' } },
        },
        colors: {
          type: 'array',
          description: 'Optional series colors as hex codes',
          items: { type: 'string' },
        },
      },
      required: ['graph_type', 'title'],
    },
  },
  render_mermaid: {
    name: 'render_mermaid',
    description:
      'Saves a Mermaid diagram (flowchart, sequence, class, state, gantt, pie, quadrant, mindmap, timeline, xychart and others) for the report.',
    inputSchema: {
      type: 'object',
      properties: {
        mermaid_code: { type: 'string', description: 'Mermaid source code of the diagram' },
        title: { type: 'string', description: 'Optional diagram title' },
      },
      required: ['mermaid_code'],
    },
  },
  write: {
    name: 'write',
    description: 'Appends text to a file inside the report directory.',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string', description: 'Text to append' },
        path: { type: 'string', description: 'File path relative to the report directory' },
      },
      required: ['content', 'path'],
    },
  },
  is_finished: {
    name: 'is_finished',
    description: 'Call when tool use is complete and the next step can begin.',
    inputSchema: { type: 'object', properties: {}, required: [] },
  },
};

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}
