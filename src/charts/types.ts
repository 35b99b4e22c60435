/**
 * Chart Type Definitions
 *
 * Structured chart input accepted from the model and the artifacts saved
 * for the report. Charts are emitted as Mermaid source and rendered by
 * mermaid.js when the HTML report is opened or printed.
 */

export const GRAPH_TYPES = ['line', 'bar', 'pie', 'scatter', 'horizontal_bar'] as const;

export type GraphType = (typeof GRAPH_TYPES)[number];

/**
 * Chart request. Either `data` (one series) or `multiData` (several) must be
 * present; `labels` name the x axis categories or pie slices.
 */
export interface GraphDefinition {
  graphType: GraphType;
  title: string;
  xLabel?: string;
  yLabel?: string;
  labels?: string[];
  data?: number[];
  seriesLabels?: string[];
  multiData?: number[][];
  colors?: string[];
}

export type ArtifactKind = 'graph' | 'diagram' | 'image';

/** Something a tool saved under the report directory. */
export interface ReportArtifact {
  kind: ArtifactKind;
  /** Relative to the report directory. */
  path: string;
  title: string;
  mermaid?: string;
  description?: string;
}
