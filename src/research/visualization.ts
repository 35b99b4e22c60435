/**
 * Visualization Planner
 *
 * Plans the report's figures with one JSON call, then lets the model build
 * them in a collection loop restricted to the chart and diagram tools.
 */
import { z } from 'zod';
import type { ModelClient } from '../llm/types.js';
import { messageText, textMessage } from '../llm/types.js';
import type { ToolDispatcher } from '../tools/dispatcher.js';
import { errorMessage } from '../utils/errors.js';
import { researchLogger, type Logger } from '../utils/logger.js';
import { err, ok, type Result } from '../utils/result.js';
import type { CitationLedger } from './citations.js';
import { AgenticCollectionLoop } from './collection-loop.js';
import type { Conversation } from './conversation.js';
import {
  VISUALIZATION_PLAN_PROMPT,
  visualizationPlanRequest,
  visualizationSystemPrompt,
  visualizationTask,
} from './prompts.js';

const PlanEntrySchema = z.object({
  kind: z.enum(['graph', 'diagram']),
  subtype: z.string().default(''),
  title: z.string().min(1),
  purpose: z.string().default(''),
  dataNeeded: z
    .union([z.string(), z.array(z.string())])
    .default('')
    .transform((value) => (Array.isArray(value) ? value.join(', ') : value)),
});

const PlanSchema = z.array(PlanEntrySchema);

export type PlanEntry = z.infer<typeof PlanEntrySchema>;

export interface PlannedFigure extends PlanEntry {
  artifactPath?: string;
}

export interface Figure {
  title: string;
  kind: 'graph' | 'diagram';
  path: string;
  mermaid: string;
}

export interface VisualizationResult {
  plan: PlannedFigure[];
  figures: Figure[];
}

export interface VisualizationOptions {
  modelId: string;
  maxIterations: number;
  maxTokens?: number;
  topP?: number;
  logger?: Logger;
}

const PLAN_IN_TASK = /### FIGURE PLAN\n([\s\S]*?)\n\n### RESEARCH MATERIAL/;

function stripCodeFence(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(text);
  if (fenced) {
    return fenced[1].trim();
  }
  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  return start >= 0 && end > start ? text.slice(start, end + 1) : text.trim();
}

export function parseVisualizationPlan(text: string): Result<PlanEntry[], string> {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(text));
  } catch (error) {
    return err(`plan is not JSON: ${errorMessage(error)}`);
  }

  const parsed = PlanSchema.safeParse(raw);
  if (!parsed.success) {
    return err(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '));
  }
  return ok(parsed.data);
}

function normalizeTitle(title: string): string {
  return title.trim().toLowerCase();
}

export class VisualizationPlanner {
  private readonly model: ModelClient;
  private readonly dispatcher: ToolDispatcher;
  private readonly ledger: CitationLedger;
  private readonly conversation: Conversation;
  private readonly options: VisualizationOptions;
  private readonly logger: Logger;

  constructor(
    model: ModelClient,
    dispatcher: ToolDispatcher,
    ledger: CitationLedger,
    conversation: Conversation,
    options: VisualizationOptions
  ) {
    this.model = model;
    this.dispatcher = dispatcher;
    this.ledger = ledger;
    this.conversation = conversation;
    this.options = options;
    this.logger = options.logger ?? researchLogger;
  }

  async run(topic: string, material: string): Promise<VisualizationResult> {
    const plan = this.conversation.isEmpty('visualization')
      ? await this.plan(topic, material)
      : this.savedPlan();

    if (plan.length === 0) {
      this.logger.info('No figures planned');
      return { plan: [], figures: [] };
    }

    const loop = new AgenticCollectionLoop(this.model, this.dispatcher, this.ledger, this.conversation, {
      channel: 'visualization',
      modelId: this.options.modelId,
      systemPrompt: visualizationSystemPrompt(this.options.maxIterations),
      maxIterations: this.options.maxIterations,
      maxTokens: this.options.maxTokens,
      topP: this.options.topP,
      logger: this.logger,
    });
    const collected = await loop.run(visualizationTask(JSON.stringify(plan, null, 2), material));

    const figures: Figure[] = [];
    for (const result of collected.results) {
      for (const artifact of result.artifacts) {
        if (artifact.kind === 'image') continue;
        figures.push({ title: artifact.title, kind: artifact.kind, path: artifact.path, mermaid: artifact.mermaid ?? '' });
      }
    }

    const planned: PlannedFigure[] = plan.map((entry) => {
      const match = figures.find((f) => normalizeTitle(f.title) === normalizeTitle(entry.title));
      return match ? { ...entry, artifactPath: match.path } : { ...entry };
    });

    this.logger.info(
      { planned: plan.length, built: figures.length, matched: planned.filter((p) => p.artifactPath).length },
      'Visualization finished'
    );
    return { plan: planned, figures };
  }

  private async plan(topic: string, material: string): Promise<PlanEntry[]> {
    const response = await this.model.generateResponse({
      modelId: this.options.modelId,
      systemPrompt: VISUALIZATION_PLAN_PROMPT,
      messages: [textMessage('user', visualizationPlanRequest(topic, material))],
      inference: { temperature: 0, maxTokens: this.options.maxTokens },
    });

    const parsed = parseVisualizationPlan(messageText(response.message));
    if (!parsed.ok) {
      this.logger.warn({ error: parsed.error }, 'Visualization plan was invalid; continuing without figures');
      return [];
    }
    return parsed.value;
  }

  /** Reads the plan back out of the task that seeded a resumed channel. */
  private savedPlan(): PlanEntry[] {
    const first = this.conversation.messages('visualization').at(0);
    const match = first ? PLAN_IN_TASK.exec(messageText(first)) : null;
    if (!match) {
      return [];
    }
    const parsed = parseVisualizationPlan(match[1]);
    return parsed.ok ? parsed.value : [];
  }
}
