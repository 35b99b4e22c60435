/**
 * Research Manager
 *
 * Runs one research job end to end:
 *
 *   context -> discussion -> survey -> visualization -> report -> render
 *
 * Stages run strictly one after another and share one Conversation (saved
 * to YAML after every append) and one CitationLedger. Any failure inside a
 * stage is rethrown as a ResearchStageError carrying the stage name; no
 * partial report is written after a stage fails.
 */
import { basename, join } from 'node:path';
import type { ReportArtifact } from '../charts/types.js';
import type { ResearchConfig } from '../config/settings.js';
import { createModelGateway } from '../llm/gateway.js';
import type { ModelClient } from '../llm/types.js';
import { ToolDispatcher } from '../tools/dispatcher.js';
import { createToolHandlers } from '../tools/handlers.js';
import { ImageCollector } from '../tools/images.js';
import { BraveSearchClient } from '../tools/search.js';
import { WebReader, type ImageDescriber } from '../tools/web-reader.js';
import { saveReport } from '../render/report.js';
import { ResearchStageError, errorMessage } from '../utils/errors.js';
import { researchLogger, type Logger } from '../utils/logger.js';
import { CitationLedger } from './citations.js';
import { AgenticCollectionLoop, summarizeResults, type CollectedResult, type CollectionResult } from './collection-loop.js';
import { Conversation, ConversationStore, loadConversation } from './conversation.js';
import { DualModelDiscussion } from './discussion.js';
import { contextSystemPrompt, contextTask, surveySystemPrompt, surveyTask } from './prompts.js';
import { ChunkedReportGenerator } from './report-generator.js';
import { VisualizationPlanner, type Figure } from './visualization.js';

export type ResearchStage = 'context' | 'discussion' | 'survey' | 'visualization' | 'report' | 'render';

/** Per-request timeout for search, page and image fetches. */
const TOOL_TIMEOUT_MS = 60_000;

const CONTEXT_TOOLS = ['search', 'get_content', 'is_finished'] as const;
const SURVEY_TOOLS = ['search', 'get_content', 'image_search', 'generate_graph', 'is_finished'] as const;
const VISUALIZATION_TOOLS = ['generate_graph', 'render_mermaid', 'is_finished'] as const;

/** Arguments for the direct call made when the must-use tool was never used. */
const FORCED_ARGS: Partial<Record<string, (topic: string) => Record<string, unknown>>> = {
  image_search: (topic) => ({ query: topic }),
  search: (topic) => ({ query: topic }),
};

export interface ResearchDependencies {
  model: ModelClient;
  describer?: ImageDescriber;
  search?: Pick<BraveSearchClient, 'search' | 'imageSearch'>;
  fetch?: typeof fetch;
  now?: () => Date;
  logger?: Logger;
}

export interface RunOptions {
  /** Conversation file from an earlier run to continue. */
  resumePath?: string;
  /** Overrides `pdf.enabled` when false. */
  pdf?: boolean;
}

export interface ResearchOutcome {
  reportDir: string;
  markdownPath: string;
  htmlPath: string;
  pdfPath?: string;
  conversationPath: string;
  /** The report hit the attempt limit before the model marked it complete. */
  truncated: boolean;
  /** False when the must-use tool never returned a successful result. */
  mustUseSatisfied: boolean;
}

export function buildResearchText(
  results: readonly CollectedResult[],
  images: readonly ReportArtifact[],
  figures: readonly Figure[]
): string {
  const sections = [`## Research results\n\n${summarizeResults(results) || '(no results)'}`];

  if (images.length > 0) {
    const lines = images.map((image) => {
      const description = image.description ? `: ${image.description}` : '';
      return `- ![${image.title}](${image.path})${description}`;
    });
    sections.push(`## Images\n\n${lines.join('\n')}`);
  }

  if (figures.length > 0) {
    const blocks = figures.map((figure) => `### ${figure.title}\n\n\`\`\`mermaid\n${figure.mermaid}\n\`\`\``);
    sections.push(`## Figures\n\n${blocks.join('\n\n')}`);
  }

  return sections.join('\n\n');
}

function artifactsOf(results: readonly CollectedResult[], kind: ReportArtifact['kind']): ReportArtifact[] {
  return results.flatMap((r) => r.artifacts.filter((a) => a.kind === kind));
}

export class ResearchManager {
  private readonly config: ResearchConfig;
  private readonly deps: ResearchDependencies;
  private readonly logger: Logger;

  constructor(config: ResearchConfig, deps: ResearchDependencies) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger ?? researchLogger;
  }

  async run(topic: string, options: RunOptions = {}): Promise<ResearchOutcome> {
    const { config, deps } = this;
    const { models, limits, inference } = config;
    const startedAt = deps.now?.() ?? new Date();

    const conversation = options.resumePath ? loadConversation(options.resumePath) : new Conversation();
    const store = options.resumePath
      ? new ConversationStore(options.resumePath)
      : ConversationStore.forRun(config.report.conversationDir, startedAt);
    store.attach(conversation);

    // The report directory shares its name with the conversation file
    const reportDir = join(config.report.outputDir, basename(store.path, '.yaml'));
    this.logger.info({ topic, mode: config.mode, reportDir, conversation: store.path }, 'Research run started');

    const handlers = createToolHandlers(this.createToolClients(reportDir));
    const ledger = new CitationLedger();

    const context = await this.stage('context', () =>
      new AgenticCollectionLoop(deps.model, new ToolDispatcher(CONTEXT_TOOLS, handlers), ledger, conversation, {
        channel: 'context',
        modelId: models.primary,
        systemPrompt: contextSystemPrompt(limits.context_iterations),
        maxIterations: limits.context_iterations,
        maxTokens: inference.maxTokens,
        topP: inference.topP,
        logger: this.logger,
      }).run(contextTask(topic))
    );

    const { strategy } = await this.stage('discussion', () =>
      new DualModelDiscussion(deps.model, conversation, {
        primaryModel: models.primary,
        secondaryModel: models.secondary,
        turns: limits.discussion_turns,
        temperature: inference.discussionTemperature,
        maxTokens: inference.maxTokens,
        topP: inference.topP,
        logger: this.logger,
      }).run(topic, summarizeResults(context.results))
    );

    const surveyDispatcher = new ToolDispatcher(SURVEY_TOOLS, handlers);
    const survey = await this.stage('survey', async () => {
      const collected = await new AgenticCollectionLoop(deps.model, surveyDispatcher, ledger, conversation, {
        channel: 'survey',
        modelId: models.primary,
        systemPrompt: surveySystemPrompt(limits.survey_iterations, config.policy.mustUseTool),
        maxIterations: limits.survey_iterations,
        maxTokens: inference.maxTokens,
        topP: inference.topP,
        mustUseTool: config.policy.mustUseTool,
        logger: this.logger,
      }).run(surveyTask(topic, strategy));
      return this.forceMustUse(collected, surveyDispatcher, topic);
    });

    const material = summarizeResults(survey.results);
    const visualization = await this.stage('visualization', () =>
      new VisualizationPlanner(deps.model, new ToolDispatcher(VISUALIZATION_TOOLS, handlers), ledger, conversation, {
        modelId: models.primary,
        maxIterations: limits.visualization_iterations,
        maxTokens: inference.maxTokens,
        topP: inference.topP,
        logger: this.logger,
      }).run(topic, material)
    );

    const figures = [...visualization.figures];
    for (const graph of artifactsOf(survey.results, 'graph')) {
      if (!figures.some((f) => f.path === graph.path)) {
        figures.push({ title: graph.title, kind: 'graph', path: graph.path, mermaid: graph.mermaid ?? '' });
      }
    }

    const report = await this.stage('report', () =>
      new ChunkedReportGenerator(deps.model, ledger, {
        modelId: models.primary,
        mode: config.mode,
        granularity: config.report.granularity,
        maxAttempts: limits.report_attempts,
        completionMarkers: config.report.completionMarkers,
        markerTailLength: config.report.markerTailLength,
        temperature: inference.reportTemperature,
        maxTokens: inference.maxTokens,
        topP: inference.topP,
        referenceTitle: config.report.referenceTitle,
        logger: this.logger,
      }).generate({
        topic,
        strategy,
        researchText: buildResearchText(survey.results, artifactsOf(survey.results, 'image'), figures),
      })
    );

    const saved = await this.stage('render', () =>
      saveReport(reportDir, topic, report.text, {
        createdAt: startedAt,
        pdf: {
          enabled: config.pdf.enabled && options.pdf !== false,
          browserExecutable: config.pdf.browserExecutable,
          renderWaitMs: config.pdf.renderWaitMs,
        },
        logger: this.logger,
      })
    );

    const mustUseSatisfied = survey.mustUseSatisfied;
    this.logger.info({ ...saved, truncated: !report.completed, mustUseSatisfied }, 'Research run finished');
    return { reportDir, ...saved, conversationPath: store.path, truncated: !report.completed, mustUseSatisfied };
  }

  private async stage<T>(stage: ResearchStage, task: () => Promise<T>): Promise<T> {
    this.logger.info({ stage }, 'Stage started');
    try {
      const result = await task();
      this.logger.info({ stage }, 'Stage completed');
      return result;
    } catch (error) {
      this.logger.error(
        { stage, error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined },
        'Stage failed'
      );
      throw new ResearchStageError(stage, error);
    }
  }

  /**
   * Calls the must-use tool directly once when the survey loop never did, so
   * the report still gets its artifacts.
   */
  private async forceMustUse(
    collected: CollectionResult,
    dispatcher: ToolDispatcher,
    topic: string
  ): Promise<CollectionResult> {
    const tool = this.config.policy.mustUseTool;
    const args = tool ? FORCED_ARGS[tool] : undefined;
    if (collected.mustUseSatisfied || !tool || !args) {
      return collected;
    }

    this.logger.warn({ tool, topic }, 'Must-use tool was never called; invoking it directly');
    const input = args(topic);
    const dispatched = await dispatcher.dispatch(tool, input);
    const forced: CollectedResult = {
      toolUseId: `forced_${crypto.randomUUID()}`,
      toolName: tool,
      input,
      text: dispatched.text,
      isError: dispatched.isError,
      artifacts: dispatched.artifacts,
    };
    if (dispatched.isError) {
      this.logger.warn({ tool, error: dispatched.text }, 'Forced must-use call failed');
    }
    return { ...collected, results: [...collected.results, forced], mustUseSatisfied: !dispatched.isError };
  }

  private createToolClients(reportDir: string) {
    const { config, deps } = this;
    const search =
      deps.search ??
      new BraveSearchClient({
        apiKey: config.search.braveApiKey,
        resultsPerQuery: config.search.resultsPerQuery,
        timeoutMs: TOOL_TIMEOUT_MS,
        fetch: deps.fetch,
      });

    const reader = new WebReader({
      maxBytes: config.documents.maxBytes,
      maxContentChars: config.documents.maxContentChars,
      describeImages: config.images.describe,
      allowedImageFormats: config.images.allowedFormats,
      describer: deps.describer,
      timeoutMs: TOOL_TIMEOUT_MS,
      fetch: deps.fetch,
    });

    const images = new ImageCollector({
      search,
      reportDir,
      defaultMaxResults: config.search.maxImages,
      maxBytes: config.images.maxBytes,
      allowedFormats: config.images.allowedFormats,
      describeImages: config.images.describe,
      describer: deps.describer,
      timeoutMs: TOOL_TIMEOUT_MS,
      fetch: deps.fetch,
    });

    return { search, reader, images, reportDir };
  }
}

export function createResearchManager(config: ResearchConfig, logger?: Logger): ResearchManager {
  const gateway = createModelGateway(config);
  return new ResearchManager(config, { model: gateway, describer: gateway, logger });
}
