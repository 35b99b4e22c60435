/**
 * Chunked Report Generator
 *
 * Writes the report over several model calls. The research material sits in
 * the system prompt, and every chunk the model writes is appended to it, so
 * each call sees the whole report so far and only needs a short
 * "continue" instruction. Generation stops when a completion marker appears
 * in the tail of a chunk, or when the attempt budget runs out; the latter
 * still returns the text written so far.
 */
import type { Message, ModelClient } from '../llm/types.js';
import { messageText, textMessage } from '../llm/types.js';
import { ReportGenerationError, errorMessage } from '../utils/errors.js';
import { preview, researchLogger, type Logger } from '../utils/logger.js';
import type { ResearchMode } from '../config/schema.js';
import type { CitationLedger } from './citations.js';
import { removeThinking } from './discussion.js';
import { continuationRequest, reportRequest, reportSystemPrompt } from './prompts.js';

export interface ReportGeneratorOptions {
  modelId: string;
  mode: ResearchMode;
  granularity: 'chapter' | 'full';
  maxAttempts: number;
  completionMarkers: readonly string[];
  markerTailLength: number;
  temperature: number;
  maxTokens: number;
  topP?: number;
  referenceTitle: string;
  logger?: Logger;
}

export interface ReportInput {
  topic: string;
  strategy: string;
  researchText: string;
}

export interface GeneratedReport {
  text: string;
  attempts: number;
  /** False when the attempt budget ran out before a completion marker. */
  completed: boolean;
}

/**
 * Position of the earliest completion marker that lies wholly inside the
 * last `tailLength` characters of `text`, or -1.
 */
export function findCompletionMarker(text: string, markers: readonly string[], tailLength: number): number {
  const tailStart = Math.max(0, text.length - tailLength);
  const tail = text.slice(tailStart);

  let found = -1;
  for (const marker of markers) {
    const index = tail.indexOf(marker);
    if (index >= 0 && (found < 0 || tailStart + index < found)) {
      found = tailStart + index;
    }
  }
  return found;
}

export class ChunkedReportGenerator {
  private readonly model: ModelClient;
  private readonly ledger: CitationLedger;
  private readonly options: ReportGeneratorOptions;
  private readonly logger: Logger;

  constructor(model: ModelClient, ledger: CitationLedger, options: ReportGeneratorOptions) {
    this.model = model;
    this.ledger = ledger;
    this.options = options;
    this.logger = options.logger ?? researchLogger;
  }

  async generate(input: ReportInput): Promise<GeneratedReport> {
    const { mode, granularity, maxAttempts, completionMarkers, markerTailLength } = this.options;

    let systemPrompt = reportSystemPrompt(input.researchText);
    let messages: Message[] = [textMessage('user', reportRequest(input.topic, input.strategy, mode, completionMarkers))];
    const chunks: string[] = [];
    let completed = false;

    while (chunks.length < maxAttempts) {
      const chunk = await this.write(systemPrompt, messages, chunks.length + 1);
      systemPrompt += `\n\n${chunk}`;

      const marker = findCompletionMarker(chunk, completionMarkers, markerTailLength);
      if (marker >= 0) {
        chunks.push(chunk.slice(0, marker).trimEnd());
        completed = true;
        break;
      }

      chunks.push(chunk);
      messages = [textMessage('user', continuationRequest(granularity, completionMarkers))];
    }

    if (!completed) {
      this.logger.warn({ attempts: chunks.length }, 'Report attempt limit reached without a completion marker');
    }

    // A chunk may stop mid-sentence; the next one continues it verbatim
    const body = chunks.join('').trimEnd();
    const references = this.ledger.toMarkdown(this.options.referenceTitle);
    const text = references ? `${body}\n\n${references}` : body;

    this.logger.info({ attempts: chunks.length, completed, chars: text.length, sources: this.ledger.size }, 'Report generated');
    return { text, attempts: chunks.length, completed };
  }

  private async write(systemPrompt: string, messages: Message[], attempt: number): Promise<string> {
    const { modelId, temperature, maxTokens, topP } = this.options;
    try {
      const response = await this.model.generateResponse({
        modelId,
        systemPrompt,
        messages,
        inference: { temperature, maxTokens, topP },
      });
      const chunk = removeThinking(messageText(response.message));
      this.logger.debug({ attempt, tail: preview(chunk.slice(-100)) }, 'Report chunk received');
      return chunk;
    } catch (error) {
      throw new ReportGenerationError(`Report generation failed on attempt ${attempt}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
