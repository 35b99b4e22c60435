/**
 * Agentic Collection Loop
 *
 * Drives a tool-using model on one conversation channel until it signals
 * completion or runs out of iterations. Each iteration is one model call at
 * temperature 0 followed by at most one tool dispatch. Tool failures go back
 * to the model as error results; model failures abort the loop.
 *
 * The loop can pick up a channel that already holds messages (a resumed run):
 * earlier assistant turns count against the iteration budget, earlier tool
 * results are part of the returned data, and fetched pages are registered
 * with the citation ledger again in their original order.
 */
import type { ReportArtifact } from '../charts/types.js';
import type { Message, ModelClient, ToolResultBlock } from '../llm/types.js';
import { FINISH_TOOL } from '../tools/definitions.js';
import {
  extractToolInvocations,
  type DispatchResult,
  type ToolDispatcher,
  type ToolSource,
} from '../tools/dispatcher.js';
import { FINISHED_TEXT, parseToolArtifacts } from '../tools/handlers.js';
import { DataCollectionError, errorMessage } from '../utils/errors.js';
import { preview, researchLogger, type Logger } from '../utils/logger.js';
import type { CitationLedger } from './citations.js';
import type { Channel, Conversation } from './conversation.js';
import { INTERRUPTED_TEXT, SKIPPED_TOOL_TEXT, finishRefusal, mustUseNudge } from './prompts.js';

export type LoopOutcome = 'finished' | 'exhausted';

export interface CollectedResult {
  toolUseId: string;
  toolName: string;
  input: Record<string, unknown>;
  text: string;
  isError: boolean;
  citation?: string;
  source?: ToolSource;
  artifacts: ReportArtifact[];
}

export interface CollectionResult {
  outcome: LoopOutcome;
  /** Assistant turns on the channel, including any from before a resume. */
  iterations: number;
  results: CollectedResult[];
  /** True when no must-use tool is configured for this loop. */
  mustUseSatisfied: boolean;
}

export interface CollectionLoopOptions {
  channel: Channel;
  modelId: string;
  systemPrompt: string;
  maxIterations: number;
  maxTokens?: number;
  topP?: number;
  mustUseTool?: string | null;
  logger?: Logger;
}

interface LoopState {
  iterations: number;
  results: CollectedResult[];
  finished: boolean;
  mustUseUsed: boolean;
  nudged: boolean;
}

const CITATION_SUFFIX = /\n\n(\[※\d+\])$/;

function toolResult(toolUseId: string, text: string, isError: boolean): ToolResultBlock {
  return isError
    ? { type: 'tool_result', toolUseId, status: 'error', content: [{ text }] }
    : { type: 'tool_result', toolUseId, content: [{ text }] };
}

function resultText(block: ToolResultBlock): string {
  return block.content.map((c) => c.text).join('\n');
}

/**
 * Joins the successful results into one block of text for a later prompt.
 */
export function summarizeResults(results: readonly CollectedResult[]): string {
  return results
    .filter((r) => !r.isError)
    .map((r) => {
      const label = r.source ? `${r.toolName}: ${r.source.url}` : `${r.toolName}: ${JSON.stringify(r.input)}`;
      return `### ${label}\n${r.text}`;
    })
    .join('\n\n');
}

export class AgenticCollectionLoop {
  private readonly model: ModelClient;
  private readonly dispatcher: ToolDispatcher;
  private readonly ledger: CitationLedger;
  private readonly conversation: Conversation;
  private readonly options: CollectionLoopOptions;
  private readonly logger: Logger;

  constructor(
    model: ModelClient,
    dispatcher: ToolDispatcher,
    ledger: CitationLedger,
    conversation: Conversation,
    options: CollectionLoopOptions
  ) {
    this.model = model;
    this.dispatcher = dispatcher;
    this.ledger = ledger;
    this.conversation = conversation;
    this.options = options;
    this.logger = options.logger ?? researchLogger;
  }

  /** The must-use tool, when the policy applies to this loop's tool set. */
  private get mustUseTool(): string | null {
    const tool = this.options.mustUseTool;
    return tool && this.dispatcher.has(tool) ? tool : null;
  }

  async run(task: string): Promise<CollectionResult> {
    const { channel, maxIterations } = this.options;

    if (this.conversation.isEmpty(channel)) {
      this.conversation.appendUserText(channel, task);
    }
    this.answerInterrupted();

    const state = this.replay();
    if (state.iterations > 0) {
      this.logger.info(
        { channel, iterations: state.iterations, results: state.results.length, finished: state.finished },
        'Resuming collection'
      );
    }

    while (!state.finished && state.iterations < maxIterations) {
      await this.step(state);
    }

    const outcome: LoopOutcome = state.finished ? 'finished' : 'exhausted';
    const mustUseSatisfied = this.mustUseTool === null || state.mustUseUsed;
    this.logger.info(
      { channel, outcome, iterations: state.iterations, results: state.results.length, mustUseSatisfied },
      'Collection loop ended'
    );

    return { outcome, iterations: state.iterations, results: state.results, mustUseSatisfied };
  }

  private async step(state: LoopState): Promise<void> {
    const { channel, maxIterations } = this.options;
    const mustUse = this.mustUseTool;
    const mustUsePending = mustUse !== null && !state.mustUseUsed;

    if (mustUsePending && !state.nudged && state.iterations + 1 >= maxIterations - 1) {
      this.conversation.appendUserText(channel, mustUseNudge(mustUse));
      state.nudged = true;
    }

    const message = await this.callModel();
    state.iterations++;
    this.conversation.append(channel, message);

    const invocations = extractToolInvocations(message);
    const invocation = invocations.at(0);
    const canRefuse = mustUsePending && state.iterations < maxIterations;

    if (!invocation) {
      if (canRefuse) {
        this.logger.info({ channel, tool: mustUse }, 'Refusing to finish before the must-use tool ran');
        this.conversation.appendUserText(channel, finishRefusal(mustUse));
        return;
      }
      state.finished = true;
      return;
    }

    const blocks: ToolResultBlock[] = [];

    if (invocation.name === FINISH_TOOL) {
      if (canRefuse) {
        this.logger.info({ channel, tool: mustUse }, 'Refusing to finish before the must-use tool ran');
        blocks.push(toolResult(invocation.id, finishRefusal(mustUse), true));
      } else {
        blocks.push(toolResult(invocation.id, FINISHED_TEXT, false));
        state.finished = true;
      }
    } else {
      const dispatched = await this.dispatchTool(invocation.name, invocation.input);
      let text = dispatched.text.trim();
      let citation: string | undefined;

      if (!dispatched.isError && dispatched.source) {
        citation = this.ledger.registerSource(dispatched.source.url, dispatched.source.title);
        text = `${text}\n\n${citation}`;
      }

      state.results.push({
        toolUseId: invocation.id,
        toolName: invocation.name,
        input: invocation.input,
        text,
        isError: dispatched.isError,
        citation,
        source: dispatched.source,
        artifacts: dispatched.artifacts,
      });
      if (invocation.name === mustUse) {
        state.mustUseUsed = true;
      }
      blocks.push(toolResult(invocation.id, text, dispatched.isError));
    }

    for (const skipped of invocations.slice(1)) {
      blocks.push(toolResult(skipped.id, SKIPPED_TOOL_TEXT, true));
    }
    this.conversation.append(channel, { role: 'user', content: blocks });
  }

  private async dispatchTool(name: string, input: unknown): Promise<DispatchResult> {
    try {
      return await this.dispatcher.dispatch(name, input);
    } catch (error) {
      const { channel } = this.options;
      this.logger.error({ channel, tool: name, error: errorMessage(error) }, 'Tool dispatch failed during collection');
      throw new DataCollectionError(`Collection on "${channel}" failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async callModel(): Promise<Message> {
    const { channel, modelId, systemPrompt, maxTokens, topP } = this.options;
    try {
      const response = await this.model.generateResponse({
        modelId,
        systemPrompt,
        messages: this.conversation.messages(channel),
        inference: { temperature: 0, maxTokens, topP },
        tools: this.dispatcher.definitions,
      });
      return response.message;
    } catch (error) {
      this.logger.error({ channel, error: errorMessage(error) }, 'Model call failed during collection');
      throw new DataCollectionError(`Collection on "${channel}" failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * A run stopped between a tool request and its result leaves the channel
   * ending in an assistant tool request. Answer every open id so the model
   * sees a well-formed transcript.
   */
  private answerInterrupted(): void {
    const { channel } = this.options;
    const last = this.conversation.lastMessage(channel);
    if (last?.role !== 'assistant') {
      return;
    }

    const open = extractToolInvocations(last);
    if (open.length === 0) {
      return;
    }

    this.logger.warn({ channel, tools: open.map((i) => i.name) }, 'Answering interrupted tool requests');
    this.conversation.append(channel, {
      role: 'user',
      content: open.map((invocation) => toolResult(invocation.id, INTERRUPTED_TEXT, true)),
    });
  }

  /** Rebuilds loop state from what the channel already holds. */
  private replay(): LoopState {
    const { channel } = this.options;
    const mustUse = this.mustUseTool;
    const messages = this.conversation.messages(channel);
    const requests = new Map<string, { name: string; input: Record<string, unknown> }>();
    const state: LoopState = { iterations: 0, results: [], finished: false, mustUseUsed: false, nudged: false };
    const nudge = mustUse ? mustUseNudge(mustUse) : null;

    for (const message of messages) {
      if (message.role === 'assistant') {
        state.iterations++;
        for (const invocation of extractToolInvocations(message)) {
          requests.set(invocation.id, { name: invocation.name, input: invocation.input });
        }
        continue;
      }

      for (const block of message.content) {
        if (block.type === 'text' && block.text === nudge) {
          state.nudged = true;
        }
        if (block.type !== 'tool_result') {
          continue;
        }

        const request = requests.get(block.toolUseId);
        const text = resultText(block);
        if (!request || text === INTERRUPTED_TEXT || text === SKIPPED_TOOL_TEXT) {
          continue;
        }
        if (request.name === FINISH_TOOL) {
          state.finished = block.status !== 'error';
          continue;
        }

        state.results.push(this.replayResult(block, request.name, request.input, text));
        if (request.name === mustUse) {
          state.mustUseUsed = true;
        }
      }
    }

    // A final assistant turn without a tool request ended the loop
    const last = messages.at(-1);
    if (last?.role === 'assistant' && extractToolInvocations(last).length === 0) {
      state.finished = true;
    }

    return state;
  }

  private replayResult(
    block: ToolResultBlock,
    toolName: string,
    input: Record<string, unknown>,
    text: string
  ): CollectedResult {
    const isError = block.status === 'error';
    const result: CollectedResult = {
      toolUseId: block.toolUseId,
      toolName,
      input,
      text,
      isError,
      artifacts: isError ? [] : parseToolArtifacts(toolName, text),
    };

    const url = input['url'];
    if (isError || typeof url !== 'string' || !CITATION_SUFFIX.test(text)) {
      return result;
    }

    const title = /^Title: (.*)$/m.exec(text)?.[1]?.trim() ?? url;
    result.source = { url, title };
    result.citation = this.ledger.registerSource(url, title);
    if (!text.endsWith(result.citation)) {
      this.logger.warn({ url, expected: preview(text.slice(-20)), citation: result.citation }, 'Citation number changed on resume');
    }
    return result;
  }
}
