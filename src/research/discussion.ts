/**
 * Dual Model Discussion
 *
 * Two models plan the research by talking to each other. Each participant
 * owns one channel: the proposer (primary model) on `proposer`, the critic
 * (secondary model) on `critic`. An utterance is appended to the speaker's
 * channel as `assistant` and copied to the other channel as `user`, so each
 * model only ever extends a plain two-party conversation.
 *
 * After a fixed number of rounds the proposer's history is condensed into the
 * research strategy by one zero-temperature call.
 */
import type { Message, ModelClient } from '../llm/types.js';
import { messageText, textMessage } from '../llm/types.js';
import { preview, researchLogger, type Logger } from '../utils/logger.js';
import type { Channel, Conversation } from './conversation.js';
import { STRATEGY_REQUEST, STRATEGY_SYSTEM_PROMPT, discussionFraming, discussionSystemPrompt } from './prompts.js';

export interface DiscussionOptions {
  primaryModel: string;
  secondaryModel: string;
  turns: number;
  temperature: number;
  maxTokens?: number;
  topP?: number;
  logger?: Logger;
}

export interface DiscussionResult {
  strategy: string;
  /** Model calls made by this run; 0 when the strategy was already saved. */
  calls: number;
}

/**
 * Removes `<think>` reasoning blocks and the whitespace right after them,
 * leaving the rest of the text as written.
 */
export function removeThinking(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>\s*/g, '');
}

/** Removes `<think>` reasoning some models emit before their answer. */
export function stripThinking(text: string): string {
  return removeThinking(text).trim();
}

export class DualModelDiscussion {
  private readonly model: ModelClient;
  private readonly conversation: Conversation;
  private readonly options: DiscussionOptions;
  private readonly logger: Logger;
  private calls = 0;

  constructor(model: ModelClient, conversation: Conversation, options: DiscussionOptions) {
    this.model = model;
    this.conversation = conversation;
    this.options = options;
    this.logger = options.logger ?? researchLogger;
  }

  async run(topic: string, background: string): Promise<DiscussionResult> {
    this.calls = 0;

    const saved = this.savedStrategy();
    if (saved !== null) {
      this.logger.info({ strategy: preview(saved) }, 'Reusing saved research strategy');
      return { strategy: saved, calls: 0 };
    }

    const { turns } = this.options;
    const framing = discussionFraming(topic, background);
    if (this.conversation.isEmpty('proposer')) {
      this.conversation.appendUserText('proposer', framing);
    }

    let proposerTurns = this.conversation.count('proposer', 'assistant');
    let criticTurns = this.conversation.count('critic', 'assistant');

    while (criticTurns < turns) {
      if (proposerTurns <= criticTurns) {
        const utterance = await this.speak('proposer', this.options.primaryModel);
        if (this.conversation.isEmpty('critic')) {
          this.conversation.appendUserText('critic', framing);
        }
        this.conversation.appendUserText('critic', utterance);
        proposerTurns++;
      } else {
        const utterance = await this.speak('critic', this.options.secondaryModel);
        this.conversation.appendUserText('proposer', utterance);
        criticTurns++;
      }
      this.logger.info({ proposerTurns, criticTurns, turns }, 'Discussion turn completed');
    }

    const strategy = await this.summarize();
    return { strategy, calls: this.calls };
  }

  private async speak(channel: Channel, modelId: string): Promise<string> {
    const { turns, temperature, maxTokens, topP } = this.options;
    const response = await this.model.generateResponse({
      modelId,
      systemPrompt: discussionSystemPrompt(turns),
      messages: this.conversation.messages(channel),
      inference: { temperature, maxTokens, topP },
    });
    this.calls++;

    this.conversation.append(channel, response.message);
    const utterance = stripThinking(messageText(response.message));
    this.logger.debug({ channel, utterance: preview(utterance) }, 'Discussion utterance');
    return utterance;
  }

  private async summarize(): Promise<string> {
    const history = this.conversation.messages('proposer');
    const last = history.at(-1);

    // The request joins the critic's final utterance when that is the last turn
    const messages: Message[] =
      last?.role === 'user'
        ? [...history.slice(0, -1), { role: 'user', content: [...last.content, { type: 'text', text: STRATEGY_REQUEST }] }]
        : [...history, textMessage('user', STRATEGY_REQUEST)];

    const response = await this.model.generateResponse({
      modelId: this.options.primaryModel,
      systemPrompt: STRATEGY_SYSTEM_PROMPT,
      messages,
      inference: { temperature: 0, maxTokens: this.options.maxTokens },
    });
    this.calls++;

    const strategy = stripThinking(messageText(response.message));
    this.conversation.appendUserText('strategy', STRATEGY_REQUEST);
    this.conversation.append('strategy', textMessage('assistant', strategy));
    this.logger.info({ strategy: preview(strategy) }, 'Research strategy ready');
    return strategy;
  }

  private savedStrategy(): string | null {
    const last = this.conversation.lastMessage('strategy');
    return last?.role === 'assistant' ? messageText(last) : null;
  }
}
