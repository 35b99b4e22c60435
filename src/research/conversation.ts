/**
 * Conversation
 *
 * Named, append-only message logs, one per pipeline stage. The messages in a
 * channel are the literal transcript sent to the model, so they are never
 * reordered or pruned. ConversationStore mirrors the whole conversation to a
 * YAML file after every append; loading that file resumes a run.
 *
 * Dependencies:
 * - yaml: human-readable persistence format
 * - zod: validates a conversation file before resuming from it
 */
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { IMAGE_FORMATS, type ContentBlock, type Message } from '../llm/types.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { formatRunTimestamp } from '../utils/time.js';

export const CHANNELS = ['context', 'proposer', 'critic', 'strategy', 'survey', 'visualization'] as const;

export type Channel = (typeof CHANNELS)[number];

export type ConversationData = Partial<Record<Channel, Message[]>>;

type ChangeListener = (channel: Channel) => void;

function freezeMessage(message: Message): Message {
  const copy = structuredClone(message);
  for (const block of copy.content) {
    Object.freeze(block);
  }
  Object.freeze(copy.content);
  return Object.freeze(copy);
}

export class Conversation {
  private readonly logs = new Map<Channel, Message[]>();
  private readonly listeners: ChangeListener[] = [];

  constructor(data: ConversationData = {}) {
    for (const channel of CHANNELS) {
      const messages = data[channel];
      if (messages && messages.length > 0) {
        this.logs.set(channel, messages.map(freezeMessage));
      }
    }
  }

  onChange(listener: ChangeListener): void {
    this.listeners.push(listener);
  }

  append(channel: Channel, message: Message): void {
    const log = this.logs.get(channel) ?? [];
    log.push(freezeMessage(message));
    this.logs.set(channel, log);
    this.notify(channel);
  }

  /**
   * Adds user text. When the channel already ends with a user message (for
   * example a tool result), the text joins that message so roles keep
   * alternating.
   */
  appendUserText(channel: Channel, text: string): void {
    const log = this.logs.get(channel);
    const last = log?.at(-1);

    if (log && last?.role === 'user') {
      log[log.length - 1] = freezeMessage({
        role: 'user',
        content: [...last.content, { type: 'text', text }],
      });
      this.notify(channel);
      return;
    }

    this.append(channel, { role: 'user', content: [{ type: 'text', text }] });
  }

  messages(channel: Channel): readonly Message[] {
    return [...(this.logs.get(channel) ?? [])];
  }

  lastMessage(channel: Channel): Message | undefined {
    return this.logs.get(channel)?.at(-1);
  }

  isEmpty(channel: Channel): boolean {
    return (this.logs.get(channel)?.length ?? 0) === 0;
  }

  count(channel: Channel, role?: Message['role']): number {
    const log = this.logs.get(channel) ?? [];
    return role ? log.filter((m) => m.role === role).length : log.length;
  }

  toJSON(): ConversationData {
    const data: ConversationData = {};
    for (const channel of CHANNELS) {
      const log = this.logs.get(channel);
      if (log && log.length > 0) {
        data[channel] = structuredClone(log);
      }
    }
    return data;
  }

  private notify(channel: Channel): void {
    for (const listener of this.listeners) {
      listener(channel);
    }
  }
}

const ContentBlockSchema: z.ZodType<ContentBlock> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), text: z.string() }),
  z.object({
    type: z.literal('tool_use'),
    toolUseId: z.string(),
    name: z.string(),
    input: z.record(z.unknown()),
  }),
  z.object({
    type: z.literal('tool_result'),
    toolUseId: z.string(),
    status: z.literal('error').optional(),
    content: z.array(z.object({ text: z.string() })),
  }),
  z.object({ type: z.literal('image'), format: z.enum(IMAGE_FORMATS), data: z.string() }),
]);

const MessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.array(ContentBlockSchema),
});

const ConversationFileSchema = z
  .object({
    context: z.array(MessageSchema).optional(),
    proposer: z.array(MessageSchema).optional(),
    critic: z.array(MessageSchema).optional(),
    strategy: z.array(MessageSchema).optional(),
    survey: z.array(MessageSchema).optional(),
    visualization: z.array(MessageSchema).optional(),
  })
  .strict();

/**
 * Message layout for YAML: `role` and `content` first, then block fields in
 * a fixed order so diffs between saves stay small.
 */
function orderedMessage(message: Message): Message {
  return {
    role: message.role,
    content: message.content.map((block): ContentBlock => {
      switch (block.type) {
        case 'text':
          return { type: 'text', text: block.text };
        case 'tool_use':
          return { type: 'tool_use', toolUseId: block.toolUseId, name: block.name, input: block.input };
        case 'tool_result':
          return block.status
            ? { type: 'tool_result', toolUseId: block.toolUseId, status: block.status, content: block.content }
            : { type: 'tool_result', toolUseId: block.toolUseId, content: block.content };
        case 'image':
          return { type: 'image', format: block.format, data: block.data };
      }
    }),
  };
}

export function serializeConversation(conversation: Conversation): string {
  const data = conversation.toJSON();
  const ordered: ConversationData = {};
  for (const channel of CHANNELS) {
    const messages = data[channel];
    if (messages) {
      ordered[channel] = messages.map(orderedMessage);
    }
  }
  return stringifyYaml(ordered, { lineWidth: 0 });
}

export function parseConversation(text: string, source = 'conversation'): Conversation {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new ConfigurationError(`Could not parse ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const result = ConversationFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const errors = result.error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Invalid conversation in ${source}:\n${errors}`);
  }

  const data: ConversationData = {};
  for (const channel of CHANNELS) {
    const messages = result.data[channel];
    if (messages) {
      data[channel] = messages;
    }
  }
  return new Conversation(data);
}

export function loadConversation(path: string): Conversation {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Conversation file not found: ${path}`);
  }
  return parseConversation(readFileSync(path, 'utf-8'), path);
}

export class ConversationStore {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  static forRun(dir: string, startedAt: Date): ConversationStore {
    return new ConversationStore(join(dir, `${formatRunTimestamp(startedAt)}.yaml`));
  }

  save(conversation: Conversation): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, serializeConversation(conversation), 'utf-8');
  }

  /** Saves now and after every later change. */
  attach(conversation: Conversation): void {
    this.save(conversation);
    conversation.onChange(() => this.save(conversation));
  }
}
