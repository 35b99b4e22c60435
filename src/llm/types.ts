/**
 * LLM Type Definitions
 *
 * Provider-neutral message and tool types. A message carries an ordered list
 * of content blocks so that tool requests and tool results can be threaded
 * through one transcript and persisted as-is. Providers translate these
 * blocks into their own wire format.
 */

export type Role = 'user' | 'assistant';

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  toolUseId: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultContent {
  text: string;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  status?: 'error';
  content: ToolResultContent[];
}

export const IMAGE_FORMATS = ['jpeg', 'png', 'gif', 'webp'] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

/** Base64-encoded image, only used for vision sub-calls. */
export interface ImageBlock {
  type: 'image';
  format: ImageFormat;
  data: string;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock | ImageBlock;

export interface Message {
  role: Role;
  content: ContentBlock[];
}

export interface JsonSchemaProperty {
  type: string;
  description?: string;
  enum?: string[];
  items?: JsonSchemaProperty;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required?: string[];
  };
}

export interface InferenceConfig {
  temperature: number;
  maxTokens?: number;
  topP?: number;
}

export interface GenerateRequest {
  modelId: string;
  messages: readonly Message[];
  systemPrompt?: string;
  inference: InferenceConfig;
  tools?: readonly ToolDefinition[];
}

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens';

export interface ModelResponse {
  message: Message;
  stopReason: StopReason;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** A single inference backend bound to one connection profile. */
export interface ChatProvider {
  readonly profile: string;
  chat(request: GenerateRequest): Promise<ModelResponse>;
}

/** What the research stages depend on. */
export interface ModelClient {
  generateResponse(request: GenerateRequest): Promise<ModelResponse>;
}

export function textMessage(role: Role, text: string): Message {
  return { role, content: [{ type: 'text', text }] };
}

/** Concatenates the text blocks of a message. */
export function messageText(message: Message): string {
  return message.content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('');
}
