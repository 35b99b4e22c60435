/**
 * Ollama LLM Provider
 *
 * ChatProvider implementation for Ollama. Translates content-block messages
 * into Ollama chat messages (tool requests become `tool_calls`, tool results
 * become `tool` messages, images travel as base64) and maps responses back.
 * Provider failures are classified into transient and fatal errors so the
 * gateway can decide whether to retry.
 *
 * Dependencies:
 * - ollama: Official Ollama JavaScript client for local LLM inference
 */
import { Ollama } from 'ollama';
import type { ChatResponse, Message as OllamaMessage, Tool as OllamaTool } from 'ollama';
import type { ConnectionProfile } from '../config/schema.js';
import {
  FatalProviderError,
  ModelError,
  TransientProviderError,
  UnexpectedProviderError,
  errorMessage,
  type TransientErrorCode,
} from '../utils/errors.js';
import type {
  ChatProvider,
  ContentBlock,
  GenerateRequest,
  Message,
  ModelResponse,
  ToolDefinition,
} from './types.js';

export type OllamaChatClient = Pick<Ollama, 'chat'>;

export interface OllamaProviderOptions {
  timeoutMs: number;
  client?: OllamaChatClient;
}

const TRANSIENT_STATUS: Record<number, TransientErrorCode> = {
  429: 'throttling',
  503: 'service_unavailable',
  500: 'internal_error',
  502: 'internal_error',
  504: 'internal_error',
};

export class OllamaProvider implements ChatProvider {
  readonly profile: string;
  private client: OllamaChatClient;

  constructor(connection: ConnectionProfile, options: OllamaProviderOptions) {
    this.profile = connection.name;
    this.client =
      options.client ??
      new Ollama({
        host: connection.host,
        fetch: createProfileFetch(connection.api_key, options.timeoutMs),
      });
  }

  async chat(request: GenerateRequest): Promise<ModelResponse> {
    let response: ChatResponse;
    try {
      response = await this.client.chat({
        model: request.modelId,
        messages: this.prepareMessages(request.messages, request.systemPrompt),
        tools: request.tools?.map(toOllamaTool),
        stream: false,
        options: {
          temperature: request.inference.temperature,
          top_p: request.inference.topP,
          num_predict: request.inference.maxTokens,
        },
      });
    } catch (error) {
      throw classifyProviderError(error);
    }

    return fromOllamaResponse(response);
  }

  private prepareMessages(messages: readonly Message[], systemPrompt?: string): OllamaMessage[] {
    const result: OllamaMessage[] = [];

    if (systemPrompt) {
      result.push({ role: 'system', content: systemPrompt });
    }

    for (const msg of messages) {
      result.push(...toOllamaMessages(msg));
    }

    return result;
  }
}

function createProfileFetch(apiKey: string | undefined, timeoutMs: number): typeof fetch {
  return (input, init) => {
    const headers = new Headers(init?.headers);
    if (apiKey) {
      headers.set('Authorization', `Bearer ${apiKey}`);
    }
    return fetch(input, { ...init, headers, signal: AbortSignal.timeout(timeoutMs) });
  };
}

export function toOllamaTool(tool: ToolDefinition): OllamaTool {
  const properties = Object.fromEntries(
    Object.entries(tool.inputSchema.properties).map(([key, prop]) => [
      key,
      { ...prop, description: prop.description ?? '' },
    ])
  );

  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        required: tool.inputSchema.required ?? [],
        properties,
      },
    },
  };
}

/**
 * One content-block message can expand to several Ollama messages: tool
 * results are sent as `tool` messages ahead of any user text.
 */
export function toOllamaMessages(message: Message): OllamaMessage[] {
  const texts: string[] = [];
  const images: string[] = [];
  const toolMessages: OllamaMessage[] = [];
  const toolCalls: NonNullable<OllamaMessage['tool_calls']> = [];

  for (const block of message.content) {
    switch (block.type) {
      case 'text':
        texts.push(block.text);
        break;
      case 'image':
        images.push(block.data);
        break;
      case 'tool_use':
        toolCalls.push({ function: { name: block.name, arguments: block.input } });
        break;
      case 'tool_result':
        toolMessages.push({
          role: 'tool',
          content: block.content.map((part) => part.text).join('\n'),
        });
        break;
    }
  }

  const result: OllamaMessage[] = [...toolMessages];
  const content = texts.join('\n');

  if (message.role === 'assistant') {
    const assistant: OllamaMessage = { role: 'assistant', content };
    if (toolCalls.length > 0) {
      assistant.tool_calls = toolCalls;
    }
    result.push(assistant);
  } else if (content.length > 0 || images.length > 0 || toolMessages.length === 0) {
    const user: OllamaMessage = { role: 'user', content };
    if (images.length > 0) {
      user.images = images;
    }
    result.push(user);
  }

  return result;
}

export function fromOllamaResponse(response: ChatResponse): ModelResponse {
  const content: ContentBlock[] = [];
  const text = response.message.content;

  if (text.trim().length > 0) {
    content.push({ type: 'text', text });
  }

  for (const call of response.message.tool_calls ?? []) {
    content.push({
      type: 'tool_use',
      toolUseId: `tooluse_${crypto.randomUUID()}`,
      name: call.function.name,
      input: { ...call.function.arguments },
    });
  }

  const hasToolUse = content.some((block) => block.type === 'tool_use');

  return {
    message: { role: 'assistant', content },
    stopReason: hasToolUse ? 'tool_use' : response.done_reason === 'length' ? 'max_tokens' : 'end_turn',
    usage: {
      inputTokens: response.prompt_eval_count ?? 0,
      outputTokens: response.eval_count ?? 0,
    },
  };
}

function statusCodeOf(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'status_code' in error &&
    typeof error.status_code === 'number'
  ) {
    return error.status_code;
  }
  return undefined;
}

/** Maps a client failure onto the provider error taxonomy. */
export function classifyProviderError(error: unknown): ModelError {
  if (error instanceof ModelError) {
    return error;
  }

  const status = statusCodeOf(error);
  if (status === undefined) {
    return new UnexpectedProviderError(`Unexpected error: ${errorMessage(error)}`, { cause: error });
  }

  const code = TRANSIENT_STATUS[status];
  if (code) {
    return new TransientProviderError(code, `${code} (HTTP ${status}): ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return new FatalProviderError(`Provider error (HTTP ${status}): ${errorMessage(error)}`, {
    cause: error,
    status,
  });
}
