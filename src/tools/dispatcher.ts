/**
 * Tool Dispatcher
 *
 * Explicit dispatch table from tool name to a typed handler. Every handler
 * validates its arguments with a zod schema and returns a Result; the
 * dispatcher flattens failures into text starting with the `Error:` sentinel
 * so the collection loop can hand them back to the model as error results.
 *
 * Dependencies:
 * - zod: per-tool argument schemas
 */
import { z } from 'zod';
import type { ReportArtifact } from '../charts/types.js';
import type { ToolDefinition } from '../llm/types.js';
import { ConfigurationError, ModelError, ToolError, errorMessage } from '../utils/errors.js';
import { preview, toolLogger, type Logger } from '../utils/logger.js';
import { err, type Result } from '../utils/result.js';
import { TOOL_DEFINITIONS, isToolName, type ToolName } from './definitions.js';

export const ERROR_SENTINEL = 'Error:';

export interface ToolSource {
  url: string;
  title: string;
}

export interface ToolOutput {
  text: string;
  source?: ToolSource;
  artifacts?: ReportArtifact[];
}

export interface ToolHandler {
  run(args: unknown): Promise<Result<ToolOutput, ToolError>>;
}

export type ToolHandlers = Partial<Record<ToolName, ToolHandler>>;

export interface DispatchResult {
  text: string;
  isError: boolean;
  source?: ToolSource;
  artifacts: ReportArtifact[];
}

export interface ToolInvocation {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export function isErrorText(text: string): boolean {
  return text.trimStart().startsWith(ERROR_SENTINEL);
}

/**
 * Pairs a schema with its handler. Arguments that fail validation never
 * reach `run`.
 */
export function defineTool<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  run: (input: z.output<S>) => Promise<Result<ToolOutput, ToolError>>
): ToolHandler {
  return {
    async run(args: unknown) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        const issues = parsed.error.errors
          .map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message))
          .join('; ');
        return err(new ToolError(name, `invalid arguments for ${name}: ${issues}`));
      }
      return run(parsed.data);
    },
  };
}

export class ToolDispatcher {
  readonly toolNames: readonly ToolName[];
  private readonly table: Map<ToolName, ToolHandler>;
  private readonly definitionList: ToolDefinition[];
  private readonly logger: Logger;

  /**
   * @param toolNames - tools to advertise and accept; each must have both a
   *   definition and a handler
   */
  constructor(
    toolNames: readonly string[],
    handlers: ToolHandlers,
    options: { definitions?: Partial<Record<ToolName, ToolDefinition>>; logger?: Logger } = {}
  ) {
    const definitions = options.definitions ?? TOOL_DEFINITIONS;
    const names: ToolName[] = [];
    this.table = new Map();

    for (const name of toolNames) {
      if (!isToolName(name) || !definitions[name]) {
        throw new ConfigurationError(`Tool "${name}" has no definition`);
      }
      const handler = handlers[name];
      if (!handler) {
        throw new ConfigurationError(`Tool "${name}" has no handler`);
      }
      names.push(name);
      this.table.set(name, handler);
    }

    this.toolNames = names;
    this.definitionList = names.map((name) => definitions[name]).filter((d): d is ToolDefinition => d !== undefined);
    this.logger = options.logger ?? toolLogger;
  }

  get definitions(): readonly ToolDefinition[] {
    return this.definitionList;
  }

  has(name: string): boolean {
    return isToolName(name) && this.table.has(name);
  }

  async dispatch(name: string, args: unknown): Promise<DispatchResult> {
    const handler = isToolName(name) ? this.table.get(name) : undefined;
    if (!handler) {
      this.logger.warn({ tool: name }, 'Unknown tool requested');
      return { text: `${ERROR_SENTINEL} unknown tool "${name}"`, isError: true, artifacts: [] };
    }

    this.logger.info({ tool: name, args }, 'Dispatching tool');

    let result: Result<ToolOutput, ToolError>;
    try {
      result = await handler.run(args);
    } catch (error) {
      // A model outage is not a tool failure the model could work around
      if (error instanceof ModelError) throw error;
      // Handlers report expected failures as values; any other throw is a bug in the handler
      this.logger.error({ tool: name, error: errorMessage(error) }, 'Tool handler threw');
      result = err(new ToolError(name, errorMessage(error), { cause: error }));
    }

    if (!result.ok) {
      this.logger.warn({ tool: name, error: result.error.message }, 'Tool failed');
      return { text: `${ERROR_SENTINEL} ${result.error.message}`, isError: true, artifacts: [] };
    }

    const { text, source, artifacts } = result.value;
    this.logger.info({ tool: name, result: preview(text) }, 'Tool completed');
    return { text, isError: isErrorText(text), source, artifacts: artifacts ?? [] };
  }
}

const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  toolUseId: z.string().min(1),
  name: z.string().min(1),
  input: z.record(z.unknown()),
});

function contentOf(response: unknown): unknown {
  if (typeof response !== 'object' || response === null) {
    return undefined;
  }
  const message = 'message' in response ? response.message : response;
  if (typeof message !== 'object' || message === null || !('content' in message)) {
    return undefined;
  }
  return message.content;
}

/** Every well-formed tool request in an assistant message, in order. */
export function extractToolInvocations(response: unknown): ToolInvocation[] {
  const content = contentOf(response);
  if (!Array.isArray(content)) {
    return [];
  }

  const invocations: ToolInvocation[] = [];
  for (const block of content) {
    const parsed = ToolUseBlockSchema.safeParse(block);
    if (parsed.success) {
      invocations.push({ id: parsed.data.toolUseId, name: parsed.data.name, input: parsed.data.input });
    }
  }
  return invocations;
}

/**
 * First tool request in a model response or message, or null. Never throws.
 */
export function extractToolInvocation(response: unknown): ToolInvocation | null {
  return extractToolInvocations(response)[0] ?? null;
}
