/**
 * Settings Loader
 *
 * Reads research_settings.yaml (searching from the current directory up to
 * root), validates it, and folds it into one immutable ResearchConfig for the
 * selected mode. The config value is built once at startup and handed to each
 * component's constructor.
 *
 * Dependencies:
 * - yaml: YAML parser for reading configuration files
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import {
  DEFAULT_LIMITS,
  ResearchSettingsSchema,
  type ConnectionProfile,
  type ModeLimits,
  type ResearchMode,
  type ResearchSettings,
} from './schema.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

export const DEFAULT_SETTINGS_FILENAME = 'research_settings.yaml';
const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

export interface ResearchConfig {
  readonly mode: ResearchMode;
  readonly models: { readonly primary: string; readonly secondary: string; readonly vision: string };
  readonly connection: {
    readonly timeoutMs: number;
    readonly maxRetries: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
    readonly profiles: readonly ConnectionProfile[];
  };
  readonly search: {
    readonly braveApiKey: string | undefined;
    readonly resultsPerQuery: number;
    readonly maxImages: number;
  };
  readonly limits: ModeLimits;
  readonly inference: {
    readonly maxTokens: number;
    readonly topP: number;
    readonly discussionTemperature: number;
    readonly reportTemperature: number;
  };
  readonly report: {
    readonly completionMarkers: readonly string[];
    readonly markerTailLength: number;
    readonly referenceTitle: string;
    readonly outputDir: string;
    readonly conversationDir: string;
    readonly granularity: 'chapter' | 'full';
  };
  readonly documents: { readonly maxBytes: number; readonly maxContentChars: number };
  readonly images: {
    readonly maxBytes: number;
    readonly allowedFormats: readonly string[];
    readonly describe: boolean;
  };
  readonly policy: { readonly mustUseTool: string | null };
  readonly pdf: {
    readonly enabled: boolean;
    readonly browserExecutable: string | undefined;
    readonly renderWaitMs: number;
  };
}

export function findSettingsFile(startDir: string = process.cwd()): string | null {
  let dir = resolve(startDir);

  for (;;) {
    const candidate = resolve(dir, DEFAULT_SETTINGS_FILENAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Loads and validates settings. A missing file yields the defaults; an
 * explicitly named file that does not exist is an error.
 */
export function loadSettings(path?: string): ResearchSettings {
  if (path && !existsSync(path)) {
    throw new ConfigurationError(`Configuration file not found: ${path}`);
  }

  const configPath = path ?? findSettingsFile();
  if (!configPath) {
    return parseSettings({});
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read ${configPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return parseSettings(raw ?? {}, configPath);
}

export function parseSettings(raw: unknown, source = 'settings'): ResearchSettings {
  const result = ResearchSettingsSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid configuration in ${source}:\n${errors}`);
  }

  return result.data;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildResearchConfig(
  settings: ResearchSettings,
  mode: ResearchMode,
  env: NodeJS.ProcessEnv = process.env
): ResearchConfig {
  const { connection } = settings;

  if (connection.max_delay_seconds < connection.base_delay_seconds) {
    throw new ConfigurationError(
      'connection.max_delay_seconds must be greater than or equal to connection.base_delay_seconds'
    );
  }

  const { completion_markers: markers, marker_tail_length: tail } = settings.report;
  const unreachable = markers.filter((marker) => marker.length > tail);
  if (unreachable.length > 0) {
    throw new ConfigurationError(
      `report.completion_markers longer than report.marker_tail_length (${tail}) can never match: ${unreachable.join(', ')}`
    );
  }

  const profiles: ConnectionProfile[] =
    connection.profiles.length > 0
      ? connection.profiles
      : [{ name: 'default', host: env['OLLAMA_HOST'] ?? DEFAULT_OLLAMA_HOST }];

  const names = new Set(profiles.map((p) => p.name));
  if (names.size !== profiles.length) {
    throw new ConfigurationError('connection.profiles must have unique names');
  }

  const limits: ModeLimits = { ...DEFAULT_LIMITS[mode], ...settings.limits[mode] };

  return deepFreeze<ResearchConfig>({
    mode,
    models: {
      primary: settings.models.primary,
      secondary: settings.models.secondary,
      vision: settings.models.vision ?? settings.models.primary,
    },
    connection: {
      timeoutMs: connection.timeout_seconds * 1000,
      maxRetries: connection.max_retries,
      baseDelayMs: connection.base_delay_seconds * 1000,
      maxDelayMs: connection.max_delay_seconds * 1000,
      profiles,
    },
    search: {
      braveApiKey: env['BRAVE_SEARCH_API_KEY'] || settings.search.brave_api_key,
      resultsPerQuery: settings.search.results_per_query,
      maxImages: settings.search.max_images,
    },
    limits,
    inference: {
      maxTokens: settings.inference.max_tokens,
      topP: settings.inference.top_p,
      discussionTemperature: settings.inference.discussion_temperature,
      reportTemperature: settings.inference.report_temperature,
    },
    report: {
      completionMarkers: settings.report.completion_markers,
      markerTailLength: settings.report.marker_tail_length,
      referenceTitle: settings.report.reference_title,
      outputDir: settings.report.output_dir,
      conversationDir: settings.report.conversation_dir,
      granularity: mode === 'summary' ? 'full' : 'chapter',
    },
    documents: {
      maxBytes: settings.documents.max_bytes,
      maxContentChars: settings.documents.max_content_chars,
    },
    images: {
      maxBytes: settings.images.max_bytes,
      allowedFormats: settings.images.allowed_formats,
      describe: settings.images.describe,
    },
    policy: { mustUseTool: settings.policy.must_use_tool },
    pdf: {
      enabled: settings.pdf.enabled,
      browserExecutable: settings.pdf.browser_executable,
      renderWaitMs: settings.pdf.render_wait_ms,
    },
  });
}

/**
 * Renders the effective configuration as YAML with secrets masked.
 */
export function describeConfig(config: ResearchConfig): string {
  const mask = (value: string | undefined) => (value ? `${value.slice(0, 4)}****` : '(not set)');

  return stringifyYaml(
    {
      ...config,
      connection: {
        ...config.connection,
        profiles: config.connection.profiles.map((p) => ({ ...p, api_key: p.api_key ? mask(p.api_key) : undefined })),
      },
      search: { ...config.search, braveApiKey: mask(config.search.braveApiKey) },
    },
    { indent: 2, lineWidth: 0 }
  );
}
