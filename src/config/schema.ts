/**
 * Configuration Schema
 *
 * Zod validation schemas for research_settings.yaml. Every section has
 * defaults so an empty (or missing) file yields a runnable configuration.
 *
 * Dependencies:
 * - zod: TypeScript-first schema validation with static type inference
 */
import { z } from 'zod';

export const RESEARCH_MODES = ['standard', 'summary'] as const;
export type ResearchMode = (typeof RESEARCH_MODES)[number];

export const ModelsConfigSchema = z.object({
  primary: z.string().default('qwen2.5:14b'),
  secondary: z.string().default('llama3.1:8b'),
  vision: z.string().optional(),
});

export const ConnectionProfileSchema = z.object({
  name: z.string(),
  host: z.string().url(),
  api_key: z.string().optional(),
});

export const ConnectionConfigSchema = z.object({
  timeout_seconds: z.number().positive().default(1200),
  max_retries: z.number().int().nonnegative().default(8),
  base_delay_seconds: z.number().nonnegative().default(20),
  max_delay_seconds: z.number().nonnegative().default(300),
  profiles: z.array(ConnectionProfileSchema).default([]),
});

export const SearchConfigSchema = z.object({
  brave_api_key: z.string().optional(),
  results_per_query: z.number().int().min(1).max(20).default(10),
  max_images: z.number().int().min(1).max(10).default(5),
});

export const ModeLimitsSchema = z.object({
  discussion_turns: z.number().int().positive(),
  context_iterations: z.number().int().positive(),
  survey_iterations: z.number().int().positive(),
  visualization_iterations: z.number().int().positive(),
  report_attempts: z.number().int().positive(),
});

export const LimitsConfigSchema = z.object({
  standard: ModeLimitsSchema.partial().default({}),
  summary: ModeLimitsSchema.partial().default({}),
});

export const InferenceConfigSchema = z.object({
  max_tokens: z.number().int().positive().default(8192),
  top_p: z.number().min(0).max(1).default(0.9),
  discussion_temperature: z.number().min(0).max(2).default(1),
  report_temperature: z.number().min(0).max(2).default(0.8),
});

export const ReportConfigSchema = z.object({
  completion_markers: z
    .array(z.string().min(1))
    .min(1)
    .default(['END OF REPORT', 'The report is complete', 'This concludes the report']),
  marker_tail_length: z.number().int().min(10).max(200).default(40),
  reference_title: z.string().default('Appendix: References'),
  output_dir: z.string().default('reports'),
  conversation_dir: z.string().default('conversation'),
});

export const DocumentsConfigSchema = z.object({
  max_bytes: z.number().int().positive().default(4.5 * 1024 * 1024),
  max_content_chars: z.number().int().positive().default(40000),
});

export const ImagesConfigSchema = z.object({
  max_bytes: z.number().int().positive().default(5 * 1024 * 1024),
  allowed_formats: z.array(z.string()).default(['jpeg', 'png', 'gif', 'webp']),
  describe: z.boolean().default(true),
});

export const PolicyConfigSchema = z.object({
  must_use_tool: z.string().nullable().default('image_search'),
});

export const PdfConfigSchema = z.object({
  enabled: z.boolean().default(true),
  browser_executable: z.string().optional(),
  render_wait_ms: z.number().int().nonnegative().default(5000),
});

export const ResearchSettingsSchema = z.object({
  models: ModelsConfigSchema.default({}),
  connection: ConnectionConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  limits: LimitsConfigSchema.default({}),
  inference: InferenceConfigSchema.default({}),
  report: ReportConfigSchema.default({}),
  documents: DocumentsConfigSchema.default({}),
  images: ImagesConfigSchema.default({}),
  policy: PolicyConfigSchema.default({}),
  pdf: PdfConfigSchema.default({}),
});

export type ModelsConfig = z.infer<typeof ModelsConfigSchema>;
export type ConnectionProfile = z.infer<typeof ConnectionProfileSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type ModeLimits = z.infer<typeof ModeLimitsSchema>;
export type ResearchSettings = z.infer<typeof ResearchSettingsSchema>;

export const DEFAULT_LIMITS: Record<ResearchMode, ModeLimits> = {
  standard: {
    discussion_turns: 5,
    context_iterations: 10,
    survey_iterations: 40,
    visualization_iterations: 8,
    report_attempts: 10,
  },
  summary: {
    discussion_turns: 3,
    context_iterations: 5,
    survey_iterations: 20,
    visualization_iterations: 4,
    report_attempts: 10,
  },
};

export function isResearchMode(value: string): value is ResearchMode {
  return (RESEARCH_MODES as readonly string[]).includes(value);
}
