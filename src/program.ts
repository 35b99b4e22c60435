/**
 * Command definitions for the deepreport CLI. Kept apart from the entry
 * script so the commands can be driven in tests.
 */
import { Command, Option } from 'commander';
import { buildResearchConfig, describeConfig, loadSettings, type ResearchConfig } from './config/settings.js';
import { RESEARCH_MODES, isResearchMode, type ResearchMode } from './config/schema.js';
import { createResearchManager, type ResearchManager } from './research/manager.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';
import { cliLogger } from './utils/logger.js';

export interface ProgramIO {
  out: (line: string) => void;
  err: (line: string) => void;
  createManager: (config: ResearchConfig) => Pick<ResearchManager, 'run'>;
}

interface RunCommandOptions {
  mode: string;
  config?: string;
  resume?: string;
  pdf: boolean;
}

interface ConfigCommandOptions {
  mode: string;
  config?: string;
}

const defaultIO: ProgramIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  createManager: (config) => createResearchManager(config),
};

function resolveConfig(mode: string, configPath: string | undefined): ResearchConfig {
  if (!isResearchMode(mode)) {
    throw new ConfigurationError(`Unknown mode "${mode}" (expected ${RESEARCH_MODES.join(' or ')})`);
  }
  const researchMode: ResearchMode = mode;
  return buildResearchConfig(loadSettings(configPath), researchMode);
}

export function buildProgram(io: ProgramIO = defaultIO): Command {
  const program = new Command();

  program
    .name('deepreport')
    .description('Research a topic with local LLMs and write a cited report')
    .version('1.0.0');

  program
    .command('run')
    .description('Research a topic and write report.md, report.html and report.pdf')
    .argument('<topic>', 'Research topic')
    .addOption(new Option('-m, --mode <mode>', 'Research depth').choices(RESEARCH_MODES).default('standard'))
    .option('-c, --config <path>', 'Path to research_settings.yaml')
    .option('-r, --resume <path>', 'Conversation file of an earlier run to continue')
    .option('--no-pdf', 'Skip PDF export')
    .action(async (topic: string, options: RunCommandOptions) => {
      try {
        const config = resolveConfig(options.mode, options.config);
        const outcome = await io.createManager(config).run(topic, { resumePath: options.resume, pdf: options.pdf });

        io.out(`Report directory: ${outcome.reportDir}`);
        io.out(`Markdown: ${outcome.markdownPath}`);
        io.out(`HTML: ${outcome.htmlPath}`);
        if (outcome.pdfPath) {
          io.out(`PDF: ${outcome.pdfPath}`);
        }
        io.out(`Conversation: ${outcome.conversationPath}`);
        if (outcome.truncated) {
          io.err('Warning: the report reached the attempt limit before it was marked complete');
        }
        if (!outcome.mustUseSatisfied) {
          io.err(`Warning: the required tool ${config.policy.mustUseTool} never returned a result`);
        }
      } catch (error) {
        cliLogger.error({ error: errorMessage(error), stack: error instanceof Error ? error.stack : undefined }, 'Run failed');
        io.err(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  program
    .command('config')
    .description('Print the effective configuration with API keys masked')
    .addOption(new Option('-m, --mode <mode>', 'Research depth').choices(RESEARCH_MODES).default('standard'))
    .option('-c, --config <path>', 'Path to research_settings.yaml')
    .action((options: ConfigCommandOptions) => {
      try {
        io.out(describeConfig(resolveConfig(options.mode, options.config)).trimEnd());
      } catch (error) {
        io.err(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}
