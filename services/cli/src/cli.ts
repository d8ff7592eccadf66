/**
 * docmeta CLI
 *
 * `docmeta extract <input>` runs the metadata plugin on one file;
 * `docmeta templates` lists the built-in prompt templates.
 *
 * Exit codes: 0 success, 1 extraction failed, 2 configuration or fatal
 * provider error (including bad arguments and unreadable input).
 */

import fs from 'fs';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  ConfigurationError,
  MetadataPlugin,
  METADATA_PLUGIN_NAME,
  describeFailure,
  errorMessage,
  getAvailableTemplates,
  getPluginOrThrow,
  getTemplate,
  loadConfig,
  logger,
  registerPlugin,
  setLogLevel,
  type DocumentStore,
  type ExtractionResult,
  type LlmClient,
  type LogLevel,
  type ProcessFileResult,
} from '@docmeta/shared';

export const CLI_VERSION = '1.0.0';

export const EXIT_SUCCESS = 0;
export const EXIT_EXTRACTION_FAILED = 1;
export const EXIT_CONFIGURATION_ERROR = 2;

export interface CliDeps {
  env: Record<string, string | undefined>;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  setLogLevel: (level: LogLevel) => void;
  /** Overrides the configured LLM provider */
  client?: LlmClient;
  store?: DocumentStore;
}

export function defaultDeps(): CliDeps {
  return {
    // Keep stdout for results; structured logs only from warnings up unless set
    env: { LOG_LEVEL: 'warn', ...process.env },
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
    setLogLevel,
  };
}

type ExtractFlags = {
  output?: string;
  promptTemplate?: string;
  retries?: number;
  dryRun?: boolean;
  verbose?: boolean;
  provider?: string;
  model?: string;
  timeout?: number;
};

/**
 * Validate and parse a retry count.
 */
function parseRetries(value: string): number {
  const retries = Number(value);
  if (!Number.isInteger(retries) || retries < 0) {
    throw new InvalidArgumentError('Retries must be a non-negative integer');
  }
  return retries;
}

/**
 * Validate and parse a timeout in milliseconds.
 */
function parseTimeout(value: string): number {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout < 1) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds');
  }
  return timeout;
}

/**
 * A built-in name stays a name; an existing file is read as template text;
 * anything else is passed through and resolved (or rejected) later.
 */
function readTemplateArgument(value: string): string {
  if (getTemplate(value)) return value;
  if (fs.existsSync(value) && fs.statSync(value).isFile()) {
    return fs.readFileSync(value, 'utf-8');
  }
  return value;
}

export function exitCodeFor(result: ExtractionResult): number {
  if (result.success) return EXIT_SUCCESS;
  if (result.reason === 'configuration-error' || result.reason === 'fatal-provider-error') {
    return EXIT_CONFIGURATION_ERROR;
  }
  return EXIT_EXTRACTION_FAILED;
}

function printSummary(outcome: ProcessFileResult, deps: CliDeps): void {
  const { report } = outcome;
  if (!report.success) return;

  const metadata = report.metadata;
  deps.stdout(`Title: ${metadata.title}`);
  deps.stdout(`Domain: ${metadata.domain}`);
  deps.stdout(`Tone: ${metadata.tone}`);
  deps.stdout(`Language: ${metadata.language}`);
  deps.stdout(`Rarity: ${metadata.rarity}`);
  deps.stdout(`Author: ${metadata.author_profile.name} (${metadata.author_profile.profession})`);
  deps.stdout(`Attempts: ${report.attempts}`);
}

async function runExtract(input: string, flags: ExtractFlags, deps: CliDeps): Promise<number> {
  const env = { ...deps.env };
  if (flags.provider) env.LLM_PROVIDER = flags.provider;
  if (flags.model) env.LLM_MODEL = flags.model;
  if (flags.timeout !== undefined) env.LLM_REQUEST_TIMEOUT_MS = String(flags.timeout);

  let outcome: ProcessFileResult;
  try {
    const config = loadConfig(env);
    deps.setLogLevel(flags.verbose ? 'debug' : config.logLevel);
    registerPlugin(new MetadataPlugin({ config, client: deps.client, store: deps.store }));

    const plugin = getPluginOrThrow(METADATA_PLUGIN_NAME);
    await plugin.initialize();

    outcome = await plugin.processFile(input, flags.output, {
      template: flags.promptTemplate === undefined ? undefined : readTemplateArgument(flags.promptTemplate),
      retries: flags.retries,
      dryRun: flags.dryRun === true,
      verbose: flags.verbose === true,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      deps.stderr(`Configuration error: ${error.message}`);
    } else {
      logger.error('Extraction aborted', error, { input });
      deps.stderr(`Error: ${errorMessage(error)}`);
    }
    return EXIT_CONFIGURATION_ERROR;
  }

  if (flags.dryRun) {
    deps.stdout(JSON.stringify(outcome.record, null, 2));
  } else {
    printSummary(outcome, deps);
    deps.stdout(`Record written to ${outcome.outputPath}`);
  }

  if (!outcome.report.success) {
    deps.stderr(describeFailure(outcome.report));
  }

  return exitCodeFor(outcome.report);
}

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command();

  program
    .name('docmeta')
    .description('Extract structured metadata from text documents with an LLM')
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout(text.trimEnd()),
      writeErr: (text) => deps.stderr(text.trimEnd()),
    });

  program
    .command('extract')
    .description('Extract metadata from a text file')
    .argument('<input>', 'Path of the document to process')
    .option('-o, --output <path>', 'Where to write the metadata record')
    .option('-t, --prompt-template <name|file>', 'Template name, template file, or literal template text')
    .option('-r, --retries <n>', 'Repair/retry budget', parseRetries)
    .option('--dry-run', 'Print the record instead of storing it', false)
    .option('-v, --verbose', 'Log prompts and responses', false)
    .option('--provider <name>', 'LLM provider (openai or mock)')
    .option('--model <name>', 'LLM model name')
    .option('--timeout <ms>', 'Timeout for one LLM call', parseTimeout)
    .exitOverride()
    .action(async (input: string, _options: unknown, command: Command) => {
      setExitCode(await runExtract(input, command.opts<ExtractFlags>(), deps));
    });

  program
    .command('templates')
    .description('List the built-in prompt templates')
    .action(() => {
      for (const name of getAvailableTemplates()) {
        const template = getTemplate(name);
        deps.stdout(template ? `${name} - ${template.description}` : name);
      }
      setExitCode(EXIT_SUCCESS);
    });

  return program;
}

/**
 * Run the CLI on user arguments (no node/script prefix) and return the exit code.
 */
export async function runCli(args: readonly string[], deps: CliDeps = defaultDeps()): Promise<number> {
  let exitCode = EXIT_SUCCESS;
  const program = buildProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_CONFIGURATION_ERROR;
    }
    throw error;
  }

  return exitCode;
}
