#!/usr/bin/env node

/**
 * Image Council CLI
 *
 * Runs the advisor council over a question dataset, or re-extracts answers
 * from a stored results log.
 */

import 'dotenv/config';
import * as fs from 'fs';
import { pathToFileURL } from 'url';
import { ConfigLoader, DEFAULT_CONFIG_PATH } from '../config/ConfigLoader.js';
import {
  CouncilConfig,
  describeModel,
  overrideDecisionModel,
  selectAdvisors,
} from '../config/CouncilConfig.js';
import { ConfigurationError, DatasetError } from '../config/errors.js';
import { AdvisorPanel } from '../council/AdvisorPanel.js';
import { AnswerExtractor } from '../council/AnswerExtractor.js';
import { CouncilRunner, RunSummary } from '../council/CouncilRunner.js';
import { DecisionArbiter } from '../council/DecisionArbiter.js';
import { PromptRenderer } from '../council/PromptRenderer.js';
import { QuestionProcessor } from '../council/QuestionProcessor.js';
import { loadQuestions } from '../dataset/DatasetLoader.js';
import { VisionBackendFactory } from '../image-processor/VisionBackendFactory.js';
import { VisionBackend, VisionModelConfig } from '../image-processor/types.js';
import { RunStore, lastCompletedId } from '../runs/RunStore.js';
import { formatDuration } from '../runs/ReportRenderer.js';
import { reextractResults } from '../runs/reextract.js';
import { logger, setLogLevel } from '../utils/logger.js';

export type CliCommand = 'run' | 'reextract' | 'help';

const COMMANDS: readonly CliCommand[] = ['run', 'reextract', 'help'];

function isCliCommand(value: string): value is CliCommand {
  return COMMANDS.some(command => command === value);
}

export interface RunCliOptions {
  /** Verbose per-question output */
  test: boolean;
  sample?: number;
  /** Run directory or question id */
  resume?: string;
  config?: string;
  advisors?: string[];
  decisionModel?: string;
}

export interface ParsedArgs {
  command: CliCommand;
  options: RunCliOptions;
  positionals: string[];
}

// Factory type for dependency injection in testing
export type BackendFactory = (config: VisionModelConfig) => VisionBackend;

const defaultBackendFactory: BackendFactory = config => VisionBackendFactory.create(config);

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseArgs(argv: string[]): ParsedArgs {
  let rest = argv;
  let command: CliCommand = 'run';
  const first = rest[0];
  if (first !== undefined && !first.startsWith('--')) {
    if (!isCliCommand(first)) {
      throw new ConfigurationError(`Unknown command: ${first}`);
    }
    command = first;
    rest = rest.slice(1);
  }

  const options: RunCliOptions = { test: false };
  const positionals: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === '--test') {
      options.test = true;
    } else if (arg === '--sample') {
      const raw = requireValue(rest, i++, arg);
      const sample = Number(raw);
      if (!Number.isInteger(sample) || sample < 1) {
        throw new ConfigurationError(`--sample must be a positive integer, got '${raw}'`);
      }
      options.sample = sample;
    } else if (arg === '--resume') {
      options.resume = requireValue(rest, i++, arg);
    } else if (arg === '--config') {
      options.config = requireValue(rest, i++, arg);
    } else if (arg === '--decision-model') {
      options.decisionModel = requireValue(rest, i++, arg);
    } else if (arg === '--advisors') {
      const names: string[] = [];
      while (i + 1 < rest.length && !rest[i + 1].startsWith('--')) {
        names.push(rest[++i]);
      }
      if (names.length === 0) {
        throw new ConfigurationError('--advisors requires at least one advisor name');
      }
      options.advisors = names;
    } else if (arg === '--help' || arg === '-h') {
      command = 'help';
    } else if (arg.startsWith('--')) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  return { command, options, positionals };
}

/**
 * A directory resumes after its highest stored question id; anything else
 * must be a question id
 */
export function resolveResume(resume: string | undefined): number | undefined {
  if (resume === undefined) {
    return undefined;
  }

  if (fs.existsSync(resume) && fs.statSync(resume).isDirectory()) {
    const lastId = lastCompletedId(resume);
    if (lastId === null) {
      logger.warn(`No stored results in ${resume}; starting from the beginning`);
      return undefined;
    }
    logger.info(`Resuming after question ${lastId} from ${resume}`);
    return lastId + 1;
  }

  const id = Number(resume);
  if (resume.trim() === '' || !Number.isInteger(id)) {
    throw new ConfigurationError(`'${resume}' is neither a run directory nor a question id`);
  }
  logger.info(`Resuming from question id ${id}`);
  return id;
}

/**
 * Apply --decision-model and --advisors to a loaded config. The decision
 * model is resolved first, so any configured advisor can be named even when
 * --advisors leaves it out of the run.
 */
export function applyCliOverrides(config: CouncilConfig, options: RunCliOptions): CouncilConfig {
  if (!options.advisors && !options.decisionModel) {
    return config;
  }
  let result = config;
  if (options.decisionModel) {
    result = overrideDecisionModel(result, options.decisionModel);
  }
  if (options.advisors) {
    result = selectAdvisors(result, options.advisors);
  }
  return ConfigLoader.validate(result);
}

/**
 * Wire the council from configuration; backends are created once, here
 */
export function buildRunner(
  config: CouncilConfig,
  createBackend: BackendFactory = defaultBackendFactory
): CouncilRunner {
  const advisors = new Map<string, VisionBackend>();
  for (const [name, modelConfig] of Object.entries(config.models.advisors)) {
    advisors.set(name, createBackend(modelConfig));
  }
  const decisionBackend = createBackend(config.models.decision);

  const extractor = new AnswerExtractor(config.extraction);
  const prompts = new PromptRenderer({
    advisor: config.prompts.advisorTemplate,
    decision: config.prompts.decisionTemplate,
    advisorOverrides: config.prompts.advisorOverrides,
  });
  const advisorNames = [...advisors.keys()];

  const panel = new AdvisorPanel(advisors, prompts, extractor);
  const arbiter = new DecisionArbiter(decisionBackend, prompts, extractor, advisorNames);
  const processor = new QuestionProcessor(panel, arbiter, { maxImageSizeMb: config.images.maxSizeMb });
  const store = new RunStore(config.runs.directory, { saveRawResponses: config.logging.saveRawResponses });

  return new CouncilRunner(processor, store, advisorNames, {
    decisionModel: describeModel(config.models.decision),
    summaryReport: config.logging.summaryReport,
    categoryAnalysis: config.logging.categoryAnalysis,
    datasetPath: config.dataset.path,
  });
}

/**
 * The `run` command
 */
export async function runCommand(
  options: RunCliOptions,
  createBackend: BackendFactory = defaultBackendFactory
): Promise<RunSummary> {
  const config = applyCliOverrides(ConfigLoader.load(options.config), options);
  setLogLevel(config.logging.level);

  const resumeFrom = resolveResume(options.resume);
  const runner = buildRunner(config, createBackend);
  const questions = await loadQuestions(config.dataset.path, config.dataset.imageBasePath);

  console.log('='.repeat(80));
  console.log(`Starting council run: ${new Date().toISOString()}`);
  console.log(`Configuration: ${options.config || process.env.COUNCIL_CONFIG || DEFAULT_CONFIG_PATH}`);
  console.log(`Advisors: ${Object.keys(config.models.advisors).join(', ')}`);
  console.log(`Decision model: ${describeModel(config.models.decision)}`);
  console.log(`Mode: ${options.test ? 'TEST' : 'PRODUCTION'}`);
  if (options.sample) {
    console.log(`Processing ${options.sample} sample questions`);
  }
  console.log('='.repeat(80));

  const startTime = Date.now();
  const summary = await runner.run(questions, {
    sampleSize: options.sample,
    resumeFrom,
    verbose: options.test || config.logging.verbose,
  });

  const { statistics } = summary;
  console.log(`\n${'='.repeat(80)}`);
  console.log(`Run completed in ${formatDuration(Date.now() - startTime)}`);
  console.log(`Accuracy: ${statistics.correctAnswers}/${statistics.totalQuestions} (${statistics.accuracy.toFixed(1)}%)`);
  console.log(`Results saved in: ${summary.runDirectory}`);
  console.log('='.repeat(80));

  return summary;
}

/**
 * Extraction rules from the config file when one is named or present,
 * otherwise the built-in rules
 */
export function extractorFor(options: RunCliOptions): AnswerExtractor {
  const configPath = options.config || process.env.COUNCIL_CONFIG;
  if (configPath) {
    return new AnswerExtractor(ConfigLoader.load(configPath).extraction);
  }
  if (fs.existsSync(DEFAULT_CONFIG_PATH)) {
    return new AnswerExtractor(ConfigLoader.load(DEFAULT_CONFIG_PATH).extraction);
  }
  return new AnswerExtractor();
}

/**
 * The `reextract` command
 */
export function reextractCommand(positionals: string[], options: RunCliOptions = { test: false }): void {
  const [input, output] = positionals;
  if (!input) {
    throw new ConfigurationError('reextract requires an input results file');
  }
  const summary = reextractResults(input, output, extractorFor(options));
  console.log(`Processed file: ${summary.outputPath}`);
  console.log(`Total questions: ${summary.total}`);
  console.log(`Correct answers: ${summary.correct}`);
  console.log(`Accuracy: ${summary.accuracy.toFixed(2)}%`);
  console.log(`Category statistics: ${summary.statsPath}`);
}

/**
 * Print help message
 */
export function printHelp(): void {
  console.log(`
Image Council

Usage:
  image-council [run] [options]          - Run the council over the dataset
  image-council reextract <input> [out]  - Re-extract answers from a results.jsonl (honours --config)
  image-council help                     - Show this help message

Options:
  --test                       Verbose per-question output
  --sample <n>                 Process only the first n questions
  --resume <dir|id>            Continue after a run directory's last result, or from a question id
  --config <path>              Config file (default: ${DEFAULT_CONFIG_PATH})
  --advisors <name...>         Use only these configured advisors, in this order
  --decision-model <spec>      Advisor name or provider:model for the decision
  `);
}

/**
 * Main CLI function; resolves to the process exit code
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  try {
    const { command, options, positionals } = parseArgs(argv);

    switch (command) {
      case 'run':
        await runCommand(options);
        return 0;
      case 'reextract':
        reextractCommand(positionals, options);
        return 0;
      case 'help':
        printHelp();
        return 0;
    }
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof DatasetError) {
      console.error(`Error: ${error.message}`);
      return 1;
    }
    logger.error('Run failed', error);
    return 1;
  }
}

const isMainModule = (): boolean => {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) {
    return false;
  }
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
};

if (isMainModule()) {
  main()
    .then(code => process.exit(code))
    .catch((error: unknown) => {
      logger.error('Fatal error', error);
      process.exit(1);
    });
}
