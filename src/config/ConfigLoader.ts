import * as fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import {
  CouncilConfig,
  DEFAULT_COUNCIL_SETTINGS,
  resolveProviderName,
  validateCouncilConfig,
} from './CouncilConfig.js';
import { ConfigurationError } from './errors.js';
import { ExtractionRules, mergeExtractionRules } from '../council/extractionRules.js';
import { VisionModelConfig } from '../image-processor/types.js';
import { isLogLevel, logger } from '../utils/logger.js';

type Environment = Record<string, string | undefined>;
type Source = Record<string, unknown>;

export const DEFAULT_CONFIG_PATH = path.join('config', 'council.yaml');

function isSource(value: unknown): value is Source {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed reads from an untyped YAML document. Type mismatches are collected
 * rather than thrown so every problem is reported at once.
 */
class SourceReader {
  readonly errors: string[] = [];

  section(source: Source, key: string, where: string): Source {
    const value = source[key];
    if (value === undefined || value === null) {
      return {};
    }
    if (!isSource(value)) {
      this.errors.push(`${where}${key} must be a mapping`);
      return {};
    }
    return value;
  }

  string(source: Source, key: string, where: string): string | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string') {
      this.errors.push(`${where}${key} must be a string`);
      return undefined;
    }
    return value;
  }

  number(source: Source, key: string, where: string): number | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'number' || Number.isNaN(value)) {
      this.errors.push(`${where}${key} must be a number`);
      return undefined;
    }
    return value;
  }

  boolean(source: Source, key: string, where: string): boolean | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'boolean') {
      this.errors.push(`${where}${key} must be true or false`);
      return undefined;
    }
    return value;
  }

  stringList(source: Source, key: string, where: string): string[] | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
      this.errors.push(`${where}${key} must be a list of strings`);
      return undefined;
    }
    return value.map(item => String(item));
  }

  stringMap(source: Source, key: string, where: string): Record<string, string> {
    const map: Record<string, string> = {};
    for (const [name, value] of Object.entries(this.section(source, key, where))) {
      if (typeof value === 'string') {
        map[name] = value;
      } else {
        this.errors.push(`${where}${key}.${name} must be a string`);
      }
    }
    return map;
  }

  model(value: unknown, where: string): VisionModelConfig | undefined {
    if (!isSource(value)) {
      this.errors.push(`${where} must be a mapping`);
      return undefined;
    }
    const providerName = this.string(value, 'provider', `${where}.`);
    const model = this.string(value, 'model', `${where}.`);
    if (!providerName || !model) {
      this.errors.push(`${where} needs both provider and model`);
      return undefined;
    }
    const provider = resolveProviderName(providerName);
    if (!provider) {
      this.errors.push(`${where}.provider '${providerName}' is not a known provider`);
      return undefined;
    }

    return {
      provider,
      model,
      baseUrl: this.string(value, 'baseUrl', `${where}.`),
      apiKey: this.string(value, 'apiKey', `${where}.`),
      description: this.string(value, 'description', `${where}.`),
      options: {
        temperature: this.number(value, 'temperature', `${where}.`),
        maxTokens: this.number(value, 'maxTokens', `${where}.`),
        timeout: this.number(value, 'timeoutMs', `${where}.`),
      },
    };
  }
}

/**
 * Configuration loader for council runs.
 * Reads the YAML file, fills in defaults, applies environment overrides and validates.
 */
export class ConfigLoader {

  /**
   * Load council configuration.
   *
   * Path priority: explicit argument, then COUNCIL_CONFIG, then config/council.yaml.
   */
  static load(configPath?: string, env: Environment = process.env): CouncilConfig {
    const finalPath = configPath || env.COUNCIL_CONFIG || DEFAULT_CONFIG_PATH;

    if (!fs.existsSync(finalPath)) {
      throw new ConfigurationError(`Config file not found: ${finalPath}`);
    }

    let document: unknown;
    try {
      document = yaml.load(fs.readFileSync(finalPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        `Cannot parse ${finalPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const config = this.validate(this.applyEnv(this.fromDocument(document), env));

    logger.info(`Loaded council config from: ${finalPath}`);
    return config;
  }

  /**
   * Throw on validation errors, log warnings, return the config unchanged
   */
  static validate(config: CouncilConfig): CouncilConfig {
    const validation = validateCouncilConfig(config);
    if (!validation.valid) {
      throw new ConfigurationError(`Configuration validation failed: ${validation.errors.join('; ')}`);
    }
    if (validation.warnings.length > 0) {
      logger.warn('Configuration warnings:', validation.warnings);
    }
    return config;
  }

  /**
   * Build a config from a parsed YAML document, defaults filling the gaps
   */
  static fromDocument(document: unknown): CouncilConfig {
    if (!isSource(document)) {
      throw new ConfigurationError('Config file must contain a mapping at the top level');
    }

    const reader = new SourceReader();
    const defaults = DEFAULT_COUNCIL_SETTINGS;

    const models = reader.section(document, 'models', '');
    const advisorSection = reader.section(models, 'advisors', 'models.');
    const advisors: Record<string, VisionModelConfig> = {};
    for (const [name, entry] of Object.entries(advisorSection)) {
      const advisor = reader.model(entry, `models.advisors.${name}`);
      if (advisor) {
        advisors[name] = advisor;
      }
    }
    const decision = models.decision === undefined
      ? undefined
      : reader.model(models.decision, 'models.decision');
    if (models.decision === undefined) {
      reader.errors.push('models.decision is required');
    }

    const prompts = reader.section(document, 'prompts', '');
    const dataset = reader.section(document, 'dataset', '');
    const images = reader.section(document, 'images', '');
    const runs = reader.section(document, 'runs', '');
    const logging = reader.section(document, 'logging', '');
    const extraction = reader.section(document, 'extraction', '');

    const level = reader.string(logging, 'level', 'logging.');
    if (level !== undefined && !isLogLevel(level)) {
      reader.errors.push(`logging.level '${level}' must be one of debug, info, warn, error`);
    }

    const rules: Partial<ExtractionRules> = {
      alphabet: reader.stringList(extraction, 'alphabet', 'extraction.'),
      errorMarker: reader.string(extraction, 'errorMarker', 'extraction.'),
      answerKeys: reader.stringList(extraction, 'answerKeys', 'extraction.'),
      justificationKeys: reader.stringList(extraction, 'justificationKeys', 'extraction.'),
      answerPatterns: reader.stringList(extraction, 'answerPatterns', 'extraction.'),
      justificationPattern: reader.string(extraction, 'justificationPattern', 'extraction.'),
    };

    const settings: Omit<CouncilConfig, 'models'> = {
      prompts: {
        advisorTemplate: reader.string(prompts, 'advisorTemplate', 'prompts.') ?? defaults.prompts.advisorTemplate,
        decisionTemplate: reader.string(prompts, 'decisionTemplate', 'prompts.') ?? defaults.prompts.decisionTemplate,
        advisorOverrides: reader.stringMap(prompts, 'advisorOverrides', 'prompts.'),
      },
      dataset: {
        path: reader.string(dataset, 'path', 'dataset.') ?? defaults.dataset.path,
        imageBasePath: reader.string(dataset, 'imageBasePath', 'dataset.'),
      },
      images: {
        maxSizeMb: reader.number(images, 'maxSizeMb', 'images.') ?? defaults.images.maxSizeMb,
      },
      runs: {
        directory: reader.string(runs, 'directory', 'runs.') ?? defaults.runs.directory,
      },
      logging: {
        level: isLogLevel(level) ? level : defaults.logging.level,
        verbose: reader.boolean(logging, 'verbose', 'logging.') ?? defaults.logging.verbose,
        saveRawResponses: reader.boolean(logging, 'saveRawResponses', 'logging.') ?? defaults.logging.saveRawResponses,
        summaryReport: reader.boolean(logging, 'summaryReport', 'logging.') ?? defaults.logging.summaryReport,
        categoryAnalysis: reader.boolean(logging, 'categoryAnalysis', 'logging.') ?? defaults.logging.categoryAnalysis,
      },
      extraction: mergeExtractionRules(rules),
    };

    if (reader.errors.length > 0 || !decision) {
      throw new ConfigurationError(`Invalid configuration: ${reader.errors.join('; ')}`);
    }

    return { models: { advisors, decision }, ...settings };
  }

  /**
   * Environment variables override the file
   */
  static applyEnv(config: CouncilConfig, env: Environment = process.env): CouncilConfig {
    const level = env.LOG_LEVEL?.toLowerCase();
    return {
      ...config,
      dataset: {
        ...config.dataset,
        path: env.COUNCIL_DATASET || config.dataset.path,
      },
      runs: {
        directory: env.COUNCIL_RUNS_DIR || config.runs.directory,
      },
      logging: {
        ...config.logging,
        level: isLogLevel(level) ? level : config.logging.level,
      },
    };
  }
}
