/**
 * Configuration schema for a council run: which models advise and decide,
 * the prompt templates, where the questions live and how results are kept.
 */

import { ExtractionRules, DEFAULT_EXTRACTION_RULES } from '../council/extractionRules.js';
import { VisionModelConfig, VisionProviderName, isVisionProviderName } from '../image-processor/types.js';
import { DEFAULT_MAX_IMAGE_SIZE_MB } from '../image-processor/imageValidator.js';
import { LogLevel } from '../utils/logger.js';
import { ConfigurationError } from './errors.js';

/**
 * Advisor names become template slots (`{<name>_response}`)
 */
export const ADVISOR_NAME_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Older provider spellings accepted in config files and on the command line
 */
export const PROVIDER_ALIASES: Record<string, VisionProviderName> = {
  claude: 'anthropic',
  grok: 'xai',
  gemini: 'google',
};

export function resolveProviderName(name: string): VisionProviderName | undefined {
  const lowered = name.trim().toLowerCase();
  if (isVisionProviderName(lowered)) {
    return lowered;
  }
  return PROVIDER_ALIASES[lowered];
}

export interface PromptConfig {
  advisorTemplate: string;
  decisionTemplate: string;
  /** Advisor-specific templates, keyed by advisor name */
  advisorOverrides: Record<string, string>;
}

export interface DatasetConfig {
  path: string;
  /** Directory image paths are resolved against; defaults to the dataset's directory */
  imageBasePath?: string;
}

export interface LoggingConfig {
  level: LogLevel;
  verbose: boolean;
  saveRawResponses: boolean;
  summaryReport: boolean;
  categoryAnalysis: boolean;
}

export interface CouncilConfig {
  models: {
    /** Insertion order is the advisor order used everywhere */
    advisors: Record<string, VisionModelConfig>;
    decision: VisionModelConfig;
  };
  prompts: PromptConfig;
  dataset: DatasetConfig;
  images: { maxSizeMb: number };
  runs: { directory: string };
  logging: LoggingConfig;
  extraction: ExtractionRules;
}

export const DEFAULT_ADVISOR_TEMPLATE = `You are a medical expert. Based on the image, answer the following question:

{question}

Give your answer in this format:
- Answer: the correct option (a/b/c/d)
- Justification: explain your answer very briefly

Reply ONLY with valid JSON.`;

export const DEFAULT_DECISION_TEMPLATE = `You are an expert medical judge. {advisor_count} advisors have analysed a medical image to answer the following question:

{question}

{advisor_responses}

Based on these analyses and your own reading of the image, decide which answer is correct.

Give your answer in this format:
- Answer: the correct option (a/b/c/d)
- Justification: briefly explain your decision

Reply ONLY with valid JSON.`;

/**
 * Everything except the models, which have no sensible default
 */
export const DEFAULT_COUNCIL_SETTINGS: Omit<CouncilConfig, 'models'> = {
  prompts: {
    advisorTemplate: DEFAULT_ADVISOR_TEMPLATE,
    decisionTemplate: DEFAULT_DECISION_TEMPLATE,
    advisorOverrides: {},
  },
  dataset: {
    path: 'data/questions.csv',
  },
  images: {
    maxSizeMb: DEFAULT_MAX_IMAGE_SIZE_MB,
  },
  runs: {
    directory: './runs',
  },
  logging: {
    level: 'info',
    verbose: false,
    saveRawResponses: true,
    summaryReport: true,
    categoryAnalysis: true,
  },
  extraction: DEFAULT_EXTRACTION_RULES,
};

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function compiles(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

function validateModel(label: string, model: VisionModelConfig, errors: string[], warnings: string[]): void {
  if (!isVisionProviderName(model.provider)) {
    errors.push(`${label}: unknown provider '${String(model.provider)}'`);
  }
  if (!model.model) {
    errors.push(`${label}: model is required`);
  }
  const temperature = model.options?.temperature;
  if (temperature !== undefined && (temperature < 0 || temperature > 2)) {
    warnings.push(`${label}: temperature ${temperature} is outside 0-2`);
  }
  const maxTokens = model.options?.maxTokens;
  if (maxTokens !== undefined && maxTokens < 1) {
    errors.push(`${label}: maxTokens must be at least 1`);
  }
  const timeout = model.options?.timeout;
  if (timeout !== undefined && timeout < 1) {
    errors.push(`${label}: timeoutMs must be at least 1`);
  }
}

/**
 * Validate council configuration
 */
export function validateCouncilConfig(config: CouncilConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const advisorNames = Object.keys(config.models.advisors);
  if (advisorNames.length === 0) {
    errors.push('At least one advisor must be configured');
  }
  for (const name of advisorNames) {
    if (!ADVISOR_NAME_PATTERN.test(name)) {
      errors.push(`Advisor name '${name}' may only contain letters, digits and underscores`);
    }
    validateModel(`Advisor '${name}'`, config.models.advisors[name], errors, warnings);
  }
  validateModel('Decision model', config.models.decision, errors, warnings);

  const { prompts } = config;
  if (!prompts.advisorTemplate.trim()) {
    errors.push('Advisor template is required');
  } else if (!prompts.advisorTemplate.includes('{question}')) {
    warnings.push('Advisor template has no {question} slot');
  }
  if (!prompts.decisionTemplate.trim()) {
    errors.push('Decision template is required');
  } else if (!prompts.decisionTemplate.includes('{advisor_responses}')) {
    for (const name of advisorNames) {
      if (!prompts.decisionTemplate.includes(`{${name}_response}`)) {
        warnings.push(`Decision template has no slot for advisor '${name}'`);
      }
    }
  }
  for (const name of Object.keys(prompts.advisorOverrides)) {
    if (!advisorNames.includes(name)) {
      warnings.push(`Prompt override for unknown advisor '${name}'`);
    }
  }

  if (!config.dataset.path) {
    errors.push('Dataset path is required');
  }
  if (!(config.images.maxSizeMb > 0)) {
    errors.push('images.maxSizeMb must be greater than 0');
  }
  if (!config.runs.directory) {
    errors.push('Runs directory is required');
  }

  const { extraction } = config;
  if (extraction.alphabet.length === 0) {
    errors.push('Extraction alphabet must not be empty');
  }
  for (const letter of extraction.alphabet) {
    if (!/^[a-z]$/.test(letter)) {
      errors.push(`Extraction alphabet entry '${letter}' must be a single lowercase letter`);
    }
  }
  if (extraction.answerKeys.length === 0) {
    errors.push('At least one answer key is required');
  }
  for (const pattern of extraction.answerPatterns) {
    if (!pattern.includes('{letter}')) {
      errors.push(`Answer pattern has no {letter} slot: ${pattern}`);
    } else if (!compiles(pattern.split('{letter}').join('([a-z])'))) {
      errors.push(`Answer pattern is not a valid regular expression: ${pattern}`);
    }
  }
  if (!compiles(extraction.justificationPattern)) {
    errors.push('Justification pattern is not a valid regular expression');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Keep only the named advisors, in the order given
 */
export function selectAdvisors(config: CouncilConfig, names: readonly string[]): CouncilConfig {
  const advisors: Record<string, VisionModelConfig> = {};
  for (const name of names) {
    const advisor = config.models.advisors[name];
    if (!advisor) {
      const known = Object.keys(config.models.advisors).join(', ');
      throw new ConfigurationError(`Unknown advisor '${name}' (configured: ${known})`);
    }
    advisors[name] = advisor;
  }
  return { ...config, models: { ...config.models, advisors } };
}

/**
 * Replace the decision model by a configured advisor's name or by `provider:model`
 */
export function overrideDecisionModel(config: CouncilConfig, spec: string): CouncilConfig {
  const advisor = config.models.advisors[spec];
  if (advisor) {
    return { ...config, models: { ...config.models, decision: { ...advisor } } };
  }

  const separator = spec.indexOf(':');
  if (separator > 0 && separator < spec.length - 1) {
    const provider = resolveProviderName(spec.slice(0, separator));
    if (!provider) {
      throw new ConfigurationError(`Unknown provider in decision model '${spec}'`);
    }
    const decision: VisionModelConfig = {
      provider,
      model: spec.slice(separator + 1),
      options: config.models.decision.options,
    };
    return { ...config, models: { ...config.models, decision } };
  }

  throw new ConfigurationError(
    `Decision model '${spec}' is neither a configured advisor nor provider:model`
  );
}

/**
 * Label used for the decision model in run metadata
 */
export function describeModel(model: VisionModelConfig): string {
  return `${model.provider}:${model.model}`;
}
