import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigLoader } from '../ConfigLoader.js';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_ADVISOR_TEMPLATE } from '../CouncilConfig.js';
import { DEFAULT_EXTRACTION_RULES } from '../../council/extractionRules.js';

const MINIMAL = `
models:
  advisors:
    claude:
      provider: anthropic
      model: claude-test
    grok:
      provider: grok
      model: grok-test
      temperature: 0.01
      timeoutMs: 30000
  decision:
    provider: openai
    model: gpt-test
`;

describe('ConfigLoader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'council-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: string, name = 'council.yaml'): string {
    const configPath = path.join(tempDir, name);
    fs.writeFileSync(configPath, content);
    return configPath;
  }

  describe('load', () => {
    it('should fill defaults around the configured models', () => {
      const config = ConfigLoader.load(writeConfig(MINIMAL), {});

      expect(Object.keys(config.models.advisors)).toEqual(['claude', 'grok']);
      expect(config.models.advisors.grok.provider).toBe('xai');
      expect(config.models.advisors.grok.options).toEqual({
        temperature: 0.01,
        maxTokens: undefined,
        timeout: 30000,
      });
      expect(config.models.decision.model).toBe('gpt-test');
      expect(config.prompts.advisorTemplate).toBe(DEFAULT_ADVISOR_TEMPLATE);
      expect(config.dataset.path).toBe('data/questions.csv');
      expect(config.images.maxSizeMb).toBe(4.5);
      expect(config.runs.directory).toBe('./runs');
      expect(config.logging.level).toBe('info');
      expect(config.extraction).toEqual(DEFAULT_EXTRACTION_RULES);
    });

    it('should take the path from COUNCIL_CONFIG', () => {
      const configPath = writeConfig(MINIMAL, 'other.yaml');
      expect(ConfigLoader.load(undefined, { COUNCIL_CONFIG: configPath }).models.decision.provider).toBe('openai');
    });

    it('should report a missing file', () => {
      const missing = path.join(tempDir, 'missing.yaml');
      expect(() => ConfigLoader.load(missing, {})).toThrow(`Config file not found: ${missing}`);
    });

    it('should report unparseable YAML', () => {
      const configPath = writeConfig('models: [unclosed');
      expect(() => ConfigLoader.load(configPath, {})).toThrow(ConfigurationError);
    });

    it('should reject a config that fails validation', () => {
      const configPath = writeConfig(`${MINIMAL}
images:
  maxSizeMb: 0
`);
      expect(() => ConfigLoader.load(configPath, {})).toThrow(
        'Configuration validation failed: images.maxSizeMb must be greater than 0'
      );
    });

    it('should apply environment overrides', () => {
      const config = ConfigLoader.load(writeConfig(MINIMAL), {
        COUNCIL_DATASET: 'elsewhere/questions.json',
        COUNCIL_RUNS_DIR: '/tmp/council-runs',
        LOG_LEVEL: 'DEBUG',
      });

      expect(config.dataset.path).toBe('elsewhere/questions.json');
      expect(config.runs.directory).toBe('/tmp/council-runs');
      expect(config.logging.level).toBe('debug');
    });

    it('should load the shipped config file', () => {
      const config = ConfigLoader.load(path.join('config', 'council.yaml'), {});
      expect(Object.keys(config.models.advisors)).toEqual(['claude', 'grok', 'deepseek']);
      expect(config.dataset.imageBasePath).toBe('./data/');
    });
  });

  describe('fromDocument', () => {
    it('should require a top-level mapping', () => {
      expect(() => ConfigLoader.fromDocument(['a'])).toThrow('Config file must contain a mapping at the top level');
    });

    it('should require a decision model', () => {
      expect(() => ConfigLoader.fromDocument({ models: { advisors: {} } })).toThrow(
        'Invalid configuration: models.decision is required'
      );
    });

    it('should collect every type error', () => {
      const document = {
        models: {
          advisors: { claude: { provider: 'anthropic' } },
          decision: { provider: 'openai', model: 'gpt-test' },
        },
        images: { maxSizeMb: 'big' },
        logging: { verbose: 'yes' },
      };

      expect(() => ConfigLoader.fromDocument(document)).toThrow(
        'Invalid configuration: models.advisors.claude needs both provider and model; '
          + 'images.maxSizeMb must be a number; logging.verbose must be true or false'
      );
    });

    it('should reject an unknown provider', () => {
      const document = {
        models: { advisors: {}, decision: { provider: 'acme', model: 'x' } },
      };
      expect(() => ConfigLoader.fromDocument(document)).toThrow(
        "models.decision.provider 'acme' is not a known provider"
      );
    });

    it('should merge partial extraction rules with the defaults', () => {
      const config = ConfigLoader.fromDocument({
        models: { advisors: {}, decision: { provider: 'gemini', model: 'g' } },
        extraction: { alphabet: ['a', 'b', 'c', 'd', 'e'] },
      });

      expect(config.models.decision.provider).toBe('google');
      expect(config.extraction.alphabet).toEqual(['a', 'b', 'c', 'd', 'e']);
      expect(config.extraction.answerKeys).toEqual(DEFAULT_EXTRACTION_RULES.answerKeys);
    });
  });
});
