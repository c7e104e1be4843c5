/**
 * Vision Backend Factory - Creates the provider class for a model config.
 *
 * Provider dispatch happens here, once, at configuration time; the council
 * only ever sees the VisionBackend capability.
 */

import { VisionBackend, VisionModelConfig } from './types.js';
import { OpenAIVisionProvider } from './providers/OpenAIVisionProvider.js';
import { AnthropicVisionProvider } from './providers/AnthropicVisionProvider.js';
import { GoogleVisionProvider } from './providers/GoogleVisionProvider.js';
import { ConfigurationError } from '../config/errors.js';

type Environment = Record<string, string | undefined>;

/**
 * Resolve the API key for a provider; environment variables take precedence
 */
export function resolveApiKey(config: VisionModelConfig, env: Environment = process.env): string | undefined {
  switch (config.provider) {
    case 'openai':
      return env.OPENAI_API_KEY || config.apiKey;
    case 'anthropic':
      return env.ANTHROPIC_API_KEY || config.apiKey;
    case 'google':
      return env.GOOGLE_API_KEY || env.GEMINI_API_KEY || config.apiKey;
    case 'openrouter':
      return env.OPENROUTER_API_KEY || config.apiKey;
    case 'xai':
      return env.XAI_API_KEY || config.apiKey;
  }
}

export class VisionBackendFactory {
  /**
   * Create a vision backend for the provided config
   */
  static create(config: VisionModelConfig, env: Environment = process.env): VisionBackend {
    const effectiveConfig: VisionModelConfig = { ...config, apiKey: resolveApiKey(config, env) };

    switch (effectiveConfig.provider) {
      case 'openai':
      case 'openrouter':
      case 'xai':
        return new OpenAIVisionProvider(effectiveConfig);
      case 'anthropic':
        return new AnthropicVisionProvider(effectiveConfig);
      case 'google':
        return new GoogleVisionProvider(effectiveConfig);
    }

    throw new ConfigurationError(`Unknown provider: ${String(config.provider)}`);
  }
}
