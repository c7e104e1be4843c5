/**
 * Vision Backend Types
 */

export type VisionProviderName = 'openai' | 'anthropic' | 'google' | 'openrouter' | 'xai';

export const VISION_PROVIDERS: readonly VisionProviderName[] = [
  'openai',
  'anthropic',
  'google',
  'openrouter',
  'xai',
];

export function isVisionProviderName(value: unknown): value is VisionProviderName {
  return VISION_PROVIDERS.some(provider => provider === value);
}

export interface TokenUsage {
  input_tokens?: number;
  output_tokens?: number;
  total_tokens?: number;
}

/**
 * What a backend returns for one image + prompt call.
 * Failures are data: `error` is true and `text` carries the error message.
 */
export interface BackendResponse {
  text: string;
  elapsedMs: number;
  error: boolean;
  /** Token usage for cost tracking, when the provider reports it */
  usage?: TokenUsage;
}

/**
 * Uniform capability every model backend offers to the council.
 * `send` must never reject.
 */
export interface VisionBackend {
  name: string;
  send(imagePath: string, prompt: string): Promise<BackendResponse>;
}

export interface VisionModelConfig {
  provider: VisionProviderName;
  baseUrl?: string;  // Optional, each provider has a default
  model: string;
  description?: string;
  apiKey?: string;   // Env var takes precedence
  options?: {
    temperature?: number;
    maxTokens?: number;
    timeout?: number;       // Request timeout in ms
  };
}
