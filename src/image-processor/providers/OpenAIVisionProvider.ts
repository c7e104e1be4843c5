/**
 * OpenAI Vision Provider - chat completions with an image_url part.
 *
 * Also serves the OpenAI-compatible endpoints of xAI (Grok) and OpenRouter,
 * which differ only in base URL and credentials.
 */

import { VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, Completion } from './BaseCloudVisionProvider.js';
import { ConfigurationError } from '../../config/errors.js';

interface OpenAIChatCompletionResponse {
  id: string;
  model: string;
  choices: Array<{
    index: number;
    message: {
      role: string;
      content: string | null;
    };
    finish_reason: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

type OpenAICompatibleProvider = 'openai' | 'xai' | 'openrouter';

const ENDPOINTS: Record<OpenAICompatibleProvider, { baseUrl: string; keyVariable: string }> = {
  openai: { baseUrl: 'https://api.openai.com/v1', keyVariable: 'OPENAI_API_KEY' },
  xai: { baseUrl: 'https://api.x.ai/v1', keyVariable: 'XAI_API_KEY' },
  openrouter: { baseUrl: 'https://openrouter.ai/api/v1', keyVariable: 'OPENROUTER_API_KEY' },
};

function isOpenAICompatible(provider: string): provider is OpenAICompatibleProvider {
  return provider in ENDPOINTS;
}

export class OpenAIVisionProvider extends BaseCloudVisionProvider {
  name: string;
  protected readonly providerName: OpenAICompatibleProvider;
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    if (!isOpenAICompatible(config.provider)) {
      throw new ConfigurationError(`Provider ${config.provider} is not OpenAI-compatible`);
    }
    this.providerName = config.provider;
    this.model = config.model;
    this.name = `${config.model}-${config.provider}`;
    this.baseUrl = config.baseUrl || ENDPOINTS[config.provider].baseUrl;

    if (!this.apiKey) {
      const variable = ENDPOINTS[config.provider].keyVariable;
      throw new ConfigurationError(
        `${config.provider} API key is required. Set ${variable} environment variable or provide apiKey in config.`
      );
    }
  }

  protected async complete(imagePath: string, prompt: string): Promise<Completion> {
    const { base64, mimeType } = this.buildImageContent(imagePath);

    const requestBody = {
      model: this.model,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'text',
              text: prompt
            },
            {
              type: 'image_url',
              image_url: {
                url: `data:${mimeType};base64,${base64}`
              }
            }
          ]
        }
      ],
      max_tokens: this.maxTokens,
      temperature: this.temperature
    };

    const response = await this.postJson<OpenAIChatCompletionResponse>(
      `${this.baseUrl}/chat/completions`,
      { 'Authorization': `Bearer ${this.apiKey}` },
      requestBody
    );

    const content = response.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error(`${this.providerName} returned no message content`);
    }

    return {
      text: content,
      usage: response.usage ? {
        input_tokens: response.usage.prompt_tokens,
        output_tokens: response.usage.completion_tokens,
        total_tokens: response.usage.total_tokens
      } : undefined
    };
  }
}
