/**
 * Anthropic Vision Provider - Messages API with a base64 image block
 */

import { VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, Completion } from './BaseCloudVisionProvider.js';
import { ConfigurationError } from '../../config/errors.js';

interface AnthropicMessageResponse {
  id: string;
  type: string;
  role: string;
  content: Array<{
    type: string;
    text?: string;
  }>;
  model: string;
  stop_reason: string;
  usage: {
    input_tokens: number;
    output_tokens: number;
  };
}

export class AnthropicVisionProvider extends BaseCloudVisionProvider {
  name: string;
  protected readonly providerName = 'anthropic';
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    this.model = config.model;
    this.name = `${config.model}-anthropic`;
    this.baseUrl = config.baseUrl || 'https://api.anthropic.com/v1';

    if (!this.apiKey) {
      throw new ConfigurationError(
        'Anthropic API key is required. Set ANTHROPIC_API_KEY environment variable or provide apiKey in config.'
      );
    }
  }

  protected async complete(imagePath: string, prompt: string): Promise<Completion> {
    const { base64, mimeType } = this.buildImageContent(imagePath);

    const requestBody: Record<string, unknown> = {
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'text',
              text: prompt
            },
            {
              type: 'image',
              source: {
                type: 'base64',
                media_type: mimeType,
                data: base64
              }
            }
          ]
        }
      ]
    };

    // Only send temperature when it is set above zero
    if (this.temperature > 0) {
      requestBody.temperature = this.temperature;
    }

    const response = await this.postJson<AnthropicMessageResponse>(
      `${this.baseUrl}/messages`,
      {
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01'
      },
      requestBody
    );

    const textContent = response.content?.find(c => c.type === 'text');
    if (typeof textContent?.text !== 'string') {
      throw new Error('anthropic returned no text content');
    }

    return {
      text: textContent.text,
      usage: response.usage ? {
        input_tokens: response.usage.input_tokens,
        output_tokens: response.usage.output_tokens,
        total_tokens: response.usage.input_tokens + response.usage.output_tokens
      } : undefined
    };
  }
}
