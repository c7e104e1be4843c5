/**
 * Google Vision Provider - Gemini generateContent with inline image data
 */

import { VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, Completion } from './BaseCloudVisionProvider.js';
import { ConfigurationError } from '../../config/errors.js';

interface GeminiGenerateContentResponse {
  candidates?: Array<{
    content: {
      parts: Array<{
        text?: string;
      }>;
      role: string;
    };
    finishReason: string;
    index: number;
  }>;
  usageMetadata?: {
    promptTokenCount: number;
    candidatesTokenCount: number;
    totalTokenCount: number;
  };
}

export class GoogleVisionProvider extends BaseCloudVisionProvider {
  name: string;
  protected readonly providerName = 'google';
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    this.model = config.model;
    this.name = `${config.model}-google`;
    this.baseUrl = config.baseUrl || 'https://generativelanguage.googleapis.com/v1beta';

    if (!this.apiKey) {
      throw new ConfigurationError(
        'Google API key is required. Set GOOGLE_API_KEY or GEMINI_API_KEY environment variable or provide apiKey in config.'
      );
    }
  }

  protected async complete(imagePath: string, prompt: string): Promise<Completion> {
    const { base64, mimeType } = this.buildImageContent(imagePath);

    const requestBody = {
      contents: [
        {
          parts: [
            {
              text: prompt
            },
            {
              inline_data: {
                mime_type: mimeType,
                data: base64
              }
            }
          ]
        }
      ],
      generationConfig: {
        temperature: this.temperature,
        maxOutputTokens: this.maxTokens
      }
    };

    // Google takes the API key as a query parameter
    const url = `${this.baseUrl}/models/${this.model}:generateContent?key=${this.apiKey}`;
    const response = await this.postJson<GeminiGenerateContentResponse>(url, {}, requestBody);

    const parts = response.candidates?.[0]?.content?.parts;
    if (!parts) {
      throw new Error('google returned no candidates');
    }
    const content = parts
      .map(p => p.text ?? '')
      .join('');

    return {
      text: content,
      usage: response.usageMetadata ? {
        input_tokens: response.usageMetadata.promptTokenCount,
        output_tokens: response.usageMetadata.candidatesTokenCount,
        total_tokens: response.usageMetadata.totalTokenCount
      } : undefined
    };
  }
}
