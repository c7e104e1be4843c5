/**
 * Base Cloud Vision Provider
 *
 * Shared functionality for cloud vision API providers:
 * - Image base64 encoding with MIME detection
 * - JSON requests with a per-request timeout (single attempt, no retries)
 * - Conversion of every failure into an error response, so `send` never rejects
 */

import { VisionBackend, BackendResponse, VisionModelConfig } from '../types.js';
import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_TIMEOUT_MS = 120000;
export const DEFAULT_MAX_TOKENS = 1000;

/**
 * Cloud vision provider error with the HTTP status that caused it
 */
export class CloudVisionError extends Error {
  constructor(
    message: string,
    public provider: string,
    public statusCode: number
  ) {
    super(message);
    this.name = 'CloudVisionError';
  }
}

/**
 * Text and usage from one completed provider call
 */
export interface Completion {
  text: string;
  usage?: BackendResponse['usage'];
}

/**
 * Base class for cloud vision providers (OpenAI-compatible, Anthropic, Google)
 */
export abstract class BaseCloudVisionProvider implements VisionBackend {
  abstract name: string;
  protected abstract readonly providerName: string;
  protected config: VisionModelConfig;
  protected apiKey: string;
  protected timeout: number;

  constructor(config: VisionModelConfig) {
    this.config = config;
    this.apiKey = config.apiKey || '';
    this.timeout = config.options?.timeout || DEFAULT_TIMEOUT_MS;
  }

  /**
   * Provider-specific request; may throw, `send` converts the failure
   */
  protected abstract complete(imagePath: string, prompt: string): Promise<Completion>;

  /**
   * Send the image and prompt once and time the call
   */
  async send(imagePath: string, prompt: string): Promise<BackendResponse> {
    const startTime = Date.now();

    try {
      const completion = await this.complete(imagePath, prompt);
      return {
        text: completion.text,
        elapsedMs: Date.now() - startTime,
        error: false,
        usage: completion.usage
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        text: `Error: ${message}`,
        elapsedMs: Date.now() - startTime,
        error: true
      };
    }
  }

  protected get maxTokens(): number {
    return this.config.options?.maxTokens || DEFAULT_MAX_TOKENS;
  }

  protected get temperature(): number {
    return this.config.options?.temperature ?? 0.1;
  }

  /**
   * Read image file and convert to base64 with MIME type detection
   */
  protected buildImageContent(imagePath: string): { base64: string; mimeType: string } {
    const imageBuffer = fs.readFileSync(imagePath);
    const base64 = imageBuffer.toString('base64');
    const ext = path.extname(imagePath).toLowerCase();

    const mimeTypes: Record<string, string> = {
      '.jpg': 'image/jpeg',
      '.jpeg': 'image/jpeg',
      '.png': 'image/png',
      '.gif': 'image/gif',
      '.webp': 'image/webp'
    };

    const mimeType = mimeTypes[ext] || 'image/jpeg';
    return { base64, mimeType };
  }

  /**
   * POST a JSON body once, with a timeout, and return the parsed JSON reply
   */
  protected async postJson<T>(url: string, headers: Record<string, string>, body: unknown): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal: controller.signal
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new CloudVisionError(
          `API error: ${response.status} - ${errorText}`,
          this.providerName,
          response.status
        );
      }

      return await response.json() as T;
    } catch (error) {
      if (error instanceof CloudVisionError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new CloudVisionError(`Request timeout after ${this.timeout}ms`, this.providerName, 0);
      }

      throw new CloudVisionError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.providerName,
        0
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
