/**
 * Advisor Panel - fans one question out to every advisor at once.
 *
 * Each advisor's failure stays in its own reply; the panel resolves only
 * after every advisor has settled, and always with one reply per advisor.
 */

import pLimit from 'p-limit';
import { VisionBackend } from '../image-processor/types.js';
import { AnswerExtractor } from './AnswerExtractor.js';
import { PromptRenderer } from './PromptRenderer.js';
import { AdvisorReply } from './types.js';
import { logger } from '../utils/logger.js';

export class AdvisorPanel {
  constructor(
    private readonly advisors: ReadonlyMap<string, VisionBackend>,
    private readonly prompts: PromptRenderer,
    private readonly extractor: AnswerExtractor
  ) {}

  /** Advisor names in configured order */
  get advisorNames(): string[] {
    return [...this.advisors.keys()];
  }

  async fanOut(imagePath: string, questionText: string): Promise<Record<string, AdvisorReply>> {
    const limit = pLimit(Math.max(1, this.advisors.size));

    const entries = await Promise.all(
      [...this.advisors].map(([name, backend]) =>
        limit(async (): Promise<[string, AdvisorReply]> => [
          name,
          await this.consult(name, backend, imagePath, questionText),
        ])
      )
    );

    // Built after the join, so key order follows configuration, not completion
    const replies: Record<string, AdvisorReply> = {};
    for (const [name, reply] of entries) {
      replies[name] = reply;
    }
    return replies;
  }

  private async consult(
    name: string,
    backend: VisionBackend,
    imagePath: string,
    questionText: string
  ): Promise<AdvisorReply> {
    const startTime = Date.now();

    try {
      const prompt = this.prompts.advisorPrompt(name, questionText);
      const response = await backend.send(imagePath, prompt);

      if (response.error) {
        logger.warn(`Advisor ${name} failed: ${response.text}`);
        return failedReply(response.text, response.elapsedMs);
      }

      const { answer, justification } = this.extractor.extract(response.text);
      logger.debug(`Advisor ${name} answered "${answer}" in ${response.elapsedMs}ms`);

      return {
        rawText: response.text,
        parsedAnswer: answer,
        justification,
        elapsedMs: response.elapsedMs,
        failed: false,
        usage: response.usage,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Advisor ${name} raised: ${message}`);
      return failedReply(`Error: ${message}`, Date.now() - startTime);
    }
  }
}

function failedReply(rawText: string, elapsedMs: number): AdvisorReply {
  return {
    rawText,
    parsedAnswer: '',
    justification: '',
    elapsedMs,
    failed: true,
  };
}
