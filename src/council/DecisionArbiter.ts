/**
 * Decision Arbiter - one call to the decision model with every advisor's reply
 */

import { TokenUsage, VisionBackend } from '../image-processor/types.js';
import { AnswerExtractor } from './AnswerExtractor.js';
import { MISSING_RESPONSE_PLACEHOLDER, PromptRenderer } from './PromptRenderer.js';
import { AdvisorReply, Decision, Question } from './types.js';
import { logger } from '../utils/logger.js';

export { MISSING_RESPONSE_PLACEHOLDER };

/**
 * Case-insensitive match of a parsed answer against the correct one.
 * An empty side never matches.
 */
export function isCorrectAnswer(parsedAnswer: string, correctAnswer: string): boolean {
  const parsed = parsedAnswer.trim().toLowerCase();
  const correct = correctAnswer.trim().toLowerCase();
  return parsed !== '' && correct !== '' && parsed === correct;
}

export class DecisionArbiter {
  constructor(
    private readonly backend: VisionBackend,
    private readonly prompts: PromptRenderer,
    private readonly extractor: AnswerExtractor,
    /** Configured advisor order; fixes each advisor's position in the prompt */
    private readonly advisorNames: readonly string[]
  ) {}

  buildPrompt(questionText: string, replies: Record<string, AdvisorReply>): string {
    const responses = this.advisorNames.map(name => {
      const reply = replies[name];
      const text = !reply || reply.failed || !reply.rawText
        ? MISSING_RESPONSE_PLACEHOLDER
        : reply.rawText;
      return { name, text };
    });
    return this.prompts.decisionPrompt(questionText, responses);
  }

  async decide(imagePath: string, question: Question, replies: Record<string, AdvisorReply>): Promise<Decision> {
    const startTime = Date.now();
    const prompt = this.buildPrompt(question.text, replies);

    let rawText: string;
    let elapsedMs: number;
    let failed: boolean;
    let usage: TokenUsage | undefined;
    try {
      const response = await this.backend.send(imagePath, prompt);
      rawText = response.text;
      elapsedMs = response.elapsedMs;
      failed = response.error;
      usage = response.usage;
    } catch (error) {
      rawText = `Error: ${error instanceof Error ? error.message : String(error)}`;
      elapsedMs = Date.now() - startTime;
      failed = true;
    }

    if (failed) {
      logger.warn(`Decision model failed for question ${question.id}: ${rawText}`);
    }

    const { answer, justification } = failed
      ? { answer: '', justification: '' }
      : this.extractor.extract(rawText);

    return {
      rawText,
      parsedAnswer: answer,
      justification,
      elapsedMs,
      failed,
      usage,
      isCorrect: isCorrectAnswer(answer, question.correctAnswer),
    };
  }
}
