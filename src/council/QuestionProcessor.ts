/**
 * Question Processor - image check, advisor fan-out, decision, result record
 */

import { validateImage, DEFAULT_MAX_IMAGE_SIZE_MB, ImageCheck } from '../image-processor/imageValidator.js';
import { AdvisorPanel } from './AdvisorPanel.js';
import { DecisionArbiter } from './DecisionArbiter.js';
import { Question, QuestionOutcome, QuestionResult } from './types.js';
import { logger } from '../utils/logger.js';

export type ImageCheckFn = (imagePath: string, maxSizeMb: number) => ImageCheck;

export interface QuestionProcessorOptions {
  maxImageSizeMb?: number;
  /** Replaceable for tests */
  checkImage?: ImageCheckFn;
}

export class QuestionProcessor {
  private readonly maxImageSizeMb: number;
  private readonly checkImage: ImageCheckFn;

  constructor(
    private readonly panel: AdvisorPanel,
    private readonly arbiter: DecisionArbiter,
    options: QuestionProcessorOptions = {}
  ) {
    this.maxImageSizeMb = options.maxImageSizeMb ?? DEFAULT_MAX_IMAGE_SIZE_MB;
    this.checkImage = options.checkImage ?? validateImage;
  }

  /**
   * Process one question; null when it was skipped
   */
  async process(question: Question): Promise<QuestionResult | null> {
    const outcome = await this.evaluate(question);
    return outcome.status === 'processed' ? outcome.result : null;
  }

  /**
   * Process one question and say why it was skipped, if it was
   */
  async evaluate(question: Question): Promise<QuestionOutcome> {
    const check = this.checkImage(question.imagePath, this.maxImageSizeMb);
    if (!check.valid) {
      return { status: 'skipped', question, reason: check.reason };
    }

    logger.info(`Processing question ${question.id}...`);
    const startTime = Date.now();

    const advisors = await this.panel.fanOut(question.imagePath, question.text);
    const decision = await this.arbiter.decide(question.imagePath, question, advisors);

    return {
      status: 'processed',
      result: {
        question,
        advisors,
        decision,
        totalElapsedMs: Date.now() - startTime,
        completedAt: new Date().toISOString(),
      },
    };
  }
}
