/**
 * Council Types - questions, advisor replies, decisions and run statistics
 */

import type { TokenUsage } from '../image-processor/types.js';

/**
 * A multiple-choice question about one image. Immutable once loaded.
 */
export interface Question {
  /** Stable identity, used for resume */
  id: number;
  text: string;
  imagePath: string;
  /** One of the answer alphabet, any case */
  correctAnswer: string;
  category1: string;
  category2: string;
}

/**
 * Letter and justification pulled out of a model reply.
 * An empty answer means the reply could not be parsed.
 */
export interface ExtractedAnswer {
  answer: string;
  justification: string;
}

export interface AdvisorReply {
  rawText: string;
  /** Canonical letter, or '' when unparsed */
  parsedAnswer: string;
  justification: string;
  elapsedMs: number;
  failed: boolean;
  /** Provider-reported token counts, when available */
  usage?: TokenUsage;
}

export interface Decision extends AdvisorReply {
  isCorrect: boolean;
}

/**
 * Everything recorded for one processed question
 */
export interface QuestionResult {
  question: Question;
  /** Keyed by advisor name, in configured advisor order */
  advisors: Record<string, AdvisorReply>;
  decision: Decision;
  totalElapsedMs: number;
  completedAt: string;
}

export type QuestionOutcome =
  | { status: 'processed'; result: QuestionResult }
  | { status: 'skipped'; question: Question; reason: string };

export type ConsensusBucket = 'full' | 'partial' | 'none';

export interface ModelStats {
  correct: number;
  total: number;
  cumulativeMs: number;
  /** Sum of provider-reported total tokens */
  totalTokens: number;
  /** Percentage, 0-100 */
  accuracy: number;
  averageMs: number;
}

export interface BucketStats {
  count: number;
  correct: number;
  accuracy: number;
}

export interface CategoryStats {
  category1: string;
  category2: string;
  total: number;
  correct: number;
  accuracy: number;
}

export interface DifficultQuestion {
  questionId: number;
  correctModels: number;
  totalModels: number;
}

/**
 * Read-only view of the aggregator at a point in time
 */
export interface RunStatistics {
  totalQuestions: number;
  correctAnswers: number;
  accuracy: number;
  advisorNames: string[];
  perModel: Record<string, ModelStats>;
  consensus: Record<ConsensusBucket, BucketStats>;
  categories: CategoryStats[];
  difficultQuestions: DifficultQuestion[];
}

/** Key used for the decision model in per-model statistics */
export const DECISION_KEY = 'decision';
