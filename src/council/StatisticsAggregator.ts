/**
 * Statistics Aggregator
 *
 * Running totals for one run: overall accuracy, per-model accuracy and
 * timing, advisor consensus buckets, per-category accuracy and a
 * difficulty ranking. Owned by the run; only `record` changes it.
 */

import { isCorrectAnswer } from './DecisionArbiter.js';
import {
  AdvisorReply,
  BucketStats,
  CategoryStats,
  ConsensusBucket,
  DECISION_KEY,
  DifficultQuestion,
  ModelStats,
  QuestionResult,
  RunStatistics,
} from './types.js';

export const CONSENSUS_BUCKETS: readonly ConsensusBucket[] = ['full', 'partial', 'none'];

export const DEFAULT_DIFFICULT_LIMIT = 10;

interface Counter {
  correct: number;
  total: number;
  cumulativeMs: number;
  totalTokens: number;
}

function emptyCounter(): Counter {
  return { correct: 0, total: 0, cumulativeMs: 0, totalTokens: 0 };
}

export interface ConsensusClassification {
  bucket: ConsensusBucket;
  /** Most common parsed answer ('' when no advisor produced one) */
  answer: string;
  count: number;
}

function percentage(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

/**
 * Classify advisor agreement. Empty (unparsed) answers never count as
 * agreeing; ties between equally frequent answers go to the first seen.
 */
export function classifyConsensus(answers: readonly string[], advisorCount: number = answers.length): ConsensusClassification {
  const counts = new Map<string, number>();
  for (const raw of answers) {
    const answer = raw.trim().toLowerCase();
    if (answer) {
      counts.set(answer, (counts.get(answer) ?? 0) + 1);
    }
  }

  let answer = '';
  let count = 0;
  for (const [candidate, frequency] of counts) {
    if (frequency > count) {
      answer = candidate;
      count = frequency;
    }
  }

  let bucket: ConsensusBucket;
  if (advisorCount > 0 && count === advisorCount) {
    bucket = 'full';
  } else if (count > 1) {
    bucket = 'partial';
  } else {
    bucket = 'none';
  }

  return { bucket, answer, count };
}

export class StatisticsAggregator {
  private totalQuestions = 0;
  private correctAnswers = 0;
  private readonly models = new Map<string, Counter>();
  private readonly buckets = new Map<ConsensusBucket, { count: number; correct: number }>();
  private readonly categories = new Map<string, { category1: string; category2: string; total: number; correct: number }>();
  private readonly difficulty: DifficultQuestion[] = [];

  constructor(private readonly advisorNames: readonly string[]) {
    for (const name of [...advisorNames, DECISION_KEY]) {
      this.models.set(name, emptyCounter());
    }
    for (const bucket of CONSENSUS_BUCKETS) {
      this.buckets.set(bucket, { count: 0, correct: 0 });
    }
  }

  record(result: QuestionResult): void {
    const { question, decision } = result;
    this.totalQuestions++;
    if (decision.isCorrect) {
      this.correctAnswers++;
    }

    let correctModels = 0;
    for (const [name, reply] of Object.entries(result.advisors)) {
      const correct = isCorrectAnswer(reply.parsedAnswer, question.correctAnswer);
      this.bump(name, correct, reply);
      if (correct) {
        correctModels++;
      }
    }
    this.bump(DECISION_KEY, decision.isCorrect, decision);
    if (decision.isCorrect) {
      correctModels++;
    }

    const bucket = this.buckets.get(this.consensusBucket(result));
    if (bucket) {
      bucket.count++;
      if (decision.isCorrect) {
        bucket.correct++;
      }
    }

    const categoryKey = JSON.stringify([question.category1, question.category2]);
    const category = this.categories.get(categoryKey)
      ?? { category1: question.category1, category2: question.category2, total: 0, correct: 0 };
    category.total++;
    if (decision.isCorrect) {
      category.correct++;
    }
    this.categories.set(categoryKey, category);

    this.difficulty.push({
      questionId: question.id,
      correctModels,
      totalModels: Object.keys(result.advisors).length + 1,
    });
  }

  /**
   * Agreement level among the advisors (the decision is not counted)
   */
  consensusBucket(result: QuestionResult): ConsensusBucket {
    const answers = Object.values(result.advisors).map(reply => reply.parsedAnswer);
    return classifyConsensus(answers, answers.length).bucket;
  }

  /**
   * Hardest questions first; equal difficulty keeps recording order
   */
  difficultQuestions(limit: number = DEFAULT_DIFFICULT_LIMIT): DifficultQuestion[] {
    // Array.prototype.sort is stable
    return [...this.difficulty]
      .sort((a, b) => a.correctModels - b.correctModels)
      .slice(0, Math.max(0, limit));
  }

  categoryBreakdown(): CategoryStats[] {
    return [...this.categories.values()].map(c => ({
      ...c,
      accuracy: percentage(c.correct, c.total),
    }));
  }

  modelStats(): Record<string, ModelStats> {
    const stats: Record<string, ModelStats> = {};
    for (const [name, counter] of this.models) {
      stats[name] = {
        ...counter,
        accuracy: percentage(counter.correct, counter.total),
        averageMs: counter.total > 0 ? counter.cumulativeMs / counter.total : 0,
      };
    }
    return stats;
  }

  consensusStats(): Record<ConsensusBucket, BucketStats> {
    const stats: Record<ConsensusBucket, BucketStats> = {
      full: { count: 0, correct: 0, accuracy: 0 },
      partial: { count: 0, correct: 0, accuracy: 0 },
      none: { count: 0, correct: 0, accuracy: 0 },
    };
    for (const [bucket, counter] of this.buckets) {
      stats[bucket] = { ...counter, accuracy: percentage(counter.correct, counter.count) };
    }
    return stats;
  }

  snapshot(difficultLimit: number = DEFAULT_DIFFICULT_LIMIT): RunStatistics {
    return {
      totalQuestions: this.totalQuestions,
      correctAnswers: this.correctAnswers,
      accuracy: percentage(this.correctAnswers, this.totalQuestions),
      advisorNames: [...this.advisorNames],
      perModel: this.modelStats(),
      consensus: this.consensusStats(),
      categories: this.categoryBreakdown(),
      difficultQuestions: this.difficultQuestions(difficultLimit),
    };
  }

  private bump(name: string, correct: boolean, reply: AdvisorReply): void {
    const counter = this.models.get(name) ?? emptyCounter();
    counter.total++;
    if (correct) {
      counter.correct++;
    }
    counter.cumulativeMs += reply.elapsedMs;
    counter.totalTokens += reply.usage?.total_tokens ?? 0;
    this.models.set(name, counter);
  }
}
