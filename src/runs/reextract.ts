/**
 * Re-extraction
 *
 * Runs the answer extractor again over a stored results log, for when the
 * extraction rules changed after the run. Model texts are reused as they
 * are; nothing is sent to a backend.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AnswerExtractor } from '../council/AnswerExtractor.js';
import { isCorrectAnswer } from '../council/DecisionArbiter.js';
import { AdvisorReply, CategoryStats, QuestionResult } from '../council/types.js';
import { loadResults } from './RunStore.js';
import { renderCategoryCsv } from './ReportRenderer.js';
import { logger } from '../utils/logger.js';

export interface ReextractionSummary {
  outputPath: string;
  statsPath: string;
  total: number;
  correct: number;
  accuracy: number;
  /** Results whose decision answer differs from the stored one */
  changed: number;
  categories: CategoryStats[];
}

/**
 * `<dir>/<name>_processed.jsonl` next to the input
 */
export function defaultOutputPath(inputPath: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}_processed.jsonl`);
}

function reextractReply<T extends AdvisorReply>(reply: T, extractor: AnswerExtractor): T {
  if (reply.failed) {
    return reply;
  }
  const { answer, justification } = extractor.extract(reply.rawText);
  return { ...reply, parsedAnswer: answer, justification };
}

export function reextractResult(result: QuestionResult, extractor: AnswerExtractor): QuestionResult {
  const advisors: Record<string, AdvisorReply> = {};
  for (const [name, reply] of Object.entries(result.advisors)) {
    advisors[name] = reextractReply(reply, extractor);
  }
  const decision = reextractReply(result.decision, extractor);

  return {
    ...result,
    advisors,
    decision: {
      ...decision,
      isCorrect: isCorrectAnswer(decision.parsedAnswer, result.question.correctAnswer),
    },
  };
}

function categoryStats(results: QuestionResult[]): CategoryStats[] {
  const groups = new Map<string, CategoryStats>();
  for (const { question, decision } of results) {
    const key = JSON.stringify([question.category1, question.category2]);
    const group = groups.get(key)
      ?? { category1: question.category1, category2: question.category2, total: 0, correct: 0, accuracy: 0 };
    group.total++;
    if (decision.isCorrect) {
      group.correct++;
    }
    group.accuracy = (group.correct / group.total) * 100;
    groups.set(key, group);
  }
  return [...groups.values()];
}

export function reextractResults(
  inputPath: string,
  outputPath?: string,
  extractor: AnswerExtractor = new AnswerExtractor()
): ReextractionSummary {
  if (!fs.existsSync(inputPath)) {
    throw new Error(`Results file not found: ${inputPath}`);
  }

  const target = outputPath ?? defaultOutputPath(inputPath);
  const stored = loadResults(inputPath);
  const results = stored.map(result => reextractResult(result, extractor));

  fs.writeFileSync(target, results.map(r => `${JSON.stringify(r)}\n`).join(''));

  const changed = results.filter(
    (result, i) => result.decision.parsedAnswer !== stored[i].decision.parsedAnswer
  ).length;
  const correct = results.filter(r => r.decision.isCorrect).length;
  const total = results.length;
  const categories = categoryStats(results);

  const statsPath = path.join(path.dirname(target), `${path.parse(target).name}_stats.csv`);
  fs.writeFileSync(statsPath, `${renderCategoryCsv(categories)}\n`);

  const accuracy = total > 0 ? (correct / total) * 100 : 0;
  logger.info(`Re-extracted ${total} results into ${target} (${changed} decisions changed)`);

  return { outputPath: target, statsPath, total, correct, accuracy, changed, categories };
}
