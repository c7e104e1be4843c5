/**
 * Report Renderer - summary.md and category_analysis.csv for a finished run
 */

import * as fs from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import { CONSENSUS_BUCKETS } from '../council/StatisticsAggregator.js';
import { CategoryStats, ConsensusBucket, RunStatistics } from '../council/types.js';

export const SUMMARY_FILE = 'summary.md';
export const CATEGORY_FILE = 'category_analysis.csv';

const BUCKET_LABELS: Record<ConsensusBucket, (advisors: number) => string> = {
  full: n => `Full agreement (${n}/${n})`,
  partial: () => 'Partial agreement',
  none: () => 'No agreement',
};

export interface SummaryOptions {
  generatedAt?: Date;
  /** Wall-clock time of the whole run */
  totalElapsedMs?: number;
}

export interface ReportOptions extends SummaryOptions {
  summaryReport: boolean;
  categoryAnalysis: boolean;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / 1000);
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

export function renderSummaryMarkdown(stats: RunStatistics, options: SummaryOptions = {}): string {
  const generatedAt = (options.generatedAt ?? new Date()).toISOString();
  const lines: string[] = [];

  lines.push(`# Run summary - ${generatedAt}`, '');

  lines.push('## General metrics');
  lines.push(`- Total questions: ${stats.totalQuestions}`);
  lines.push(`- Correct answers: ${stats.correctAnswers}`);
  lines.push(`- Overall accuracy: ${stats.accuracy.toFixed(1)}%`);
  if (options.totalElapsedMs !== undefined) {
    lines.push(`- Total processing time: ${formatDuration(options.totalElapsedMs)}`);
  }
  lines.push('');

  lines.push('## Per-model performance');
  lines.push('| Model | Correct | Accuracy | Average time | Tokens |');
  lines.push('|-------|---------|----------|--------------|--------|');
  for (const [name, model] of Object.entries(stats.perModel)) {
    if (model.total === 0) continue;
    lines.push(
      `| ${name} | ${model.correct}/${model.total} | ${model.accuracy.toFixed(1)}% | ${(model.averageMs / 1000).toFixed(2)}s | ${model.totalTokens} |`
    );
  }
  lines.push('');

  if (stats.totalQuestions > 0) {
    lines.push('## Consensus');
    const advisorCount = stats.advisorNames.length;
    for (const bucket of CONSENSUS_BUCKETS) {
      const entry = stats.consensus[bucket];
      lines.push(`- ${BUCKET_LABELS[bucket](advisorCount)}: ${entry.count} questions (${entry.accuracy.toFixed(1)}% accuracy)`);
    }
    lines.push('');
  }

  if (stats.difficultQuestions.length > 0) {
    lines.push(`## Top ${stats.difficultQuestions.length} hardest questions`);
    stats.difficultQuestions.forEach((q, i) => {
      lines.push(`${i + 1}. ID ${q.questionId}: ${q.correctModels}/${q.totalModels} models correct`);
    });
    lines.push('');
  }

  if (stats.categories.length > 0) {
    lines.push('## Accuracy by category');
    lines.push('| Category 1 | Category 2 | Total | Correct | Accuracy |');
    lines.push('|------------|------------|-------|---------|----------|');
    for (const c of stats.categories) {
      lines.push(`| ${c.category1} | ${c.category2} | ${c.total} | ${c.correct} | ${c.accuracy.toFixed(1)}% |`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function renderCategoryCsv(categories: CategoryStats[]): string {
  return Papa.unparse(
    {
      fields: ['category_1', 'category_2', 'total', 'correct', 'accuracy'],
      data: categories.map(c => [c.category1, c.category2, c.total, c.correct, c.accuracy.toFixed(2)]),
    },
    { newline: '\n' }
  );
}

/**
 * Write the enabled reports into a run directory; returns the written paths
 */
export function writeReports(runDirectory: string, stats: RunStatistics, options: ReportOptions): string[] {
  const written: string[] = [];

  if (options.summaryReport) {
    const summaryPath = path.join(runDirectory, SUMMARY_FILE);
    fs.writeFileSync(summaryPath, renderSummaryMarkdown(stats, options));
    written.push(summaryPath);
  }

  if (options.categoryAnalysis && stats.categories.length > 0) {
    const categoryPath = path.join(runDirectory, CATEGORY_FILE);
    fs.writeFileSync(categoryPath, `${renderCategoryCsv(stats.categories)}\n`);
    written.push(categoryPath);
  }

  return written;
}
