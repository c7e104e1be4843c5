/**
 * Council Runner
 *
 * Drives a whole run: picks the questions, processes them one at a time,
 * feeds each result to the statistics and the run store, and writes the
 * final snapshot and reports even when the loop is interrupted.
 */

import { QuestionProcessor } from './QuestionProcessor.js';
import { StatisticsAggregator } from './StatisticsAggregator.js';
import { Question, QuestionResult, RunStatistics } from './types.js';
import { RunMetadata, RunStore } from '../runs/RunStore.js';
import { writeReports } from '../runs/ReportRenderer.js';
import { logger } from '../utils/logger.js';

export interface SelectionOptions {
  /** Keep only the first N questions, applied before resume filtering */
  sampleSize?: number;
  /** Keep only questions whose id is at least this value */
  resumeFrom?: number;
}

export interface RunParameters extends SelectionOptions {
  /** Print a per-question summary to stdout */
  verbose?: boolean;
}

export interface CouncilRunnerOptions {
  decisionModel: string;
  summaryReport?: boolean;
  categoryAnalysis?: boolean;
  datasetPath?: string;
}

export interface RunSummary {
  runDirectory: string;
  statistics: RunStatistics;
  metadata: RunMetadata;
}

export function selectQuestions(questions: readonly Question[], options: SelectionOptions = {}): Question[] {
  let selected = [...questions];
  if (options.sampleSize !== undefined) {
    selected = selected.slice(0, Math.max(0, options.sampleSize));
  }
  const { resumeFrom } = options;
  if (resumeFrom !== undefined) {
    selected = selected.filter(q => q.id >= resumeFrom);
  }
  return selected;
}

export class CouncilRunner {
  constructor(
    private readonly processor: QuestionProcessor,
    private readonly store: RunStore,
    private readonly advisorNames: readonly string[],
    private readonly options: CouncilRunnerOptions
  ) {}

  async run(questions: readonly Question[], parameters: RunParameters = {}): Promise<RunSummary> {
    const verbose = parameters.verbose ?? false;
    const selected = selectQuestions(questions, parameters);

    this.store.startRun({
      sampleSize: parameters.sampleSize,
      resumeFrom: parameters.resumeFrom,
      verbose,
      advisorNames: [...this.advisorNames],
      decisionModel: this.options.decisionModel,
      datasetPath: this.options.datasetPath,
    });
    this.store.setSelectedCount(selected.length);
    const runDirectory = this.requireRunDirectory();

    logger.info(`Processing ${selected.length} of ${questions.length} questions`);

    const stats = new StatisticsAggregator(this.advisorNames);
    const startTime = Date.now();
    let status: 'completed' | 'failed' = 'failed';
    let metadata: RunMetadata | null = null;

    try {
      for (const question of selected) {
        const outcome = await this.processor.evaluate(question);

        if (outcome.status === 'skipped') {
          logger.warn(`Skipping question ${question.id}: ${outcome.reason}`);
          this.store.recordSkip(question, outcome.reason);
          continue;
        }

        stats.record(outcome.result);
        this.store.appendResult(outcome.result);

        if (verbose) {
          this.logResult(outcome.result);
        }
      }
      status = 'completed';
    } catch (error) {
      logger.error('Run interrupted', error);
      throw error;
    } finally {
      // A finalization error must not replace the error that stopped the loop
      try {
        metadata = this.finish(runDirectory, stats, status, Date.now() - startTime);
      } catch (finishError) {
        if (status === 'completed') {
          throw finishError;
        }
        logger.error('Could not finalize interrupted run', finishError);
      }
    }

    if (!metadata) {
      throw new Error(`Run metadata missing in ${runDirectory}`);
    }

    const statistics = stats.snapshot();
    logger.info(
      `Run finished: ${statistics.correctAnswers}/${statistics.totalQuestions} correct (${statistics.accuracy.toFixed(1)}%)`
    );

    return {
      runDirectory,
      statistics,
      metadata,
    };
  }

  private finish(
    runDirectory: string,
    stats: StatisticsAggregator,
    status: 'completed' | 'failed',
    totalElapsedMs: number
  ): RunMetadata | null {
    const statistics = stats.snapshot();
    this.store.saveStatistics(statistics);
    writeReports(runDirectory, statistics, {
      summaryReport: this.options.summaryReport ?? true,
      categoryAnalysis: this.options.categoryAnalysis ?? true,
      totalElapsedMs,
    });
    return this.store.completeRun(status);
  }

  private logResult(result: QuestionResult): void {
    const { question, decision } = result;
    console.log(`\nQuestion ${question.id}: ${question.text}`);
    console.log(`  Correct answer: ${question.correctAnswer}`);
    for (const [name, reply] of Object.entries(result.advisors)) {
      const answer = reply.failed ? 'failed' : reply.parsedAnswer || '(unparsed)';
      console.log(`  ${name}: ${answer} (${reply.elapsedMs}ms)`);
    }
    console.log(`  Decision: ${decision.parsedAnswer || '(unparsed)'} - ${decision.isCorrect ? 'correct' : 'incorrect'}`);
    if (decision.justification) {
      console.log(`  Justification: ${decision.justification}`);
    }
  }

  private requireRunDirectory(): string {
    const runDirectory = this.store.getCurrentRunPath();
    if (!runDirectory) {
      throw new Error('Run store did not start a run');
    }
    return runDirectory;
  }
}
