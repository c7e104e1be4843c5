/**
 * Run Store
 *
 * One directory per run, named after its start time. Results are appended
 * to `results.jsonl` as they are produced, so an interrupted run can be
 * resumed from whatever reached the log.
 *
 *   run-<timestamp>-<hex>/
 *     metadata.json    options, status, counts
 *     results.jsonl    one QuestionResult per line
 *     skipped.jsonl    one SkipRecord per line
 *     raw/<id>.json    raw model texts (optional)
 *     stats.json       final RunStatistics
 */

import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { Question, QuestionResult, RunStatistics } from '../council/types.js';
import { logger } from '../utils/logger.js';

export const METADATA_FILE = 'metadata.json';
export const RESULTS_FILE = 'results.jsonl';
export const SKIPPED_FILE = 'skipped.jsonl';
export const STATS_FILE = 'stats.json';
export const RAW_DIRECTORY = 'raw';

export type RunStatus = 'running' | 'completed' | 'failed';

export interface RunOptions {
  sampleSize?: number;
  resumeFrom?: number;
  verbose: boolean;
  advisorNames: string[];
  decisionModel: string;
  datasetPath?: string;
}

export interface RunMetadata {
  runId: string;
  startedAt: string;
  completedAt?: string;
  status: RunStatus;
  options: RunOptions;
  counts: {
    selected: number;
    processed: number;
    skipped: number;
  };
}

export interface SkipRecord {
  questionId: number;
  imagePath: string;
  reason: string;
  skippedAt: string;
}

export interface RunStoreOptions {
  /** Write raw/<id>.json with every model's unparsed text */
  saveRawResponses?: boolean;
}

export class RunStore {
  private readonly runsDirectory: string;
  private readonly saveRawResponses: boolean;
  private metadata: RunMetadata | null = null;
  private runPath: string | null = null;

  constructor(runsDirectory?: string, options: RunStoreOptions = {}) {
    this.runsDirectory = runsDirectory || './runs';
    this.saveRawResponses = options.saveRawResponses ?? false;
  }

  private generateRunId(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    const random = crypto.randomBytes(4).toString('hex');
    return `run-${timestamp}-${random}`;
  }

  startRun(options: RunOptions): RunMetadata {
    const runId = this.generateRunId();

    this.metadata = {
      runId,
      startedAt: new Date().toISOString(),
      status: 'running',
      options,
      counts: { selected: 0, processed: 0, skipped: 0 },
    };

    this.runPath = path.join(this.runsDirectory, runId);
    fs.mkdirSync(this.runPath, { recursive: true });
    this.saveMetadata();

    logger.info(`Started run ${runId}`);
    logger.info(`Run directory: ${this.runPath}`);

    return { ...this.metadata };
  }

  setSelectedCount(count: number): void {
    const { metadata } = this.requireRun();
    metadata.counts.selected = count;
    this.saveMetadata();
  }

  appendResult(result: QuestionResult): void {
    const { metadata, runPath } = this.requireRun();

    fs.appendFileSync(path.join(runPath, RESULTS_FILE), `${JSON.stringify(result)}\n`);

    if (this.saveRawResponses) {
      const rawDir = path.join(runPath, RAW_DIRECTORY);
      fs.mkdirSync(rawDir, { recursive: true });
      const raw = {
        questionId: result.question.id,
        advisors: Object.fromEntries(
          Object.entries(result.advisors).map(([name, reply]) => [name, reply.rawText])
        ),
        decision: result.decision.rawText,
      };
      fs.writeFileSync(path.join(rawDir, `${result.question.id}.json`), JSON.stringify(raw, null, 2));
    }

    metadata.counts.processed++;
    // Metadata is rewritten every 10 results; the log itself is always current
    if (metadata.counts.processed % 10 === 0) {
      this.saveMetadata();
    }
  }

  recordSkip(question: Question, reason: string): void {
    const { metadata, runPath } = this.requireRun();
    const record: SkipRecord = {
      questionId: question.id,
      imagePath: question.imagePath,
      reason,
      skippedAt: new Date().toISOString(),
    };
    fs.appendFileSync(path.join(runPath, SKIPPED_FILE), `${JSON.stringify(record)}\n`);
    metadata.counts.skipped++;
  }

  saveStatistics(statistics: RunStatistics): void {
    const { runPath } = this.requireRun();
    fs.writeFileSync(path.join(runPath, STATS_FILE), JSON.stringify(statistics, null, 2));
  }

  /**
   * Finalize the current run; null when no run is active
   */
  completeRun(status: Exclude<RunStatus, 'running'> = 'completed'): RunMetadata | null {
    if (!this.metadata) {
      return null;
    }

    this.metadata.status = status;
    this.metadata.completedAt = new Date().toISOString();
    this.saveMetadata();

    const metadata = this.metadata;
    this.metadata = null;
    this.runPath = null;
    return metadata;
  }

  getCurrentRunPath(): string | null {
    return this.runPath;
  }

  private requireRun(): { metadata: RunMetadata; runPath: string } {
    if (!this.metadata || !this.runPath) {
      throw new Error('No active run. Call startRun() first.');
    }
    return { metadata: this.metadata, runPath: this.runPath };
  }

  private saveMetadata(): void {
    if (!this.metadata || !this.runPath) {
      return;
    }
    fs.writeFileSync(path.join(this.runPath, METADATA_FILE), JSON.stringify(this.metadata, null, 2));
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isReply(value: unknown): boolean {
  return isRecord(value)
    && typeof value.rawText === 'string'
    && typeof value.parsedAnswer === 'string'
    && typeof value.failed === 'boolean';
}

/**
 * Shape check for one stored result line
 */
export function isQuestionResult(value: unknown): value is QuestionResult {
  if (!isRecord(value)) {
    return false;
  }
  const { question, advisors, decision } = value;
  return isRecord(question)
    && typeof question.id === 'number'
    && typeof question.correctAnswer === 'string'
    && isRecord(advisors)
    && Object.values(advisors).every(isReply)
    && isReply(decision);
}

/**
 * Read a results log. `source` is a run directory or a .jsonl file.
 * Lines that are not valid results are logged and skipped.
 */
export function loadResults(source: string): QuestionResult[] {
  const filePath = fs.existsSync(source) && fs.statSync(source).isDirectory()
    ? path.join(source, RESULTS_FILE)
    : source;

  if (!fs.existsSync(filePath)) {
    return [];
  }

  const results: QuestionResult[] = [];
  const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
  lines.forEach((line, index) => {
    if (!line.trim()) {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      logger.warn(`Skipping invalid JSON at ${filePath}:${index + 1}`);
      return;
    }
    if (isQuestionResult(parsed)) {
      results.push(parsed);
    } else {
      logger.warn(`Skipping malformed result at ${filePath}:${index + 1}`);
    }
  });
  return results;
}

/**
 * Highest question id stored in a run's results log, or null when empty
 */
export function lastCompletedId(runDirectory: string): number | null {
  const results = loadResults(runDirectory);
  if (results.length === 0) {
    return null;
  }
  return results.reduce((max, r) => Math.max(max, r.question.id), results[0].question.id);
}
