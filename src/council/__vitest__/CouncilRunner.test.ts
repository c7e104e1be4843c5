import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CouncilRunner, selectQuestions } from '../CouncilRunner.js';
import { QuestionProcessor } from '../QuestionProcessor.js';
import { AdvisorPanel } from '../AdvisorPanel.js';
import { DecisionArbiter } from '../DecisionArbiter.js';
import { AnswerExtractor } from '../AnswerExtractor.js';
import { PromptRenderer } from '../PromptRenderer.js';
import { RunStore } from '../../runs/RunStore.js';
import { ImageCheck } from '../../image-processor/imageValidator.js';
import { question, replyingBackend } from './fakes.js';

const ids = (count: number) => Array.from({ length: count }, (_, i) => question({ id: i + 1 }));

describe('selectQuestions', () => {
  it('should resume from the given id', () => {
    expect(selectQuestions(ids(5), { resumeFrom: 3 }).map(q => q.id)).toEqual([3, 4, 5]);
  });

  it('should sample the first questions', () => {
    expect(selectQuestions(ids(10), { sampleSize: 3 }).map(q => q.id)).toEqual([1, 2, 3]);
  });

  it('should sample before filtering for resume', () => {
    expect(selectQuestions(ids(10), { sampleSize: 3, resumeFrom: 2 }).map(q => q.id)).toEqual([2, 3]);
  });

  it('should keep everything without options', () => {
    expect(selectQuestions(ids(4)).map(q => q.id)).toEqual([1, 2, 3, 4]);
  });
});

describe('CouncilRunner', () => {
  let runsDir: string;

  beforeEach(() => {
    runsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'council-runner-'));
  });

  afterEach(() => {
    fs.rmSync(runsDir, { recursive: true, force: true });
  });

  function buildRunner(
    checkImage: (imagePath: string) => ImageCheck
  ): { runner: CouncilRunner; processor: QuestionProcessor; store: RunStore } {
    const prompts = new PromptRenderer({ advisor: '{question}', decision: '{advisor_responses}' });
    const extractor = new AnswerExtractor();
    const advisors = new Map([
      ['claude', replyingBackend('claude', '{"answer": "a"}')],
      ['grok', replyingBackend('grok', '{"answer": "a"}')],
    ]);
    const processor = new QuestionProcessor(
      new AdvisorPanel(advisors, prompts, extractor),
      new DecisionArbiter(replyingBackend('judge', '{"answer": "a"}'), prompts, extractor, ['claude', 'grok']),
      { checkImage }
    );
    const store = new RunStore(runsDir);
    const runner = new CouncilRunner(processor, store, ['claude', 'grok'], {
      decisionModel: 'openai:gpt-4o',
    });
    return { runner, processor, store };
  }

  const skipSecond = (imagePath: string): ImageCheck => imagePath.endsWith('/2.png')
    ? { valid: false, reason: `Image not found: ${imagePath}`, sizeMb: 0 }
    : { valid: true, reason: 'ok', sizeMb: 0.1 };

  const questions = [
    question({ id: 1, imagePath: '/img/1.png', correctAnswer: 'a' }),
    question({ id: 2, imagePath: '/img/2.png', correctAnswer: 'a' }),
    question({ id: 3, imagePath: '/img/3.png', correctAnswer: 'b' }),
  ];

  it('should process, skip and persist a whole run', async () => {
    const { runner } = buildRunner(skipSecond);
    const summary = await runner.run(questions);

    expect(summary.statistics.totalQuestions).toBe(2);
    expect(summary.statistics.correctAnswers).toBe(1);
    expect(summary.statistics.consensus.full.count).toBe(2);
    expect(summary.metadata.status).toBe('completed');
    expect(summary.metadata.counts).toEqual({ selected: 3, processed: 2, skipped: 1 });

    const results = fs.readFileSync(path.join(summary.runDirectory, 'results.jsonl'), 'utf-8').trim().split('\n');
    expect(results.map(line => JSON.parse(line).question.id)).toEqual([1, 3]);

    const skipped = fs.readFileSync(path.join(summary.runDirectory, 'skipped.jsonl'), 'utf-8').trim().split('\n');
    expect(skipped).toHaveLength(1);
    expect(JSON.parse(skipped[0]).questionId).toBe(2);
    expect(JSON.parse(skipped[0]).reason).toBe('Image not found: /img/2.png');

    expect(fs.existsSync(path.join(summary.runDirectory, 'stats.json'))).toBe(true);
    expect(fs.existsSync(path.join(summary.runDirectory, 'summary.md'))).toBe(true);
    expect(fs.existsSync(path.join(summary.runDirectory, 'category_analysis.csv'))).toBe(true);
  });

  it('should record run options in the metadata', async () => {
    const { runner } = buildRunner(skipSecond);
    const summary = await runner.run(questions, { sampleSize: 2, resumeFrom: 1, verbose: true });

    expect(summary.metadata.options).toEqual({
      sampleSize: 2,
      resumeFrom: 1,
      verbose: true,
      advisorNames: ['claude', 'grok'],
      decisionModel: 'openai:gpt-4o',
    });
    expect(summary.statistics.totalQuestions).toBe(1);
  });

  it('should write statistics and mark the run failed when the loop is interrupted', async () => {
    const { runner, processor } = buildRunner(skipSecond);
    const evaluate = processor.evaluate.bind(processor);
    let calls = 0;
    vi.spyOn(processor, 'evaluate').mockImplementation(async q => {
      calls++;
      if (calls === 3) {
        throw new Error('disk full');
      }
      return evaluate(q);
    });

    await expect(runner.run(questions)).rejects.toThrow('disk full');

    const [runId] = fs.readdirSync(runsDir);
    const runDirectory = path.join(runsDir, runId);
    const metadata = JSON.parse(fs.readFileSync(path.join(runDirectory, 'metadata.json'), 'utf-8'));
    const stats = JSON.parse(fs.readFileSync(path.join(runDirectory, 'stats.json'), 'utf-8'));

    expect(metadata.status).toBe('failed');
    expect(stats.totalQuestions).toBe(1);
  });

  it('should keep the loop error when finalizing the run also fails', async () => {
    const { runner, processor, store } = buildRunner(skipSecond);
    vi.spyOn(processor, 'evaluate').mockRejectedValue(new Error('disk full'));
    vi.spyOn(store, 'saveStatistics').mockImplementation(() => {
      throw new Error('stats write failed');
    });

    await expect(runner.run(questions)).rejects.toThrow('disk full');
  });

  it('should surface a finalization error when the loop succeeded', async () => {
    const { runner, store } = buildRunner(skipSecond);
    vi.spyOn(store, 'saveStatistics').mockImplementation(() => {
      throw new Error('stats write failed');
    });

    await expect(runner.run(questions)).rejects.toThrow('stats write failed');
  });

  it('should print the per-question summary to stdout in verbose mode', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const { runner } = buildRunner(skipSecond);

    await runner.run([questions[0]], { verbose: true });

    const lines = log.mock.calls.map(call => String(call[0]));
    expect(lines).toEqual([
      `\nQuestion 1: ${questions[0].text}`,
      '  Correct answer: a',
      '  claude: a (10ms)',
      '  grok: a (10ms)',
      '  Decision: a - correct',
    ]);
  });
});
