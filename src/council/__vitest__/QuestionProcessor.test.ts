import { describe, it, expect } from 'vitest';
import { QuestionProcessor } from '../QuestionProcessor.js';
import { AdvisorPanel } from '../AdvisorPanel.js';
import { DecisionArbiter } from '../DecisionArbiter.js';
import { AnswerExtractor } from '../AnswerExtractor.js';
import { PromptRenderer } from '../PromptRenderer.js';
import { ImageCheck } from '../../image-processor/imageValidator.js';
import { VisionBackend } from '../../image-processor/types.js';
import { question, replyingBackend } from './fakes.js';

const prompts = new PromptRenderer({ advisor: '{question}', decision: '{advisor_responses}' });
const extractor = new AnswerExtractor();

const validImage = (): ImageCheck => ({ valid: true, reason: 'ok', sizeMb: 0.5 });

function processor(
  advisors: Array<[string, VisionBackend]>,
  judge: VisionBackend,
  checkImage: (path: string, maxSizeMb: number) => ImageCheck = validImage
): QuestionProcessor {
  const names = advisors.map(([name]) => name);
  return new QuestionProcessor(
    new AdvisorPanel(new Map(advisors), prompts, extractor),
    new DecisionArbiter(judge, prompts, extractor, names),
    { checkImage, maxImageSizeMb: 2 }
  );
}

describe('QuestionProcessor', () => {
  it('should produce a result with every advisor and the decision', async () => {
    const result = await processor(
      [
        ['claude', replyingBackend('claude', '{"answer": "a"}')],
        ['grok', replyingBackend('grok', '{"answer": "b"}')],
        ['deepseek', replyingBackend('deepseek', '{"answer": "a"}')],
      ],
      replyingBackend('judge', '{"answer": "a"}')
    ).process(question({ correctAnswer: 'a' }));

    expect(result).not.toBeNull();
    expect(Object.keys(result?.advisors ?? {})).toEqual(['claude', 'grok', 'deepseek']);
    expect(result?.decision.parsedAnswer).toBe('a');
    expect(result?.decision.isCorrect).toBe(true);
    expect(result?.totalElapsedMs).toBeGreaterThanOrEqual(0);
  });

  it('should skip an invalid image without calling any backend', async () => {
    const advisor = replyingBackend('claude', '{"answer": "a"}');
    const judge = replyingBackend('judge', '{"answer": "a"}');
    const missing = (path: string): ImageCheck => ({ valid: false, reason: `Image not found: ${path}`, sizeMb: 0 });

    const qp = processor([['claude', advisor]], judge, missing);
    const outcome = await qp.evaluate(question({ imagePath: '/nowhere.png' }));

    expect(outcome).toEqual({
      status: 'skipped',
      question: question({ imagePath: '/nowhere.png' }),
      reason: 'Image not found: /nowhere.png',
    });
    expect(await qp.process(question({ imagePath: '/nowhere.png' }))).toBeNull();
    expect(advisor.send).not.toHaveBeenCalled();
    expect(judge.send).not.toHaveBeenCalled();
  });

  it('should pass the configured size limit to the image check', async () => {
    const limits: number[] = [];
    const recording = (_path: string, maxSizeMb: number): ImageCheck => {
      limits.push(maxSizeMb);
      return validImage();
    };

    await processor([['claude', replyingBackend('claude', 'a')]], replyingBackend('judge', 'a'), recording)
      .process(question());

    expect(limits).toEqual([2]);
  });
});
