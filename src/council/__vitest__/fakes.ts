import { vi } from 'vitest';
import { BackendResponse, VisionBackend } from '../../image-processor/types.js';
import { AdvisorReply, Decision, Question, QuestionResult } from '../types.js';

export type SendFn = (imagePath: string, prompt: string) => Promise<BackendResponse>;

export function fakeBackend(name: string, send: SendFn): VisionBackend {
  return {
    name,
    send: vi.fn(send),
  };
}

/**
 * Backend that always replies with the same text
 */
export function replyingBackend(name: string, text: string, elapsedMs = 10): VisionBackend {
  return fakeBackend(name, async () => ({ text, elapsedMs, error: false }));
}

export function question(overrides: Partial<Question> = {}): Question {
  return {
    id: 1,
    text: 'Which structure is highlighted?',
    imagePath: '/images/1.png',
    correctAnswer: 'a',
    category1: 'Radiology',
    category2: 'Chest',
    ...overrides,
  };
}

export function reply(parsedAnswer: string, overrides: Partial<AdvisorReply> = {}): AdvisorReply {
  return {
    rawText: `{"answer": "${parsedAnswer}"}`,
    parsedAnswer,
    justification: '',
    elapsedMs: 100,
    failed: false,
    ...overrides,
  };
}

/**
 * Result whose advisors answered `answers` (keyed by name) and whose decision answered `decision`
 */
export function result(
  answers: Record<string, string>,
  decision: string,
  questionOverrides: Partial<Question> = {}
): QuestionResult {
  const q = question(questionOverrides);
  const advisors: Record<string, AdvisorReply> = {};
  for (const [name, answer] of Object.entries(answers)) {
    advisors[name] = reply(answer);
  }
  const decisionReply: Decision = {
    ...reply(decision),
    isCorrect: decision !== '' && decision === q.correctAnswer,
  };
  return {
    question: q,
    advisors,
    decision: decisionReply,
    totalElapsedMs: 250,
    completedAt: '2024-01-01T00:00:00.000Z',
  };
}
