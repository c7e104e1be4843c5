/**
 * Answer Extractor
 *
 * Turns a free-form model reply into a canonical answer letter plus an
 * optional justification. Precedence, highest first:
 * 1. Error replies and empty text yield nothing
 * 2. Structured JSON (code fences stripped) with a known answer key; the
 *    value goes through steps 3 and 4 on its own before the raw text does
 * 3. Localized text patterns ("answer: b", "the correct answer is c", ...)
 * 4. First alphabet letter anywhere in the reply
 *
 * Reasoning prose often contains stray letters, so a structured answer must
 * always win over a pattern match, and a pattern match over the letter scan.
 */

import { ExtractedAnswer } from './types.js';
import { DEFAULT_EXTRACTION_RULES, ExtractionRules } from './extractionRules.js';

const EMPTY: ExtractedAnswer = { answer: '', justification: '' };

function normalizeKey(key: string): string {
  return key.normalize('NFD').replace(/[\u0300-\u036f]/g, '').trim().toLowerCase();
}

function escapeForClass(letter: string): string {
  return letter.replace(/[\\\]^-]/g, '\\$&');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class AnswerExtractor {
  private readonly rules: ExtractionRules;
  private readonly letters: Set<string>;
  private readonly answerPatterns: RegExp[];
  private readonly justificationPattern: RegExp;
  private readonly answerKeys: string[];
  private readonly justificationKeys: string[];

  constructor(rules: ExtractionRules = DEFAULT_EXTRACTION_RULES) {
    this.rules = rules;
    this.letters = new Set(rules.alphabet.map(l => l.toLowerCase()));

    // No global flag anywhere: the regexes stay free of lastIndex state
    const letterGroup = `([${rules.alphabet.map(l => escapeForClass(l.toLowerCase())).join('')}])(?![a-z])`;
    this.answerPatterns = rules.answerPatterns.map(
      source => new RegExp(source.split('{letter}').join(letterGroup))
    );
    this.justificationPattern = new RegExp(rules.justificationPattern, 'i');
    this.answerKeys = rules.answerKeys.map(normalizeKey);
    this.justificationKeys = rules.justificationKeys.map(normalizeKey);
  }

  /**
   * Extract the answer letter and justification from a raw model reply
   */
  extract(rawText: string): ExtractedAnswer {
    if (!rawText || rawText.startsWith(this.rules.errorMarker)) {
      return EMPTY;
    }

    const cleaned = this.stripCodeFences(rawText);
    let structuredJustification = '';

    const data = this.parseObject(cleaned);
    if (data) {
      structuredJustification = this.justificationFromObject(data);
      const answerValue = this.lookup(data, this.answerKeys);
      if (answerValue !== undefined) {
        const answer = this.answerFromValue(answerValue);
        if (answer) {
          return { answer, justification: structuredJustification };
        }
      }
    }

    const lowered = rawText.toLowerCase();
    const matched = this.matchPatterns(lowered);
    if (matched) {
      return {
        answer: matched,
        justification: this.justificationFromText(rawText) || structuredJustification,
      };
    }

    const scanned = this.firstLetter(lowered);
    return scanned ? { answer: scanned, justification: '' } : EMPTY;
  }

  /**
   * Keep the body of a fenced block; drop stray fence markers otherwise
   */
  private stripCodeFences(text: string): string {
    const block = text.match(/```[a-zA-Z]*\s*([\s\S]*?)\s*```/);
    if (block) {
      return block[1].trim();
    }
    return text.replace(/```[a-zA-Z]*/g, '').trim();
  }

  /**
   * Parse the whole text as a JSON object, falling back to the outermost {...}
   */
  private parseObject(text: string): Record<string, unknown> | undefined {
    const whole = tryParseJson(text);
    if (isRecord(whole)) {
      return whole;
    }

    const embedded = text.match(/\{[\s\S]*\}/);
    if (embedded) {
      const inner = tryParseJson(embedded[0]);
      if (isRecord(inner)) {
        return inner;
      }
    }

    return undefined;
  }

  /**
   * First synonym (in priority order) that the object has a key for
   */
  private lookup(data: Record<string, unknown>, synonyms: string[]): unknown {
    const byNormalizedKey = new Map<string, unknown>();
    for (const [key, value] of Object.entries(data)) {
      const normalized = normalizeKey(key);
      if (!byNormalizedKey.has(normalized)) {
        byNormalizedKey.set(normalized, value);
      }
    }

    for (const synonym of synonyms) {
      if (byNormalizedKey.has(synonym)) {
        return byNormalizedKey.get(synonym);
      }
    }
    return undefined;
  }

  private answerFromValue(value: unknown): string {
    if (typeof value !== 'string') {
      return '';
    }
    const normalized = value.trim().toLowerCase();
    if (normalized.length === 0) {
      return '';
    }
    if (this.letters.has(normalized[0])) {
      return normalized[0];
    }
    return this.matchPatterns(normalized) || this.firstLetter(normalized);
  }

  private firstLetter(lowered: string): string {
    for (const char of lowered) {
      if (this.letters.has(char)) {
        return char;
      }
    }
    return '';
  }

  private justificationFromObject(data: Record<string, unknown>): string {
    const value = this.lookup(data, this.justificationKeys);
    if (value === undefined || value === null) {
      return '';
    }
    return typeof value === 'string' ? value : JSON.stringify(value);
  }

  private matchPatterns(lowered: string): string {
    for (const pattern of this.answerPatterns) {
      const match = lowered.match(pattern);
      if (match && match[1]) {
        return match[1];
      }
    }
    return '';
  }

  private justificationFromText(text: string): string {
    const match = text.match(this.justificationPattern);
    return match?.[1]?.trim() ?? '';
  }
}
