/**
 * Extraction rules - the data the AnswerExtractor works from.
 *
 * Key synonyms and phrasings are plain data so another locale can be added
 * from the council config without touching the extraction algorithm.
 */

export interface ExtractionRules {
  /** Canonical answer letters, lowercase */
  alphabet: string[];
  /** Replies starting with this marker are backend errors */
  errorMarker: string;
  /** JSON keys holding the answer, in priority order (compared accent/case-insensitively) */
  answerKeys: string[];
  /** JSON keys holding the justification, in priority order */
  justificationKeys: string[];
  /**
   * Regex sources run against the lowercased reply, in priority order.
   * `{letter}` is replaced with a capture group over the alphabet.
   */
  answerPatterns: string[];
  /** Regex source with one capture group, run case-insensitively */
  justificationPattern: string;
}

export const DEFAULT_EXTRACTION_RULES: ExtractionRules = {
  alphabet: ['a', 'b', 'c', 'd'],
  errorMarker: 'Error:',
  answerKeys: ['respuesta', 'answer', 'opcion', 'option', 'alternativa'],
  justificationKeys: ['justificacion', 'justification', 'reasoning'],
  answerPatterns: [
    `(?:respuesta|answer):\\s*["']?{letter}`,
    `(?:opción|opcion|option):\\s*["']?{letter}`,
    `(?:alternativa|alternative):\\s*["']?{letter}`,
    `["'](?:respuesta|answer)["']\\s*:\\s*["']{letter}`,
    `["'](?:opción|opcion|option)["']\\s*:\\s*["']{letter}`,
    `(?:la respuesta correcta es|the correct answer is)\\s*:?\\s*["']?{letter}`,
    `(?:elijo|opto por|i choose)\\s+["']?{letter}`,
  ],
  justificationPattern:
    `["']?(?:justificación|justificacion|justification|reasoning)["']?\\s*:\\s*["']?(.*?)["']?\\s*(?:\\}|\\n|$)`,
};

/**
 * Overlay partial rules (from config) on the defaults
 */
export function mergeExtractionRules(overrides: Partial<ExtractionRules> = {}): ExtractionRules {
  return {
    alphabet: overrides.alphabet ?? DEFAULT_EXTRACTION_RULES.alphabet,
    errorMarker: overrides.errorMarker ?? DEFAULT_EXTRACTION_RULES.errorMarker,
    answerKeys: overrides.answerKeys ?? DEFAULT_EXTRACTION_RULES.answerKeys,
    justificationKeys: overrides.justificationKeys ?? DEFAULT_EXTRACTION_RULES.justificationKeys,
    answerPatterns: overrides.answerPatterns ?? DEFAULT_EXTRACTION_RULES.answerPatterns,
    justificationPattern: overrides.justificationPattern ?? DEFAULT_EXTRACTION_RULES.justificationPattern,
  };
}
