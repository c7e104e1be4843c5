/**
 * Prompt templates for advisors and the decision model.
 * Slots are written as {name}; unknown slots are left in place, except
 * `{<advisor>_response}` slots in the decision prompt, which always get text.
 */

export type TemplateVariables = Record<string, string>;

/** Decision-prompt text for an advisor that failed or is not in the run */
export const MISSING_RESPONSE_PLACEHOLDER = 'No response available';

const RESPONSE_SLOT = /^[a-zA-Z0-9_]+_response$/;

export function renderTemplate(
  template: string,
  variables: TemplateVariables,
  fallback: (name: string) => string | undefined = () => undefined
): string {
  return template.replace(/\{([a-zA-Z0-9_]+)\}/g, (slot: string, name: string) => {
    if (Object.prototype.hasOwnProperty.call(variables, name)) {
      return variables[name];
    }
    return fallback(name) ?? slot;
  });
}

export interface PromptTemplates {
  advisor: string;
  decision: string;
  /** Optional advisor-specific templates, keyed by advisor name */
  advisorOverrides?: Record<string, string>;
}

export class PromptRenderer {
  constructor(private readonly templates: PromptTemplates) {}

  advisorPrompt(advisorName: string, question: string): string {
    const template = this.templates.advisorOverrides?.[advisorName] ?? this.templates.advisor;
    return renderTemplate(template, { question, advisor: advisorName });
  }

  /**
   * `responses` must already be in configured advisor order
   */
  decisionPrompt(question: string, responses: Array<{ name: string; text: string }>): string {
    const variables: TemplateVariables = {
      question,
      advisor_count: String(responses.length),
      advisor_responses: responses
        .map((r, i) => `Advisor ${i + 1} (${r.name}):\n${r.text}`)
        .join('\n\n'),
    };
    for (const response of responses) {
      variables[`${response.name}_response`] = response.text;
    }
    return renderTemplate(this.templates.decision, variables, name =>
      RESPONSE_SLOT.test(name) ? MISSING_RESPONSE_PLACEHOLDER : undefined
    );
  }
}
