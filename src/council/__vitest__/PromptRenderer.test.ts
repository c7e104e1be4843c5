import { describe, it, expect } from 'vitest';
import { MISSING_RESPONSE_PLACEHOLDER, PromptRenderer, renderTemplate } from '../PromptRenderer.js';

describe('renderTemplate', () => {
  it('should fill known slots and leave unknown ones', () => {
    expect(renderTemplate('Q: {question} / {missing}', { question: 'Why?' })).toBe('Q: Why? / {missing}');
  });

  it('should not treat JSON braces in a template as slots', () => {
    expect(renderTemplate('Reply as {"answer": "x"} for {question}', { question: 'Q1' }))
      .toBe('Reply as {"answer": "x"} for Q1');
  });
});

describe('PromptRenderer', () => {
  const renderer = new PromptRenderer({
    advisor: 'As {advisor}: {question}',
    decision: '{question}\n{advisor_responses}\nSecond said: {grok_response}',
    advisorOverrides: { special: 'Special prompt for {question}' },
  });

  it('should render the shared advisor template', () => {
    expect(renderer.advisorPrompt('claude', 'What is shown?')).toBe('As claude: What is shown?');
  });

  it('should prefer an advisor-specific template', () => {
    expect(renderer.advisorPrompt('special', 'What is shown?')).toBe('Special prompt for What is shown?');
  });

  it('should number advisor responses in the given order', () => {
    const prompt = renderer.decisionPrompt('What is shown?', [
      { name: 'claude', text: 'A' },
      { name: 'grok', text: 'B' },
    ]);
    expect(prompt).toBe('What is shown?\nAdvisor 1 (claude):\nA\n\nAdvisor 2 (grok):\nB\nSecond said: B');
  });

  it('should fill response slots of advisors outside the run with the placeholder', () => {
    const prompt = new PromptRenderer({
      advisor: '{question}',
      decision: '1 {claude_response}\n2 {grok_response}\n3 {deepseek_response}\n{other}',
    }).decisionPrompt('Q', [
      { name: 'claude', text: 'A' },
      { name: 'grok', text: 'B' },
    ]);
    expect(prompt).toBe(`1 A\n2 B\n3 ${MISSING_RESPONSE_PLACEHOLDER}\n{other}`);
  });
});
