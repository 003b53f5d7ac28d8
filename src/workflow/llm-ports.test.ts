import { describe, it, expect, vi } from 'vitest';
import { ProviderError } from '@/core/errors.js';
import type { LLMProvider } from '@/providers/types.js';
import { createSnippet } from '@/testing/fixtures/workflow.js';
import { createLlmClassifier, createLlmResponder } from './llm-ports.js';
import { buildSpecialistPrompt, formatClassificationHistory, interpolate } from './prompts.js';

function createFakeProvider(text: string): LLMProvider & { complete: ReturnType<typeof vi.fn> } {
  return {
    id: 'fake:model',
    displayName: 'Fake model',
    complete: vi.fn().mockResolvedValue({ text, usage: { inputTokens: 1, outputTokens: 1 } }),
  };
}

describe('createLlmClassifier', () => {
  it('returns the raw category label and embeds the query in the prompt', async () => {
    const provider = createFakeProvider('Payroll');
    const classifier = createLlmClassifier(provider, { temperature: 0, maxOutputTokens: 1000 });

    const label = await classifier.classifyCategory('Where is my W-2?', []);

    expect(label).toBe('Payroll');
    const params = provider.complete.mock.calls[0]?.[0];
    expect(params.maxTokens).toBe(20);
    expect(params.temperature).toBe(0);
    expect(params.messages[0].content).toContain('Query: Where is my W-2?');
    expect(params.messages[0].content).toContain('Respond with ONLY the category name.');
  });

  it('uses the sentiment prompt for sentiment labels', async () => {
    const provider = createFakeProvider('Negative');
    const classifier = createLlmClassifier(provider, { temperature: 0, maxOutputTokens: 10 });

    const label = await classifier.classifySentiment('Still no paycheck.', []);

    expect(label).toBe('Negative');
    const params = provider.complete.mock.calls[0]?.[0];
    expect(params.maxTokens).toBe(10);
    expect(params.messages[0].content).toContain('Respond with ONLY the sentiment label.');
  });
});

describe('createLlmResponder', () => {
  it('sends the specialist prompt as system prompt and the request as the user message', async () => {
    const provider = createFakeProvider('Direct deposit changes take one pay cycle.');
    const responder = createLlmResponder(provider, { temperature: 0.3, maxOutputTokens: 500 });
    const context = {
      text: 'How do I change my bank account?',
      sentiment: 'Neutral' as const,
      priorityScore: 3,
      history: [],
      knowledge: [],
    };

    const answer = await responder.generate('Payroll', context);

    expect(answer).toBe('Direct deposit changes take one pay cycle.');
    expect(provider.complete).toHaveBeenCalledWith({
      systemPrompt: buildSpecialistPrompt('Payroll', context),
      messages: [{ role: 'user', content: 'How do I change my bank account?' }],
      maxTokens: 500,
      temperature: 0.3,
      signal: undefined,
    });
  });

  it('rejects an empty completion', async () => {
    const responder = createLlmResponder(createFakeProvider(''), {
      temperature: 0,
      maxOutputTokens: 100,
    });

    await expect(
      responder.generate('General', {
        text: 'hello',
        sentiment: 'Neutral',
        priorityScore: 3,
        history: [],
        knowledge: [],
      }),
    ).rejects.toBeInstanceOf(ProviderError);
  });
});

describe('prompts', () => {
  it('leaves unknown placeholders in place', () => {
    expect(interpolate('{{a}} and {{b}}', { a: 'x' })).toBe('x and {{b}}');
  });

  it('keeps the last 3 classification turns, each cut to 100 chars', () => {
    const long = 'x'.repeat(150);
    const block = formatClassificationHistory([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'second' },
      { role: 'user', content: long },
      { role: 'assistant', content: 'fourth' },
    ]);
    expect(block).toBe(
      `Previous conversation context:\nassistant: second\nuser: ${'x'.repeat(100)}\nassistant: fourth`,
    );
  });

  it('renders history and knowledge into the specialist prompt', () => {
    const prompt = buildSpecialistPrompt('Benefits', {
      text: 'Can I add my spouse?',
      sentiment: 'Negative',
      priorityScore: 5,
      history: [{ role: 'user', content: 'I got married' }],
      knowledge: [createSnippet({ title: 'Qualifying life events', content: 'Marriage qualifies.' })],
    });

    expect(prompt).toContain('You are an HR Benefits specialist.');
    expect(prompt).toContain('Employee sentiment: Negative\nPriority level: 5');
    expect(prompt).toContain('Previous conversation:\nUser: I got married');
    expect(prompt).toContain(
      'Relevant HR knowledge base articles:\n1. Qualifying life events: Marriage qualifies.',
    );
  });
});
