import { describe, it, expect } from 'vitest';
import { allowedKindsFor, indexIntents, normalizeOptions, validateCandidates, validateStep } from '../steps/schema.js';
import { ValidationError } from '../orchestrator/errors.js';
import { makePlan } from './helpers.js';

const plan = makePlan([
  { intent_id: 'budget_range' },
  { intent_id: 'name' },
  { intent_id: 'welcome' },
  { intent_id: 'scope', kind_hint: 'choice' }
]);
const intents = indexIntents(plan);

function rejectionOf(record: Record<string, unknown>): ValidationError {
  try {
    validateStep({ line: 1, record }, intents);
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

describe('validateStep', () => {
  it('normalizes a flattened choice record and drops unknown fields', () => {
    const step = validateStep({
      line: 1,
      record: {
        intent_id: 'budget_range',
        kind: 'multiple_choice',
        question: 'What is your budget?',
        options: ['Under $15k', 'Over $40k'],
        extra: 'ignored'
      }
    }, intents);

    expect(step).toEqual({
      intent_id: 'budget_range',
      id: 'step-budget-range',
      kind: 'choice',
      payload: {
        question: 'What is your budget?',
        options: [
          { label: 'Under $15k', value: 'under_15k' },
          { label: 'Over $40k', value: 'over_40k' }
        ]
      }
    });
  });

  it('resolves the intent from a step id and reads a nested payload', () => {
    const step = validateStep({
      line: 1,
      record: { id: 'step_budget_range', kind: 'rating', payload: { question: 'How firm is it?', scale_min: 1, scale_max: 10 } }
    }, intents);
    expect(step.intent_id).toBe('budget_range');
    expect(step.id).toBe('step-budget-range');
    expect(step.payload).toEqual({ question: 'How firm is it?', scale_min: 1, scale_max: 10 });
  });

  it('copies title into question for question kinds and back for titled kinds', () => {
    const prompt = validateStep({ line: 1, record: { intent_id: 'name', type: 'text', title: 'Your name?' } }, intents);
    expect(prompt.kind).toBe('prompt');
    expect(prompt.payload).toEqual({ question: 'Your name?' });

    const info = validateStep({ line: 2, record: { intent_id: 'welcome', kind: 'intro', question: 'Welcome!' } }, intents);
    expect(info.kind).toBe('info');
    expect(info.payload).toEqual({ title: 'Welcome!' });
  });

  it('treats null fields as absent', () => {
    const step = validateStep({ line: 1, record: { intent_id: 'name', kind: 'prompt', question: 'Q', placeholder: null } }, intents);
    expect(step.payload).toEqual({ question: 'Q' });
  });

  it('rejects duplicate option values the record states itself', () => {
    const err = rejectionOf({
      intent_id: 'budget_range',
      kind: 'choice',
      question: 'Q',
      options: [{ label: 'Yes', value: 'yes' }, { label: 'Yes!', value: 'yes' }]
    });
    expect(err.path).toBe('payload.options.1.value');
    expect(err.detail).toBe("duplicate option value 'yes'");
    expect(err.intentId).toBe('budget_range');
  });

  it('suffixes derived option values that collide', () => {
    const step = validateStep({
      line: 1,
      record: { intent_id: 'budget_range', kind: 'choice', question: 'Where?', options: ['日本', '中国', 'A+', 'A-'] }
    }, intents);
    expect(step.payload).toEqual({
      question: 'Where?',
      options: [
        { label: '日本', value: 'option' },
        { label: '中国', value: 'option_2' },
        { label: 'A+', value: 'a' },
        { label: 'A-', value: 'a_2' }
      ]
    });
  });

  it('keeps derived values clear of values stated elsewhere in the list', () => {
    expect(normalizeOptions(['Yes', { label: 'Sure', value: 'yes' }])).toEqual([
      { label: 'Yes', value: 'yes_2' },
      { label: 'Sure', value: 'yes' }
    ]);
  });

  it('drops placeholder options', () => {
    expect(normalizeOptions(['Small', '<<max_depth>>', { label: '{{option_3}}', value: 'x' }, 'Large'])).toEqual([
      { label: 'Small', value: 'small' },
      { label: 'Large', value: 'large' }
    ]);
  });

  it('rejects toy option sets', () => {
    const colours = rejectionOf({ intent_id: 'budget_range', kind: 'choice', question: 'Q', options: ['Red', 'Blue', 'Green'] });
    expect(colours.path).toBe('payload.options');
    expect(colours.detail).toBe('placeholder option set');

    const abstract = rejectionOf({ intent_id: 'budget_range', kind: 'choice', question: 'Q', options: ['Modern', 'Abstract style'] });
    expect(abstract.detail).toBe('placeholder option set');

    const paint = validateStep({
      line: 1,
      record: { intent_id: 'budget_range', kind: 'choice', question: 'Paint?', options: ['Red', 'Blue', 'Green', 'White', 'Black'] }
    }, intents);
    expect(paint.kind).toBe('choice');
  });

  it('rejects kinds outside the allowed set', () => {
    const allowed = allowedKindsFor(plan, ['prompt']);
    expect(allowed).toEqual(new Set(['prompt', 'choice']));
    expect(() => validateStep({ line: 1, record: { intent_id: 'name', kind: 'info', title: 'Hi' } }, intents, allowed))
      .toThrow("kind: kind 'info' is not allowed in this render");
    expect(validateStep({ line: 1, record: { intent_id: 'scope', kind: 'choice', question: 'Q', options: ['A', 'B'] } }, intents, allowed).kind)
      .toBe('choice');
    expect(allowedKindsFor(plan, [])).toBeUndefined();
  });

  it('rejects an unrecognized kind', () => {
    const err = rejectionOf({ intent_id: 'name', kind: 'carousel', question: 'Q' });
    expect(err.path).toBe('kind');
    expect(err.detail).toBe('unrecognized step kind "carousel"');
  });

  it('rejects a kind that contradicts the intent kind hint', () => {
    const err = rejectionOf({ intent_id: 'scope', kind: 'prompt', question: 'Q' });
    expect(err.path).toBe('kind');
    expect(err.detail).toBe("expected 'choice' per intent, got 'prompt'");
  });

  it('rejects a missing required payload field', () => {
    const err = rejectionOf({ intent_id: 'name', kind: 'prompt' });
    expect(err.path).toBe('payload.question');
  });

  it('rejects an inverted rating scale', () => {
    const err = rejectionOf({ intent_id: 'name', kind: 'rating', question: 'Q', scale_min: 5, scale_max: 1 });
    expect(err.path).toBe('payload.scale_max');
  });

  it('rejects records that name no known intent', () => {
    expect(rejectionOf({ intent_id: 'zzz', kind: 'prompt', question: 'Q' }).path).toBe('intent_id');
    expect(rejectionOf({ id: 'step-zzz', kind: 'prompt', question: 'Q' }).path).toBe('id');
    expect(rejectionOf({ kind: 'prompt', question: 'Q' }).path).toBe('intent_id');
  });

  it('is pure: the same input yields the same result', () => {
    const record = { intent_id: 'name', kind: 'prompt', question: 'Q', multiline: true };
    expect(validateStep({ line: 1, record }, intents)).toEqual(validateStep({ line: 1, record }, intents));
    expect(record).toEqual({ intent_id: 'name', kind: 'prompt', question: 'Q', multiline: true });
  });
});

describe('validateCandidates', () => {
  it('keeps the first valid step per intent and reports the rest', () => {
    const { accepted, rejected } = validateCandidates(plan, [
      { line: 1, record: { intent_id: 'name', kind: 'prompt', question: 'First' } },
      { line: 2, record: { intent_id: 'welcome', kind: 'carousel' } },
      { line: 3, record: { intent_id: 'name', kind: 'prompt', question: 'Second' } },
      { line: 4, record: { intent_id: 'zzz', kind: 'prompt', question: 'Q' } }
    ]);

    expect(accepted).toHaveLength(1);
    expect(accepted[0].payload).toEqual({ question: 'First' });
    expect(rejected).toEqual([
      { line: 2, intent_id: 'welcome', path: 'kind', reason: 'unrecognized step kind "carousel"' },
      { line: 3, intent_id: 'name', path: 'intent_id', reason: 'duplicate step for intent' },
      { line: 4, intent_id: undefined, path: 'intent_id', reason: "unknown intent 'zzz'" }
    ]);
  });

  it('screens kinds against the allowed list', () => {
    const { accepted, rejected } = validateCandidates(plan, [
      { line: 1, record: { intent_id: 'name', kind: 'text', question: 'Name?' } },
      { line: 2, record: { intent_id: 'welcome', kind: 'intro', title: 'Hi' } }
    ], ['prompt']);
    expect(accepted.map(s => s.intent_id)).toEqual(['name']);
    expect(rejected).toEqual([
      { line: 2, intent_id: 'welcome', path: 'kind', reason: "kind 'info' is not allowed in this render" }
    ]);
  });
});
