import { vi } from 'vitest';
import type { Intent, Plan } from '../types/plan.js';
import type { CompletionArgs, CompletionOut } from '../types/llm.js';
import type { LLMProvider } from '../llm/provider.js';

export function makePlan(intents: Array<Partial<Intent> & { intent_id: string }>, plan_id = 'plan-1'): Plan {
  return {
    plan_id,
    intents: intents.map(i => ({ intent: `Ask about ${i.intent_id}`, ...i }))
  };
}

export function line(obj: Record<string, unknown>): string {
  return JSON.stringify(obj);
}

/** `hang` never settles unless the call's signal aborts. */
export type Scripted = string | Error | 'hang';

export function scriptedProvider(script: Scripted[]) {
  const calls: CompletionArgs[] = [];
  let i = 0;
  const complete = vi.fn(async (args: CompletionArgs): Promise<CompletionOut> => {
    calls.push(args);
    const next = script[Math.min(i++, script.length - 1)];
    if (next === 'hang') {
      return new Promise<CompletionOut>((_, reject) => {
        args.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    if (next instanceof Error) throw next;
    return { content: next };
  });
  const provider: LLMProvider = { complete };
  return { provider, complete, calls };
}
