import type { Message } from "../types/llm.js";
import { stepIdFor, type Plan } from "../types/plan.js";
import { STEP_KINDS, type StepKind } from "../types/steps.js";
import { allowedKindsFor, isRecord } from "../steps/schema.js";
import type { RenderDemo } from "./demos.js";

const KIND_FIELDS: Record<StepKind, string> = {
  info: "title, body?, bullets?",
  prompt: "question, placeholder?, multiline?, max_length?",
  choice: "question, options[{label,value}] (unique values), multi_select?, max_selections?",
  rating: "question, scale_min, scale_max, step?",
  upload: "question, allowed_file_types?, max_files?",
  date: "question, min_date?, max_date?",
  lead_capture: "question, required_inputs? (email|phone|name)",
  terminal: "title, message?"
};

function sortKeys(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sortKeys);
  if (isRecord(v)) return Object.fromEntries(Object.keys(v).sort().map(k => [k, sortKeys(v[k])]));
  return v;
}

/** Stable, compact JSON for prompt context. */
export function compactJson(v: unknown): string {
  return JSON.stringify(sortKeys(v));
}

export interface PromptOptions {
  /** Restricts the kinds offered to the model; the plan's own kind hints stay allowed. */
  allowedKinds?: readonly StepKind[];
  /** Prior renders replayed as user/assistant turns before the real plan. */
  demos?: readonly RenderDemo[];
}

const SYSTEM: Message = {
  role: "system",
  content: [
    "You are the Step Renderer. Convert a question plan into UI steps for the frontend.",
    "Output JSONL only: one JSON object per line, no prose, no markdown, no code fences.",
    'Each line: {"intent_id": <plan intent_id>, "kind": <kind>, "payload": {...}}.',
    "Render every plan item exactly once. Do not invent items.",
    "If an item has kind_hint, use exactly that kind.",
    "Use the item's question verbatim when present; otherwise turn its intent into a user-facing question.",
    "Never write meta-instructions such as 'Ask the user...'.",
    "For choice steps use option_hints when present; otherwise write realistic options."
  ].join("\n")
};

function planMessage(plan: Plan, allowedKinds?: readonly StepKind[]): Message {
  const items = plan.intents.map(i => ({
    intent_id: i.intent_id,
    step_id: stepIdFor(i.intent_id),
    intent: i.intent,
    question: i.question,
    kind_hint: i.kind_hint,
    option_hints: i.option_hints,
    required: i.required
  }));

  const allowed = allowedKindsFor(plan, allowedKinds);
  return {
    role: "user",
    content: [
      "PLAN:",
      compactJson({ plan_id: plan.plan_id, items }),
      "",
      "RENDER CONTEXT:",
      compactJson(plan.context ?? {}),
      "",
      "ALLOWED KINDS AND PAYLOAD FIELDS:",
      ...STEP_KINDS.filter(k => !allowed || allowed.has(k)).map(k => `- ${k}: ${KIND_FIELDS[k]}`),
      "",
      `Emit exactly ${plan.intents.length} line(s).`
    ].join("\n")
  };
}

export function renderStepsPrompt(plan: Plan, options: PromptOptions = {}): Message[] {
  const shots = (options.demos ?? []).flatMap((demo): Message[] => [
    planMessage(demo.plan, options.allowedKinds),
    { role: "assistant", content: demo.output }
  ]);
  return [SYSTEM, ...shots, planMessage(plan, options.allowedKinds)];
}

/** Appended on retry; replaces any earlier note rather than accumulating. */
export function retryNote(reason: string): Message {
  return {
    role: "user",
    content: `Previous attempt failed: ${reason}. Return JSONL only: one JSON object per line, no prose, no code fences.`
  };
}
