import { z } from "zod";
import { stepIdFor, type Intent } from "../types/plan.js";
import type { StepKind, ValidStep } from "../types/steps.js";
import { normalizeOptions, parsePayload, resolveKind } from "./schema.js";

function fallbackPayload(kind: StepKind, intent: Intent, question: string): Record<string, unknown> {
  const common = intent.required === undefined ? {} : { required: intent.required };
  switch (kind) {
    case "info":
    case "terminal":
      return { ...common, title: question };
    case "choice":
      return { ...common, question, options: normalizeOptions(intent.option_hints ?? []) };
    case "rating":
      return { ...common, question, scale_min: 1, scale_max: 5 };
    default:
      return { ...common, question };
  }
}

/**
 * Builds the step for an intent the reasoning output did not cover.
 * Derived from the plan alone, so repeated renders produce the same fallback.
 */
export function fallbackStep(intent: Intent): ValidStep {
  const question = (intent.question ?? "").trim() || intent.intent.trim() || "Continue.";
  const base = { intent_id: intent.intent_id, id: stepIdFor(intent.intent_id) };
  const kind = resolveKind(intent.kind_hint) ?? "prompt";
  try {
    return parsePayload(kind, base, fallbackPayload(kind, intent, question));
  } catch (err) {
    if (!(err instanceof z.ZodError)) throw err;
    return parsePayload("prompt", base, fallbackPayload("prompt", intent, question));
  }
}
