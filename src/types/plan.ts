import { z } from "zod";

export type IntentId = string;

export type PlacementHint =
  | { index: number }
  | { before: IntentId }
  | { after: IntentId };

export interface Intent {
  intent_id: IntentId;
  intent: string;
  question?: string;
  kind_hint?: string;
  option_hints?: string[];
  required?: boolean;
  placement?: PlacementHint;
}

export interface Plan {
  plan_id: string;
  intents: Intent[];
  context?: Record<string, unknown>;
}

const PlacementHintSchema = z.union([
  z.object({ index: z.number().int() }).strict(),
  z.object({ before: z.string().min(1) }).strict(),
  z.object({ after: z.string().min(1) }).strict()
]);

export const IntentSchema = z.object({
  intent_id: z.string().min(1),
  intent: z.string().min(1),
  question: z.string().optional(),
  kind_hint: z.string().optional(),
  option_hints: z.array(z.string()).optional(),
  required: z.boolean().optional(),
  placement: PlacementHintSchema.optional()
});

/** Boundary schema for plans arriving from outside the core (the CLI). */
export const PlanSchema = z
  .object({
    plan_id: z.string().min(1),
    intents: z.array(IntentSchema),
    context: z.record(z.unknown()).optional()
  })
  .superRefine((plan, ctx) => {
    const seen = new Set<string>();
    plan.intents.forEach((intent, i) => {
      if (seen.has(intent.intent_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["intents", i, "intent_id"],
          message: `duplicate intent_id '${intent.intent_id}'`
        });
      }
      seen.add(intent.intent_id);
    });
  });

/** Derived step identity: stable across renders, independent of model output. */
export function stepIdFor(intentId: IntentId): string {
  return `step-${intentId.trim().toLowerCase().replace(/_/g, "-")}`;
}
