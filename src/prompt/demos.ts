import { readFileSync } from "node:fs";
import { z } from "zod";
import { PlanSchema, type Plan } from "../types/plan.js";
import { StepRendererError } from "../orchestrator/errors.js";

/** A finished render shown to the model ahead of the real plan. */
export interface RenderDemo {
  plan: Plan;
  output: string;
}

export class DemoPackError extends StepRendererError {}

const RenderDemoSchema = z.object({
  plan: PlanSchema,
  output: z.string().trim().min(1)
});

/** Reads a JSONL demo pack, one `{ plan, output }` object per line. */
export function loadDemoPack(path: string): RenderDemo[] {
  const demos: RenderDemo[] = [];
  readFileSync(path, "utf-8")
    .split(/\r?\n/)
    .forEach((text, i) => {
      if (!text.trim()) return;
      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch (err) {
        throw new DemoPackError(`${path} line ${i + 1}: invalid JSON`, { cause: err });
      }
      const parsed = RenderDemoSchema.safeParse(json);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new DemoPackError(`${path} line ${i + 1}: ${issue.path.join(".")}: ${issue.message}`);
      }
      demos.push(parsed.data);
    });
  return demos;
}
