// Renders one plan: INVOKING -> PARSING -> VALIDATING -> PLACING -> DONE.
// Any failure is terminal for the call and surfaces as RenderError; retries
// live only inside the invoker.

import type { IntentId, Plan } from "../types/plan.js";
import type { CandidateStep, Rejection, RenderedSequence } from "../types/steps.js";
import type { LLMProvider } from "../llm/provider.js";
import type { RenderDemo } from "../prompt/demos.js";
import type { RenderConfig } from "../config.js";
import { ReasoningInvoker } from "../llm/invoker.js";
import { parseRecords } from "../steps/parser.js";
import { validateCandidates } from "../steps/schema.js";
import { place, uncoveredIntents } from "./placer.js";
import { RenderError, type RenderState } from "./errors.js";
import { COLOR, fmtMs, logStep } from "../log.js";

export interface RenderOptions {
  provider: LLMProvider;
  config: Pick<RenderConfig, "model" | "maxRetries" | "callTimeoutMs"> & Partial<RenderConfig>;
  demos?: readonly RenderDemo[];
  signal?: AbortSignal;
  onTransition?: (state: RenderState) => void;
}

export interface RenderResult {
  sequence: RenderedSequence;
  rejected: Rejection[];
  fallback_intent_ids: IntentId[];
  attempts: number;
}

export async function render(plan: Plan, opts: RenderOptions): Promise<RenderResult> {
  const { provider, config, signal } = opts;
  const started = Date.now();
  let state: RenderState = "INVOKING";
  const enter = (next: RenderState) => {
    state = next;
    opts.onTransition?.(next);
  };

  logStep(`\n${COLOR.cyan("▶ render")} ${plan.plan_id} ${COLOR.gray(`(${plan.intents.length} intent(s))`)}`);
  try {
    // Nothing to ask the model for.
    if (plan.intents.length === 0) {
      enter("PLACING");
      const sequence = place(plan, []);
      enter("DONE");
      logStep(`${COLOR.green("✓ done")} ${plan.plan_id} ${COLOR.gray("(empty plan)")}`);
      return { sequence, rejected: [], fallback_intent_ids: [], attempts: 0 };
    }

    enter("INVOKING");
    const invoker = new ReasoningInvoker(provider, {
      model: config.model,
      maxRetries: config.maxRetries,
      callTimeoutMs: config.callTimeoutMs,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      allowedKinds: config.allowedKinds,
      demos: opts.demos
    });
    const invoked = await invoker.invoke(plan, parseRecords, signal);

    enter("PARSING");
    const candidates: CandidateStep[] = invoked.value;
    logStep(COLOR.gray(`  parsed ${candidates.length} record(s) in ${invoked.attempts} attempt(s)`));

    enter("VALIDATING");
    const { accepted, rejected } = validateCandidates(plan, candidates, config.allowedKinds);
    for (const r of rejected) {
      logStep(COLOR.yellow(`  rejected line ${r.line}${r.intent_id ? ` (${r.intent_id})` : ""}: ${r.path} ${r.reason}`));
    }

    enter("PLACING");
    const sequence = place(plan, accepted, { relaxationPassLimit: config.relaxationPassLimit });
    const fallback_intent_ids = uncoveredIntents(plan, accepted);
    if (fallback_intent_ids.length) {
      logStep(COLOR.yellow(`  fallback for: ${fallback_intent_ids.join(", ")}`));
    }

    enter("DONE");
    logStep(`${COLOR.green("✓ done")} ${plan.plan_id} ${COLOR.gray(`(${fmtMs(Date.now() - started)})`)}`);
    return { sequence, rejected, fallback_intent_ids, attempts: invoked.attempts };
  } catch (err) {
    const failedIn = state;
    enter("FAILED");
    logStep(`${COLOR.red("✗ failed")} ${plan.plan_id} while ${failedIn}`);
    throw new RenderError(failedIn, err);
  }
}
