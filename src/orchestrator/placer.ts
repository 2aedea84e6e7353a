import { stepIdFor, type Intent, type IntentId, type Plan } from "../types/plan.js";
import type { RenderedSequence, Step, ValidStep } from "../types/steps.js";
import { fallbackStep } from "../steps/fallback.js";
import { PlacementConflictError, PlanDefectError } from "./errors.js";
import { buildHintGraph, linearize, relaxHints } from "./topo.js";

export interface PlaceOptions {
  /** Bound on relative-hint relaxation passes; defaults to the intent count. */
  relaxationPassLimit?: number;
}

function checkPlan(plan: Plan): Map<IntentId, Intent> {
  const n = plan.intents.length;
  const byId = new Map<IntentId, Intent>();
  const stepIds = new Map<string, IntentId>();
  for (const intent of plan.intents) {
    if (byId.has(intent.intent_id)) throw new PlanDefectError(`duplicate intent_id '${intent.intent_id}'`);
    byId.set(intent.intent_id, intent);
    const sid = stepIdFor(intent.intent_id);
    const clash = stepIds.get(sid);
    if (clash !== undefined) {
      throw new PlanDefectError(`intents '${clash}' and '${intent.intent_id}' both map to step id '${sid}'`);
    }
    stepIds.set(sid, intent.intent_id);
  }
  for (const intent of plan.intents) {
    const hint = intent.placement;
    if (!hint) continue;
    if ("index" in hint) {
      if (!Number.isInteger(hint.index) || hint.index < 0 || hint.index >= n) {
        throw new PlanDefectError(`intent '${intent.intent_id}' has index ${hint.index} outside 0..${n - 1}`);
      }
      continue;
    }
    const anchor = "before" in hint ? hint.before : hint.after;
    if (anchor === intent.intent_id) throw new PlanDefectError(`intent '${anchor}' is placed relative to itself`);
    if (!byId.has(anchor)) {
      throw new PlanDefectError(`intent '${intent.intent_id}' is placed relative to unknown intent '${anchor}'`);
    }
  }
  return byId;
}

function firstFreeRun(slots: readonly (IntentId | undefined)[], length: number): number {
  for (let start = 0; start + length <= slots.length; start++) {
    let free = true;
    for (let i = start; i < start + length && free; i++) free = slots[i] === undefined;
    if (free) return start;
  }
  return -1;
}

/**
 * Assigns final positions. Pure: identical inputs yield identical output.
 *
 * Order of precedence: explicit index pins, then relative hints (as blocks
 * around their anchor), then the remaining blocks in plan order, each laid
 * into the leftmost gap wide enough to keep it whole. Intents without a
 * valid step get a plan-derived fallback.
 */
export function place(plan: Plan, validSteps: readonly ValidStep[], options: PlaceOptions = {}): RenderedSequence {
  const byId = checkPlan(plan);
  const n = plan.intents.length;

  const pins = new Map<number, IntentId>();
  for (const intent of plan.intents) {
    const hint = intent.placement;
    if (!hint || !("index" in hint)) continue;
    const holder = pins.get(hint.index);
    if (holder !== undefined) {
      throw new PlacementConflictError([holder, intent.intent_id], `both pinned to index ${hint.index}`);
    }
    pins.set(hint.index, intent.intent_id);
  }

  const graph = buildHintGraph(plan);
  relaxHints(plan, graph, options.relaxationPassLimit ?? n);

  const slots = Array.from({ length: n }, (): IntentId | undefined => undefined);
  for (const [index, id] of pins) slots[index] = id;

  // Dependents of pinned intents sit around their anchor; they never displace a pin.
  for (const [index, root] of [...pins].sort((a, b) => a[0] - b[0])) {
    const block = linearize(root, graph);
    const start = index - block.indexOf(root);
    block.forEach((id, offset) => {
      if (id === root) return;
      const slot = start + offset;
      if (slot < 0 || slot >= n) {
        throw new PlacementConflictError([root, id], `position ${slot} is outside 0..${n - 1}`);
      }
      const holder = slots[slot];
      if (holder !== undefined) {
        throw new PlacementConflictError([holder, id], `both need position ${slot}`);
      }
      slots[slot] = id;
    });
  }

  // Floating blocks stay contiguous, each in the earliest free run that holds it.
  const pinned = new Set(pins.values());
  for (const root of graph.roots.filter((id) => !pinned.has(id))) {
    const block = linearize(root, graph);
    const start = firstFreeRun(slots, block.length);
    if (start === -1) {
      throw new PlacementConflictError(
        [block[0], block[block.length - 1]],
        `no ${block.length} adjacent free positions left between pinned steps`
      );
    }
    block.forEach((id, offset) => {
      slots[start + offset] = id;
    });
  }

  const chosen = new Map<IntentId, ValidStep>();
  for (const step of validSteps) {
    if (!byId.has(step.intent_id)) throw new PlanDefectError(`step '${step.id}' belongs to no plan intent`);
    if (!chosen.has(step.intent_id)) chosen.set(step.intent_id, step);
  }

  const steps: Step[] = slots.map((id, position) => {
    const intent = id === undefined ? undefined : byId.get(id);
    if (!intent) throw new PlanDefectError(`position ${position} was left unfilled`);
    const valid = chosen.get(intent.intent_id) ?? fallbackStep(intent);
    return Object.freeze({ ...valid, position });
  });

  return Object.freeze({ plan_id: plan.plan_id, steps: Object.freeze(steps) });
}

/** Intents whose step will come from the fallback path. */
export function uncoveredIntents(plan: Plan, validSteps: readonly ValidStep[]): IntentId[] {
  const covered = new Set(validSteps.map((s) => s.intent_id));
  return plan.intents.map((i) => i.intent_id).filter((id) => !covered.has(id));
}
