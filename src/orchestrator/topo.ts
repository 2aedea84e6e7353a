import type { IntentId, Plan } from "../types/plan.js";
import { PlacementCycleError } from "./errors.js";

export type HintSide = "before" | "after";

export interface HintGraph {
  /** Intents without a relative hint; every block hangs off one of these. */
  roots: IntentId[];
  anchorOf: Map<IntentId, { anchor: IntentId; side: HintSide }>;
  dependents: Map<IntentId, Record<HintSide, IntentId[]>>;
}

export function buildHintGraph(plan: Plan): HintGraph {
  const roots: IntentId[] = [];
  const anchorOf = new Map<IntentId, { anchor: IntentId; side: HintSide }>();
  const dependents = new Map<IntentId, Record<HintSide, IntentId[]>>();
  for (const intent of plan.intents) {
    dependents.set(intent.intent_id, { before: [], after: [] });
  }
  // Plan order is kept within each dependents list.
  for (const intent of plan.intents) {
    const hint = intent.placement;
    if (hint && "before" in hint) {
      anchorOf.set(intent.intent_id, { anchor: hint.before, side: "before" });
      dependents.get(hint.before)?.before.push(intent.intent_id);
    } else if (hint && "after" in hint) {
      anchorOf.set(intent.intent_id, { anchor: hint.after, side: "after" });
      dependents.get(hint.after)?.after.push(intent.intent_id);
    } else {
      roots.push(intent.intent_id);
    }
  }
  return { roots, anchorOf, dependents };
}

function cycleFrom(start: IntentId, graph: HintGraph): IntentId[] {
  const path: IntentId[] = [];
  let cur: IntentId | undefined = start;
  while (cur !== undefined && !path.includes(cur)) {
    path.push(cur);
    cur = graph.anchorOf.get(cur)?.anchor;
  }
  return cur === undefined ? path : path.slice(path.indexOf(cur));
}

/**
 * Resolves relative hints layer by layer, starting from the roots.
 * Each pass settles the dependents of the previous layer. Returns the
 * number of passes used.
 */
export function relaxHints(plan: Plan, graph: HintGraph, passLimit: number): number {
  const resolved = new Set<IntentId>(graph.roots);
  let frontier = graph.roots;
  let passes = 0;

  while (resolved.size < plan.intents.length) {
    const pending = plan.intents.map((i) => i.intent_id).filter((id) => !resolved.has(id));
    if (passes >= passLimit) {
      throw new PlacementCycleError(pending, `relative hints still unresolved after ${passLimit} pass(es)`);
    }
    passes++;
    const next: IntentId[] = [];
    for (const id of frontier) {
      const deps = graph.dependents.get(id);
      if (!deps) continue;
      for (const dep of [...deps.before, ...deps.after]) {
        resolved.add(dep);
        next.push(dep);
      }
    }
    if (next.length === 0) {
      throw new PlacementCycleError(cycleFrom(pending[0], graph));
    }
    frontier = next;
  }
  return passes;
}

/** Flattens a resolved block: before-dependents, the intent, after-dependents. */
export function linearize(id: IntentId, graph: HintGraph): IntentId[] {
  const deps = graph.dependents.get(id);
  if (!deps) return [id];
  return [
    ...deps.before.flatMap((d) => linearize(d, graph)),
    id,
    ...deps.after.flatMap((d) => linearize(d, graph))
  ];
}
