import type { RenderedSequence } from "../types/steps.js";

/** One JSON object per line, in position order, each line newline-terminated. */
export function toJsonl(sequence: RenderedSequence): string {
  return sequence.steps
    .map((s) => JSON.stringify({ id: s.id, kind: s.kind, position: s.position, payload: s.payload }) + "\n")
    .join("");
}
