import type { IntentId } from "../types/plan.js";

export type RenderState = "INVOKING" | "PARSING" | "VALIDATING" | "PLACING" | "DONE" | "FAILED";

export class StepRendererError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad step content. Absorbed into a rejection; never fatal on its own. */
export class ValidationError extends StepRendererError {
  constructor(readonly path: string, readonly detail: string, readonly intentId?: IntentId) {
    super(`${path}: ${detail}`);
  }
}

/** The raw batch did not decompose into records. */
export class ParseError extends StepRendererError {
  constructor(message: string, readonly line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
  }
}

export class ReasoningExhaustedError extends StepRendererError {
  constructor(readonly attempts: number, readonly lastFailure: string, options?: { cause?: unknown }) {
    super(`reasoning call failed after ${attempts} attempt(s); last failure: ${lastFailure}`, options);
  }
}

export class ReasoningTimeoutError extends StepRendererError {
  constructor(readonly attempts: number, readonly lastFailure: string) {
    super(`reasoning call timed out after ${attempts} attempt(s); last failure: ${lastFailure}`);
  }
}

export class ReasoningCancelledError extends StepRendererError {
  constructor(options?: { cause?: unknown }) {
    super("render cancelled by caller", options);
  }
}

export class PlanDefectError extends StepRendererError {}

export class PlacementConflictError extends StepRendererError {
  constructor(readonly intentIds: readonly [IntentId, IntentId], detail: string) {
    super(`placement conflict between '${intentIds[0]}' and '${intentIds[1]}': ${detail}`);
  }
}

export class PlacementCycleError extends StepRendererError {
  constructor(readonly intentIds: readonly IntentId[], detail = "relative hints form a cycle") {
    super(`${detail}: ${intentIds.join(" -> ")}`);
  }
}

/** The only error `render` lets escape; wraps the first fatal cause. */
export class RenderError extends StepRendererError {
  constructor(readonly state: RenderState, cause: unknown) {
    super(`render failed while ${state}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}
