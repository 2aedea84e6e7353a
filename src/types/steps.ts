import type { IntentId } from "./plan.js";

export const STEP_KINDS = [
  "info",
  "prompt",
  "choice",
  "rating",
  "upload",
  "date",
  "lead_capture",
  "terminal"
] as const;

export type StepKind = (typeof STEP_KINDS)[number];

interface CommonPayload {
  subtext?: string;
  required?: boolean;
}

export interface StepOption {
  label: string;
  value: string;
}

export interface InfoPayload extends CommonPayload {
  title: string;
  body?: string;
  bullets?: string[];
}

export interface PromptPayload extends CommonPayload {
  question: string;
  placeholder?: string;
  multiline?: boolean;
  max_length?: number;
}

export interface ChoicePayload extends CommonPayload {
  question: string;
  options: StepOption[];
  multi_select?: boolean;
  max_selections?: number;
}

export interface RatingPayload extends CommonPayload {
  question: string;
  scale_min: number;
  scale_max: number;
  step?: number;
}

export interface UploadPayload extends CommonPayload {
  question: string;
  allowed_file_types?: string[];
  max_files?: number;
}

export interface DatePayload extends CommonPayload {
  question: string;
  min_date?: string;
  max_date?: string;
}

export interface LeadCapturePayload extends CommonPayload {
  question: string;
  required_inputs?: Array<"email" | "phone" | "name">;
}

export interface TerminalPayload extends CommonPayload {
  title: string;
  message?: string;
}

export interface PayloadByKind {
  info: InfoPayload;
  prompt: PromptPayload;
  choice: ChoicePayload;
  rating: RatingPayload;
  upload: UploadPayload;
  date: DatePayload;
  lead_capture: LeadCapturePayload;
  terminal: TerminalPayload;
}

/** A validated step that has not been positioned yet. */
export type ValidStep = {
  [K in StepKind]: { intent_id: IntentId; id: string; kind: K; payload: PayloadByKind[K] };
}[StepKind];

/** A placed step. Serialized without `intent_id`; see `toJsonl`. */
export type Step = ValidStep & { position: number };

/** A decomposed record of raw reasoning output, not yet validated. */
export interface CandidateStep {
  line: number;
  record: Record<string, unknown>;
}

export interface Rejection {
  line: number;
  intent_id?: IntentId;
  path: string;
  reason: string;
}

export interface RenderedSequence {
  plan_id: string;
  steps: readonly Step[];
}
