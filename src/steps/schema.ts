import { z } from "zod";
import { stepIdFor, type Intent, type Plan } from "../types/plan.js";
import {
  STEP_KINDS,
  type CandidateStep,
  type PayloadByKind,
  type Rejection,
  type StepKind,
  type StepOption,
  type ValidStep
} from "../types/steps.js";
import { ValidationError } from "../orchestrator/errors.js";

const KIND_SET: ReadonlySet<string> = new Set(STEP_KINDS);

// Legacy UI type names the model still emits.
const KIND_ALIASES = new Map<string, StepKind>([
  ["intro", "info"],
  ["text", "prompt"],
  ["text_input", "prompt"],
  ["multiple_choice", "choice"],
  ["segmented_choice", "choice"],
  ["chips_multi", "choice"],
  ["yes_no", "choice"],
  ["image_choice_grid", "choice"],
  ["searchable_select", "choice"],
  ["slider", "rating"],
  ["range_slider", "rating"],
  ["file_upload", "upload"],
  ["file_picker", "upload"],
  ["date_picker", "date"],
  ["confirmation", "terminal"]
]);

const ENVELOPE_KEYS = new Set(["id", "stepId", "step_id", "intent_id", "intentId", "key", "kind", "type", "position", "payload"]);

const TITLED_KINDS: ReadonlySet<StepKind> = new Set<StepKind>(["info", "terminal"]);

// Unfilled template slots the model sometimes echoes back as options.
const PLACEHOLDER = /<<[^<>]*>>|\{\{[^{}]*\}\}|max_depth/i;

const TOY_OPTION_SETS: ReadonlyArray<ReadonlySet<string>> = [
  new Set(["red", "blue", "green"]),
  new Set(["circle", "square", "triangle"])
];
const TOY_OPTION_TERMS = ["abstract"];

function isToyOptionSet(options: readonly StepOption[]): boolean {
  const tokens = new Set<string>();
  for (const o of options) {
    const words = o.label.toLowerCase().replace(/[^a-z0-9]+/g, " ").trim().split(" ").filter(Boolean);
    if (words.length === 1) tokens.add(words[0]);
  }
  const toySet = TOY_OPTION_SETS.some((set) => [...set].every((t) => tokens.has(t)) && tokens.size <= set.size + 1);
  return toySet || options.some((o) => TOY_OPTION_TERMS.some((term) => `${o.label} ${o.value}`.toLowerCase().includes(term)));
}

const text = z.string().trim().min(1);
const common = { subtext: z.string().optional(), required: z.boolean().optional() };
const OptionSchema = z.object({ label: text, value: text });

type PayloadSchemas = { [K in StepKind]: z.ZodType<PayloadByKind[K], z.ZodTypeDef, unknown> };

export const PAYLOAD_SCHEMAS: PayloadSchemas = {
  info: z.object({
    ...common,
    title: text,
    body: z.string().optional(),
    bullets: z.array(z.string()).optional()
  }),
  prompt: z.object({
    ...common,
    question: text,
    placeholder: z.string().optional(),
    multiline: z.boolean().optional(),
    max_length: z.number().int().positive().optional()
  }),
  choice: z
    .object({
      ...common,
      question: text,
      options: z.array(OptionSchema).min(1),
      multi_select: z.boolean().optional(),
      max_selections: z.number().int().positive().optional()
    })
    .superRefine((payload, ctx) => {
      const seen = new Set<string>();
      payload.options.forEach((option, i) => {
        if (seen.has(option.value)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["options", i, "value"],
            message: `duplicate option value '${option.value}'`
          });
        }
        seen.add(option.value);
      });
      if (isToyOptionSet(payload.options)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["options"], message: "placeholder option set" });
      }
    }),
  rating: z
    .object({
      ...common,
      question: text,
      scale_min: z.number(),
      scale_max: z.number(),
      step: z.number().positive().optional()
    })
    .refine((p) => p.scale_max > p.scale_min, { path: ["scale_max"], message: "must be greater than scale_min" }),
  upload: z.object({
    ...common,
    question: text,
    allowed_file_types: z.array(z.string()).optional(),
    max_files: z.number().int().positive().optional()
  }),
  date: z.object({
    ...common,
    question: text,
    min_date: z.string().optional(),
    max_date: z.string().optional()
  }),
  lead_capture: z.object({
    ...common,
    question: text,
    required_inputs: z.array(z.enum(["email", "phone", "name"])).optional()
  }),
  terminal: z.object({
    ...common,
    title: text,
    message: z.string().optional()
  })
};

export interface IntentIndex {
  byIntentId: ReadonlyMap<string, Intent>;
  byStepId: ReadonlyMap<string, Intent>;
}

export interface Screening {
  accepted: ValidStep[];
  rejected: Rejection[];
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isStepKind(v: string): v is StepKind {
  return KIND_SET.has(v);
}

export function resolveKind(raw: unknown): StepKind | undefined {
  if (typeof raw !== "string") return undefined;
  const t = raw.trim().toLowerCase();
  return isStepKind(t) ? t : KIND_ALIASES.get(t);
}

export function slugOption(label: string): string {
  const base = label.toLowerCase().replace(/[^a-z0-9]+/g, " ").trim().replace(/ /g, "_");
  return base || "option";
}

function isPlaceholderOption(opt: unknown): boolean {
  if (typeof opt === "string") return PLACEHOLDER.test(opt);
  if (!isRecord(opt)) return false;
  return [opt.label, opt.value].some((v) => typeof v === "string" && PLACEHOLDER.test(v));
}

/**
 * Drops placeholder options, turns strings into `{ label, value }` and slugs
 * missing values from the label. A derived value that is already taken gets a
 * `_2`, `_3`... suffix; values the record states itself are left as given.
 */
export function normalizeOptions(options: unknown): unknown {
  if (!Array.isArray(options)) return options;
  const kept: unknown[] = options.filter((opt: unknown) => !isPlaceholderOption(opt));
  const stated = new Set<string>();
  for (const opt of kept) {
    if (isRecord(opt) && typeof opt.value === "string") stated.add(opt.value.trim());
  }
  const derived = new Set<string>();
  const derive = (label: string): string => {
    const base = slugOption(label);
    let value = base;
    for (let n = 2; stated.has(value) || derived.has(value); n++) value = `${base}_${n}`;
    derived.add(value);
    return value;
  };
  return kept.map((opt) => {
    if (typeof opt === "string") return { label: opt.trim(), value: derive(opt) };
    if (!isRecord(opt)) return opt;
    const label = typeof opt.label === "string" ? opt.label : typeof opt.value === "string" ? opt.value : opt.label;
    const value = typeof opt.value === "string" ? opt.value : typeof label === "string" ? derive(label) : opt.value;
    return { ...opt, label, value };
  });
}

/** Kinds a render may emit: the configured list plus every kind the plan hints. Undefined means any. */
export function allowedKindsFor(plan: Plan, allowed?: readonly StepKind[]): ReadonlySet<StepKind> | undefined {
  if (!allowed?.length) return undefined;
  const out = new Set<StepKind>(allowed);
  for (const intent of plan.intents) {
    const hinted = resolveKind(intent.kind_hint);
    if (hinted) out.add(hinted);
  }
  return out;
}

export function indexIntents(plan: Plan): IntentIndex {
  const byIntentId = new Map<string, Intent>();
  const byStepId = new Map<string, Intent>();
  for (const intent of plan.intents) {
    byIntentId.set(intent.intent_id, intent);
    byStepId.set(stepIdFor(intent.intent_id), intent);
  }
  return { byIntentId, byStepId };
}

function firstString(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const k of keys) {
    const v = record[k];
    if (typeof v === "string" && v.trim()) return v.trim();
  }
  return undefined;
}

function resolveIntent(record: Record<string, unknown>, intents: IntentIndex): Intent {
  const named = firstString(record, ["intent_id", "intentId", "key"]);
  if (named !== undefined) {
    const hit = intents.byIntentId.get(named) ?? intents.byStepId.get(stepIdFor(named));
    if (!hit) throw new ValidationError("intent_id", `unknown intent '${named}'`);
    return hit;
  }
  const id = firstString(record, ["id", "stepId", "step_id"]);
  if (id === undefined) throw new ValidationError("intent_id", "record names no intent");
  const hit = intents.byStepId.get(id.toLowerCase().replace(/_/g, "-")) ?? intents.byStepId.get(stepIdFor(id));
  if (!hit) throw new ValidationError("id", `step id '${id}' matches no intent`);
  return hit;
}

/** Flattened records carry payload fields beside the envelope; `payload` wins when present. */
function extractPayload(record: Record<string, unknown>, kind: StepKind): Record<string, unknown> {
  const source = isRecord(record.payload)
    ? record.payload
    : Object.fromEntries(Object.entries(record).filter(([k]) => !ENVELOPE_KEYS.has(k)));
  const out: Record<string, unknown> = Object.fromEntries(Object.entries(source).filter(([, v]) => v !== null));

  const title = typeof out.title === "string" && out.title.trim() ? out.title : undefined;
  const question = typeof out.question === "string" && out.question.trim() ? out.question : undefined;
  if (TITLED_KINDS.has(kind)) {
    if (!title && question) out.title = question;
  } else if (!question && title) {
    out.question = title;
  }
  if (kind === "choice") out.options = normalizeOptions(out.options);
  return out;
}

export function parsePayload(kind: StepKind, base: { intent_id: string; id: string }, payload: unknown): ValidStep {
  switch (kind) {
    case "info":
      return { ...base, kind, payload: PAYLOAD_SCHEMAS.info.parse(payload) };
    case "prompt":
      return { ...base, kind, payload: PAYLOAD_SCHEMAS.prompt.parse(payload) };
    case "choice":
      return { ...base, kind, payload: PAYLOAD_SCHEMAS.choice.parse(payload) };
    case "rating":
      return { ...base, kind, payload: PAYLOAD_SCHEMAS.rating.parse(payload) };
    case "upload":
      return { ...base, kind, payload: PAYLOAD_SCHEMAS.upload.parse(payload) };
    case "date":
      return { ...base, kind, payload: PAYLOAD_SCHEMAS.date.parse(payload) };
    case "lead_capture":
      return { ...base, kind, payload: PAYLOAD_SCHEMAS.lead_capture.parse(payload) };
    case "terminal":
      return { ...base, kind, payload: PAYLOAD_SCHEMAS.terminal.parse(payload) };
  }
}

export function validateStep(
  candidate: CandidateStep,
  intents: IntentIndex,
  allowedKinds?: ReadonlySet<StepKind>
): ValidStep {
  const { record } = candidate;
  const intent = resolveIntent(record, intents);
  const rawKind = record.kind ?? record.type;
  if (rawKind === undefined) throw new ValidationError("kind", "missing step kind", intent.intent_id);
  const kind = resolveKind(rawKind);
  if (!kind) throw new ValidationError("kind", `unrecognized step kind ${JSON.stringify(rawKind)}`, intent.intent_id);
  const hinted = resolveKind(intent.kind_hint);
  if (hinted && hinted !== kind) {
    throw new ValidationError("kind", `expected '${hinted}' per intent, got '${kind}'`, intent.intent_id);
  }
  if (allowedKinds && !allowedKinds.has(kind)) {
    throw new ValidationError("kind", `kind '${kind}' is not allowed in this render`, intent.intent_id);
  }

  try {
    return parsePayload(kind, { intent_id: intent.intent_id, id: stepIdFor(intent.intent_id) }, extractPayload(record, kind));
  } catch (err) {
    if (!(err instanceof z.ZodError)) throw err;
    const issue = err.issues[0];
    const path = ["payload", ...(issue?.path ?? [])].join(".");
    throw new ValidationError(path, issue?.message ?? "invalid payload", intent.intent_id);
  }
}

/** Validates each candidate on its own; the first valid step per intent wins. */
export function validateCandidates(
  plan: Plan,
  candidates: readonly CandidateStep[],
  allowedKinds?: readonly StepKind[]
): Screening {
  const intents = indexIntents(plan);
  const allowed = allowedKindsFor(plan, allowedKinds);
  const accepted: ValidStep[] = [];
  const rejected: Rejection[] = [];
  const taken = new Set<string>();

  for (const candidate of candidates) {
    let step: ValidStep;
    try {
      step = validateStep(candidate, intents, allowed);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      rejected.push({ line: candidate.line, intent_id: err.intentId, path: err.path, reason: err.detail });
      continue;
    }
    if (taken.has(step.intent_id)) {
      rejected.push({ line: candidate.line, intent_id: step.intent_id, path: "intent_id", reason: "duplicate step for intent" });
      continue;
    }
    taken.add(step.intent_id);
    accepted.push(step);
  }

  return { accepted, rejected };
}
