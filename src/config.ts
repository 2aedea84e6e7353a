import { z } from "zod";
import { StepRendererError } from "./orchestrator/errors.js";
import { DEFAULT_CALL_TIMEOUT_MS, DEFAULT_MAX_RETRIES } from "./llm/invoker.js";
import { resolveKind } from "./steps/schema.js";
import type { StepKind } from "./types/steps.js";

export interface RenderConfig {
  maxRetries: number;
  callTimeoutMs: number;
  relaxationPassLimit?: number;
  model: string;
  temperature: number;
  maxTokens: number;
  apiKey?: string;
  baseUrl: string;
  allowedKinds?: StepKind[];
  demoPack?: string;
}

export class ConfigError extends StepRendererError {}

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

// setTimeout holds a signed 32-bit millisecond count.
const MAX_CALL_TIMEOUT_SECONDS = 2_147_483;

const KindListSchema = z.string().transform((raw, ctx) => {
  const kinds: StepKind[] = [];
  for (const part of raw.split(",").map(s => s.trim()).filter(Boolean)) {
    const kind = resolveKind(part);
    if (!kind) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown step kind '${part}'` });
      return z.NEVER;
    }
    if (!kinds.includes(kind)) kinds.push(kind);
  }
  return kinds;
});

const EnvSchema = z.object({
  MAX_RETRIES: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(DEFAULT_MAX_RETRIES)),
  CALL_TIMEOUT_SECONDS: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().max(MAX_CALL_TIMEOUT_SECONDS).default(DEFAULT_CALL_TIMEOUT_MS / 1000)
  ),
  RELAXATION_PASS_LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).optional()),
  MODEL: z.preprocess(blankToUndefined, z.string().default("gpt-4o-mini")),
  TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0.2)),
  MAX_TOKENS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(1600)),
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default("https://api.openai.com/v1")),
  ALLOWED_KINDS: z.preprocess(blankToUndefined, KindListSchema.optional()),
  DEMO_PACK: z.preprocess(blankToUndefined, z.string().optional())
});

export function loadConfig(env: Record<string, string | undefined> = process.env): RenderConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`invalid configuration (${problems.join("; ")})`);
  }
  const e = parsed.data;
  return {
    maxRetries: e.MAX_RETRIES,
    callTimeoutMs: Math.round(e.CALL_TIMEOUT_SECONDS * 1000),
    relaxationPassLimit: e.RELAXATION_PASS_LIMIT,
    model: e.MODEL,
    temperature: e.TEMPERATURE,
    maxTokens: e.MAX_TOKENS,
    apiKey: e.OPENAI_API_KEY,
    baseUrl: e.OPENAI_BASE_URL,
    allowedKinds: e.ALLOWED_KINDS,
    demoPack: e.DEMO_PACK
  };
}
