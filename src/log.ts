// Progress goes to stderr; stdout carries the JSONL output.

export const COLOR = {
  reset: "\x1b[0m",
  gray: (s: string) => `\x1b[90m${s}${COLOR.reset}`,
  cyan: (s: string) => `\x1b[36m${s}${COLOR.reset}`,
  green: (s: string) => `\x1b[32m${s}${COLOR.reset}`,
  yellow: (s: string) => `\x1b[33m${s}${COLOR.reset}`,
  red: (s: string) => `\x1b[31m${s}${COLOR.reset}`,
};

const QUIET = process.env.QUIET === "1";
const LOG_STEPS = !QUIET && (process.env.LOG_STEPS ?? "1") !== "0";
const LOG_LLM = !QUIET && (process.env.LOG_LLM ?? "0") === "1";

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function preview(text: string, max = 140): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? flat.slice(0, max) + "…" : flat;
}

export function logStep(line: string) {
  if (LOG_STEPS) console.error(line);
}

export function logLlm(line: string) {
  if (LOG_LLM) console.error(line);
}

export function logWarn(line: string) {
  if (!QUIET) console.error(COLOR.yellow(`[warn] ${line}`));
}
