import type { CandidateStep } from "../types/steps.js";
import { ParseError } from "../orchestrator/errors.js";
import { isRecord } from "./schema.js";

export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json|jsonl)?\s*/i, "")
    .replace(/\s*```$/, "")
    .trim();
}

function tryJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (e: unknown) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
}

/**
 * Splits raw reasoning output into candidate records.
 *
 * Accepts JSONL (one object per line) or a single JSON array of objects.
 * Any record that is not a JSON object fails the whole batch; content is
 * not inspected here.
 */
export function parseRecords(raw: string): CandidateStep[] {
  const text = stripCodeFences(raw);
  if (!text) throw new ParseError("empty output");

  if (text.startsWith("[")) {
    const whole = tryJson(text);
    if (whole.ok && Array.isArray(whole.value)) {
      const out: CandidateStep[] = [];
      whole.value.forEach((item: unknown, i) => {
        if (!isRecord(item)) throw new ParseError("array element is not a JSON object", i + 1);
        out.push({ line: i + 1, record: item });
      });
      if (out.length === 0) throw new ParseError("empty output");
      return out;
    }
  }

  const out: CandidateStep[] = [];
  text.split(/\r?\n/).forEach((rawLine, i) => {
    const line = rawLine.trim();
    if (!line) return;
    const parsed = tryJson(line);
    if (!parsed.ok) throw new ParseError(`invalid JSON (${parsed.error})`, i + 1);
    if (!isRecord(parsed.value)) throw new ParseError("record is not a JSON object", i + 1);
    out.push({ line: i + 1, record: parsed.value });
  });
  return out;
}
