import type { Message } from "../types/llm.js";
import type { Plan } from "../types/plan.js";
import type { StepKind } from "../types/steps.js";
import type { RenderDemo } from "../prompt/demos.js";
import type { LLMProvider } from "./provider.js";
import { renderStepsPrompt, retryNote } from "../prompt/renderer.js";
import {
  ParseError,
  ReasoningCancelledError,
  ReasoningExhaustedError,
  ReasoningTimeoutError
} from "../orchestrator/errors.js";
import { COLOR, fmtMs, logLlm, logStep, preview } from "../log.js";

export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_CALL_TIMEOUT_MS = 60_000;

export interface InvokerOptions {
  model: string;
  maxRetries?: number;
  callTimeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  allowedKinds?: readonly StepKind[];
  demos?: readonly RenderDemo[];
}

export interface InvokeResult<T> {
  raw: string;
  value: T;
  attempts: number;
}

class CallTimeout extends Error {}

function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wraps the reasoning call. A call that times out, throws, or whose output
 * `parse` rejects with a ParseError is retried up to `maxRetries` times with
 * the same prompt plus a note naming the last failure.
 */
export class ReasoningInvoker {
  constructor(
    private provider: LLMProvider,
    private opts: InvokerOptions
  ) {}

  async invoke<T>(plan: Plan, parse: (raw: string) => T, signal?: AbortSignal): Promise<InvokeResult<T>> {
    const base = renderStepsPrompt(plan, { allowedKinds: this.opts.allowedKinds, demos: this.opts.demos });
    const maxAttempts = (this.opts.maxRetries ?? DEFAULT_MAX_RETRIES) + 1;
    let lastFailure = "";
    let lastCause: unknown;
    let timedOut = false;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) throw new ReasoningCancelledError({ cause: signal.reason });
      const messages = attempt === 1 ? base : [...base, retryNote(lastFailure)];

      const t0 = Date.now();
      let raw: string;
      try {
        raw = await this.callOnce(messages, signal);
      } catch (err) {
        if (signal?.aborted) throw new ReasoningCancelledError({ cause: signal.reason });
        timedOut = err instanceof CallTimeout;
        lastFailure = err instanceof CallTimeout ? err.message : `call failed: ${errMsg(err)}`;
        lastCause = err;
        logStep(COLOR.yellow(`  attempt ${attempt}/${maxAttempts}: ${lastFailure}`));
        continue;
      }
      logLlm(COLOR.gray(`  attempt ${attempt} raw (${fmtMs(Date.now() - t0)}): ${preview(raw)}`));

      try {
        return { raw, value: parse(raw), attempts: attempt };
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        timedOut = false;
        lastFailure = err.message;
        lastCause = err;
        logStep(COLOR.yellow(`  attempt ${attempt}/${maxAttempts}: unparsable output: ${lastFailure}`));
      }
    }

    if (timedOut) throw new ReasoningTimeoutError(maxAttempts, lastFailure);
    throw new ReasoningExhaustedError(maxAttempts, lastFailure, { cause: lastCause });
  }

  private async callOnce(messages: Message[], signal?: AbortSignal): Promise<string> {
    const timeoutMs = this.opts.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(
      () => controller.abort(new CallTimeout(`call timed out after ${fmtMs(timeoutMs)}`)),
      timeoutMs
    );
    // Rejects on abort even when the provider ignores its signal.
    const stopped = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });

    try {
      const out = await Promise.race([
        this.provider.complete({
          model: this.opts.model,
          messages,
          temperature: this.opts.temperature,
          max_tokens: this.opts.maxTokens,
          response_format: { type: "text" },
          signal: controller.signal
        }),
        stopped
      ]);
      return out.content;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
