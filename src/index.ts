#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { loadConfig } from './config.js';
import { render } from './orchestrator/render.js';
import { OpenAIChatCompletions } from './llm/openai.js';
import { toJsonl } from './steps/jsonl.js';
import { PlanSchema } from './types/plan.js';
import { loadDemoPack } from './prompt/demos.js';
import { logWarn } from './log.js';

function arg(name: string, fallback?: string): string | undefined {
  const ix = process.argv.findIndex(a => a === name || a.startsWith(name + '='));
  if (ix === -1) return fallback;
  const val = process.argv[ix];
  if (val.includes('=')) return val.slice(val.indexOf('=') + 1);
  return process.argv[ix + 1] ?? fallback;
}

async function main() {
  const planPath = resolve(process.cwd(), arg("--plan") ?? "src/examples/minimal/plan.json");
  const config = loadConfig();
  if (!config.apiKey) {
    logWarn("OPENAI_API_KEY not set. The reasoning call will fail and the render will exhaust its retries.");
  }

  const plan = PlanSchema.parse(JSON.parse(readFileSync(planPath, "utf-8")));
  const demos = config.demoPack ? loadDemoPack(resolve(process.cwd(), config.demoPack)) : [];
  const provider = new OpenAIChatCompletions(config.apiKey || "DUMMY", config.baseUrl);

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('interrupted')));

  const { sequence } = await render(plan, { provider, config, demos, signal: controller.signal });
  process.stdout.write(toJsonl(sequence));
}

main().catch(err => {
  console.error("[fatal]", err instanceof Error ? err.message : err);
  process.exit(1);
});
