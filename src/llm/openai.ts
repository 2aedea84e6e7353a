import { z } from "zod";
import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import type { LLMProvider } from "./provider.js";

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish(),
        finish_reason: z.string().nullish()
      })
    )
    .optional(),
  usage: z
    .object({ prompt_tokens: z.number(), completion_tokens: z.number(), total_tokens: z.number() })
    .optional()
});

function finishReason(raw: string | null | undefined): CompletionOut["finish_reason"] {
  switch (raw) {
    case "stop":
    case "length":
    case "content_filter":
      return raw;
    default:
      return undefined;
  }
}

export class OpenAIChatCompletions implements LLMProvider {
  constructor(
    private apiKey: string,
    private baseUrl: string = 'https://api.openai.com/v1'
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/chat/completions`;

    const body = {
      model: args.model,
      messages: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0,
      max_tokens: args.max_tokens ?? 800,
      stop: args.stop,
      top_p: args.top_p,
      response_format: args.response_format || undefined
    };

    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'authorization': `Bearer ${this.apiKey}`
      },
      body: JSON.stringify(body),
      signal: args.signal
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`LLM HTTP ${res.status}: ${text}`);
    }
    const data = ChatCompletionResponseSchema.parse(await res.json());
    const choice = data.choices?.[0];

    return {
      content: choice?.message?.content ?? '',
      finish_reason: finishReason(choice?.finish_reason),
      usage: data.usage
    };
  }
}
