import type { CompletionArgs, CompletionOut } from "../types/llm.js";

/** The reasoning capability. Implementations should honour `args.signal`. */
export interface LLMProvider {
  complete(args: CompletionArgs): Promise<CompletionOut>;
}
