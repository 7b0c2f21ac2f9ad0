import { MaxTurnsExceededError, ModelBehaviorError, Runner } from "@openai/agents";
import type { z } from "zod";

type ModelResponseLike = { output?: unknown[] } | null | undefined;
type ErrorStateLike = { _modelResponses?: ModelResponseLike[] } | null | undefined;

function assistantTextFromItem(item: unknown): string | null {
  if (!item || typeof item !== "object") return null;
  const rec = item as Record<string, unknown>;
  if (rec.role !== "assistant") return null;
  const content = rec.content;
  if (!Array.isArray(content)) return null;

  const parts: string[] = [];
  for (const c of content) {
    if (!c || typeof c !== "object") continue;
    const cre = c as Record<string, unknown>;
    if (cre.type === "output_text" && typeof cre.text === "string") parts.push(cre.text);
    if (cre.type === "refusal" && typeof cre.refusal === "string") parts.push(cre.refusal);
  }

  const text = parts.join("").trim();
  return text.length > 0 ? text : null;
}

function lastAssistantTextFromModelResponses(modelResponses: ModelResponseLike[]): string | null {
  for (let i = modelResponses.length - 1; i >= 0; i--) {
    const out = modelResponses[i]?.output;
    if (!Array.isArray(out)) continue;
    for (let j = out.length - 1; j >= 0; j--) {
      const text = assistantTextFromItem(out[j]);
      if (text) return text;
    }
  }
  return null;
}

export function lastAssistantTextFromAgentsError(err: unknown): string | null {
  const state = (err as { state?: unknown } | null | undefined)?.state as ErrorStateLike;
  const responses = state?._modelResponses;
  if (!responses || !Array.isArray(responses)) return null;
  return lastAssistantTextFromModelResponses(responses);
}

export function createStructuredRunner(): Runner {
  return new Runner();
}

const REJECTED_OUTPUT_PREVIEW = 200;

/**
 * Runs a structured-output agent exactly once and validates its final output. Failures propagate
 * to the adapter; output the SDK rejected is logged so the run log shows what came back.
 */
export async function runStructuredAgentOutput<T>(args: {
  runner: Runner;
  agent: { name?: string };
  schema: z.ZodType<T>;
  prompt: string;
  signal: AbortSignal;
  maxTurns: number;
  log: (message: string) => void;
}): Promise<T> {
  const { runner, agent, schema, prompt, signal, maxTurns, log } = args;
  const agentName = agent.name ?? "agent";

  try {
    const result = await runner.run(agent as never, prompt, { maxTurns, signal });
    if (!result.finalOutput) throw new Error(`${agentName} produced no final output`);
    return schema.parse(result.finalOutput);
  } catch (err) {
    if (err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError) {
      const rejected = lastAssistantTextFromAgentsError(err);
      log(
        rejected
          ? `Schema validation failed for "${agentName}": ${rejected.slice(0, REJECTED_OUTPUT_PREVIEW)}`
          : `Schema validation failed for "${agentName}".`
      );
    }
    throw err;
  }
}
