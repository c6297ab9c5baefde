// lib/generation.ts
import type OpenAI from "openai";
import type {
  ChatCompletionChunk,
  ChatCompletionCreateParamsStreaming,
} from "openai/resources/chat/completions";
import type { GenerationFragment } from "@/types";

export interface GenerationRequest {
  model: string;
  prompt: string;
  temperature?: number;
  maxOutputTokens?: number;
}

export interface GenerationSource {
  streamFragments(request: GenerationRequest, signal?: AbortSignal): AsyncIterable<GenerationFragment>;
}

// Groq streams reasoning as `delta.reasoning`, Deepinfra as `delta.reasoning_content`.
// Neither field is in the SDK's Delta type.
function readReasoning(delta: ChatCompletionChunk.Choice.Delta): string {
  if ("reasoning" in delta && typeof delta.reasoning === "string") return delta.reasoning;
  if ("reasoning_content" in delta && typeof delta.reasoning_content === "string") return delta.reasoning_content;
  return "";
}

/**
 * Fragments carried by one chunk, per choice: reasoning first, then answer text.
 * Empty deltas produce nothing.
 */
export function fragmentsFromChunk(chunk: ChatCompletionChunk): GenerationFragment[] {
  const fragments: GenerationFragment[] = [];
  for (const choice of chunk.choices ?? []) {
    const delta = choice.delta;
    if (!delta) continue;
    const reasoning = readReasoning(delta);
    if (reasoning) fragments.push({ text: reasoning, isThought: true });
    if (typeof delta.content === "string" && delta.content) {
      fragments.push({ text: delta.content, isThought: false });
    }
  }
  return fragments;
}

export async function* fragmentsFromStream(
  chunks: AsyncIterable<ChatCompletionChunk>,
): AsyncGenerator<GenerationFragment, void, undefined> {
  for await (const chunk of chunks) {
    yield* fragmentsFromChunk(chunk);
  }
}

export function buildCompletionParams(request: GenerationRequest): ChatCompletionCreateParamsStreaming {
  const { model, prompt, temperature = 0.7, maxOutputTokens = 16384 } = request;
  return {
    model,
    stream: true,
    temperature,
    max_tokens: maxOutputTokens,
    messages: [{ role: "user", content: prompt }],
    reasoning_effort: "medium",
  };
}

/**
 * Wrap an OpenAI-compatible client. Breaking out of the fragment loop ends the SDK
 * stream, which aborts the underlying request.
 */
export function createGenerationSource(client: OpenAI): GenerationSource {
  return {
    async *streamFragments(request: GenerationRequest, signal?: AbortSignal) {
      const t0 = Date.now();
      const stream = await client.chat.completions.create(buildCompletionParams(request), { signal });
      console.log("[review/stream] upstream-stream-ready", { model: request.model, dt: Date.now() - t0 });
      yield* fragmentsFromStream(stream);
    },
  };
}
