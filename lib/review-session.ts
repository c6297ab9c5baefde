import type { VocabTerm } from "@/types";
import { describeVocabError, isVocabError, type VocabErrorKind } from "./errors";
import { aggregateRecentVocab, type AggregateOptions } from "./vocab-aggregator";
import type { WaniKaniClient } from "./wanikani-client";

export const SESSION_LOOKBACK_MINUTES = 1440;

export const REVIEW_INSTRUCTION =
  "Here are sentences I wrote for words in Japanese, can you nitpick what I did wrong and provide an example sentence of the correct usage and grammar?";

const VOCAB_PAGE_URL = "https://www.wanikani.com/vocabulary";

export type SessionVocab = {
  vocab: VocabTerm[];
  /** Why the list is empty, when aggregation failed */
  failure: { kind: VocabErrorKind | "request"; message: string } | null;
};

/**
 * Load the vocabulary that pre-fills the draft. A failed aggregation leaves the
 * draft empty; the session carries on either way.
 */
export async function loadSessionVocab(
  client: WaniKaniClient,
  minutes: number = SESSION_LOOKBACK_MINUTES,
  options: AggregateOptions = {},
): Promise<SessionVocab> {
  try {
    const vocab = await aggregateRecentVocab(client, minutes, options);
    return { vocab, failure: null };
  } catch (err) {
    const failure = isVocabError(err)
      ? { kind: err.kind, message: describeVocabError(err.kind) }
      : { kind: "request" as const, message: err instanceof Error ? err.message : String(err) };
    console.error("[review/session] vocab-unavailable", { ...failure });
    return { vocab: [], failure };
  }
}

export function buildDraft(vocab: readonly VocabTerm[]): string {
  return vocab.join("\n\n\n");
}

export function buildVocabLinks(vocab: readonly VocabTerm[]): string {
  return vocab.map((word) => `[${word}](${VOCAB_PAGE_URL}/${word})`).join("、　");
}

/**
 * Prompt sent to the model, or null when the draft has nothing to review.
 */
export function composeReviewPrompt(draft: string, instruction: string = REVIEW_INSTRUCTION): string | null {
  if (!draft.trim()) return null;
  return `${instruction}\n${draft}`;
}
