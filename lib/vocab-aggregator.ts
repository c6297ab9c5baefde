import type { VocabTerm } from "@/types";
import { VocabError, isVocabError } from "./errors";
import { DEFAULT_STRATEGY, isoMinutesAgo, resolveSubjectIds, type SubjectIdStrategy } from "./subject-ids";
import { lookupVocabulary } from "./subject-lookup";
import { WaniKaniClient, type WaniKaniClientOptions } from "./wanikani-client";

export interface AggregateOptions {
  strategy?: SubjectIdStrategy;
  batchSize?: number;
  /** Clock override for tests */
  now?: Date;
}

/**
 * Vocabulary studied in the last `minutes`, sorted case-insensitively.
 *
 * Fails with a VocabError whose kind tells the caller what happened:
 * - `endpoint-down`: the id source (or subjects endpoint) answered 5xx or timed out
 * - `no-activity`: nothing was studied in the window
 * - `no-vocabulary`: subjects were studied, none of them vocabulary
 */
export async function aggregateRecentVocab(
  client: WaniKaniClient,
  minutes: number,
  options: AggregateOptions = {},
): Promise<VocabTerm[]> {
  const { strategy = DEFAULT_STRATEGY, batchSize, now } = options;
  if (!Number.isSafeInteger(minutes) || minutes < 0) {
    throw new VocabError("configuration", `minutes must be a non-negative integer, got ${minutes}`, "Invalid look-back window");
  }

  const since = isoMinutesAgo(minutes, now);

  let ids: Set<number>;
  try {
    ids = await resolveSubjectIds(client, since, strategy);
  } catch (err) {
    if (isVocabError(err, "endpoint-down")) {
      console.warn("[vocab] endpoint-down", { strategy, since, detail: err.detail });
    }
    throw err;
  }

  if (ids.size === 0) {
    console.warn("[vocab] no-activity", { strategy, since });
    throw new VocabError("no-activity", `nothing updated after ${since}`);
  }

  const vocab = await lookupVocabulary(client, ids, { batchSize });
  if (vocab.length === 0) {
    console.warn("[vocab] no-vocabulary", { subjects: ids.size, since });
    throw new VocabError("no-vocabulary", `${ids.size} subjects, none vocabulary`);
  }

  console.log("[vocab] aggregated", { strategy, since, subjects: ids.size, vocab: vocab.length });
  return vocab;
}

/**
 * Same as aggregateRecentVocab, building the client from a bearer token.
 * A blank token fails with `configuration` before anything goes over the wire.
 */
export async function getRecentVocab(
  minutes: number,
  token: string,
  options: AggregateOptions & Omit<WaniKaniClientOptions, "token"> = {},
): Promise<VocabTerm[]> {
  const { baseUrl, timeoutMs, fetch, ...aggregate } = options;
  const client = new WaniKaniClient({ token, baseUrl, timeoutMs, fetch });
  return aggregateRecentVocab(client, minutes, aggregate);
}
