import type { SubjectId, VocabTerm } from "@/types";
import type { WaniKaniClient } from "./wanikani-client";
import { SubjectPayloadSchema } from "./wanikani-schema";

// Hard limit on ids per /subjects request
export const SUBJECT_BATCH_SIZE = 1000;

export interface LookupOptions {
  batchSize?: number;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

/**
 * Case-insensitive order; terms equal ignoring case fall back to code-unit order
 * so "Apple" always lands before "apple".
 */
export function compareTerms(a: string, b: string): number {
  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  if (la !== lb) return la < lb ? -1 : 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Slugs of the vocabulary subjects among `ids`, deduplicated and sorted.
 * Ids go out in ascending order so batching is repeatable. Any failed batch fails the lookup.
 */
export async function lookupVocabulary(
  client: WaniKaniClient,
  ids: ReadonlySet<SubjectId>,
  options: LookupOptions = {},
): Promise<VocabTerm[]> {
  const { batchSize = SUBJECT_BATCH_SIZE } = options;
  const ordered = [...ids].sort((a, b) => a - b);
  const terms = new Set<VocabTerm>();

  for (const batch of chunk(ordered, batchSize)) {
    const url = client.url(`subjects?ids=${batch.join(",")}`);
    for await (const subject of client.paginate(url, SubjectPayloadSchema)) {
      if (subject.kind === "vocabulary") {
        terms.add(subject.slug);
      }
    }
  }

  return [...terms].sort(compareTerms);
}
