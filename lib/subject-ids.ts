import type { SubjectId } from "@/types";
import type { RecordSchema } from "./paged-fetcher";
import { VocabError } from "./errors";
import type { WaniKaniClient } from "./wanikani-client";
import { AssignmentRecordSchema, ReviewRecordSchema } from "./wanikani-schema";

export type SubjectIdStrategy = "reviews" | "assignments";

export const DEFAULT_STRATEGY: SubjectIdStrategy = "assignments";

const STRATEGIES: Record<SubjectIdStrategy, { collection: string; schema: RecordSchema<SubjectId> }> = {
  reviews: { collection: "reviews", schema: ReviewRecordSchema },
  assignments: { collection: "assignments", schema: AssignmentRecordSchema },
};

export function isSubjectIdStrategy(value: string): value is SubjectIdStrategy {
  return value === "reviews" || value === "assignments";
}

/**
 * UTC timestamp `minutes` before `now`, truncated to whole seconds: 2024-05-01T09:30:00Z
 * A window reaching outside the representable date range is a configuration error.
 */
export function isoMinutesAgo(minutes: number, now: Date = new Date()): string {
  const then = new Date(now.getTime() - minutes * 60_000);
  if (Number.isNaN(then.getTime())) {
    throw new VocabError("configuration", `no date ${minutes} minutes before ${now.toISOString()}`, "Invalid look-back window");
  }
  then.setUTCMilliseconds(0);
  return then.toISOString().replace(".000Z", "Z");
}

/**
 * Distinct subject ids touched since `since`, from one collection.
 * The server's updated_after filter is trusted; records are not re-checked locally.
 */
export async function resolveSubjectIds(
  client: WaniKaniClient,
  since: string,
  strategy: SubjectIdStrategy = DEFAULT_STRATEGY,
): Promise<Set<SubjectId>> {
  const { collection, schema } = STRATEGIES[strategy];
  const ids = new Set<SubjectId>();
  for await (const id of client.paginate(client.url(`${collection}?updated_after=${since}`), schema)) {
    ids.add(id);
  }
  return ids;
}
