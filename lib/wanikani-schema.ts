import { z } from "zod";
import type { SubjectId, SubjectRecord } from "@/types";

// Every WaniKani collection response shares this envelope. A missing next_url ends the collection.
export const PageEnvelopeSchema = z.object({
  data: z.array(z.unknown()),
  pages: z.object({
    next_url: z.string().min(1).nullish(),
  }).passthrough(),
}).passthrough();

export type PageEnvelope = z.infer<typeof PageEnvelopeSchema>;

const SubjectIdSchema = z.number().int().positive();

// reviews and assignments both carry the subject at data.subject_id
export const ReviewRecordSchema = z.object({
  data: z.object({
    subject_id: SubjectIdSchema,
    created_at: z.string().optional(),
  }).passthrough(),
}).passthrough().transform((record): SubjectId => record.data.subject_id);

export const AssignmentRecordSchema = z.object({
  data: z.object({
    subject_id: SubjectIdSchema,
    updated_at: z.string().nullable().optional(),
  }).passthrough(),
}).passthrough().transform((record): SubjectId => record.data.subject_id);

export const SubjectPayloadSchema = z.object({
  id: SubjectIdSchema,
  object: z.string().min(1),
  data: z.object({
    slug: z.string(),
  }).passthrough(),
}).passthrough().transform((record): SubjectRecord => Object.freeze({
  id: record.id,
  kind: record.object,
  slug: record.data.slug,
}));
