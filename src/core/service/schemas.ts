import { z } from 'zod';

export const conduitEnvelopeSchema = z.object({
  result: z.unknown(),
  error_code: z.string().nullable().optional(),
  error_info: z.string().nullable().optional(),
});

export const revisionRecordSchema = z.object({
  id: z.union([z.number().int(), z.string().regex(/^\d+$/)]),
  name: z.string(),
  sourcePath: z.string().nullable().optional(),
});

export const revisionListSchema = z.array(revisionRecordSchema);

export const commitPathsSchema = z.array(z.string());

export const commitMessageSchema = z.string();

export type RevisionRecord = z.infer<typeof revisionRecordSchema>;
