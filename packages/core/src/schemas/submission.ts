import { z } from 'zod';

export const SubmissionStatusSchema = z.enum(['submitted', 'failed', 'expired']);
export type SubmissionStatus = z.infer<typeof SubmissionStatusSchema>;

/** Append-only log entry, one per submission attempt sequence. */
export const SubmissionRecordSchema = z.object({
  opportunityId: z.string().min(1),
  submittedAt: z.string().datetime(),
  status: SubmissionStatusSchema,
  portalStatus: z.string().nullable(),
  confirmationId: z.string().nullable(),
  retryCount: z.number().int().nonnegative(),
  error: z.string().optional(),
});

export type SubmissionRecord = z.infer<typeof SubmissionRecordSchema>;

export const RenderedDocumentSchema = z.object({
  name: z.string().min(1),
  content: z.string(),
});

export type RenderedDocument = z.infer<typeof RenderedDocumentSchema>;
