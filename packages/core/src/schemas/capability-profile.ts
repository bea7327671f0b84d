import { z } from 'zod';

/**
 * capability-profile.ts
 *
 * The normalized company record built once per run from the company's own
 * documents. Shared read-only by the matcher and the application generator.
 */

// ─── Source documents ─────────────────────────────────────────────────────────

export const DocumentTypeHintSchema = z.enum(['profile', 'past-performance', 'certification', 'other']);
export type DocumentTypeHint = z.infer<typeof DocumentTypeHintSchema>;

export const DocumentBlockSchema = z.object({
  documentId: z.string().min(1),
  text: z.string(),
  /** Missing when the extractor could not tell; the builder classifies by keywords then. */
  hint: DocumentTypeHintSchema.optional(),
});

export type DocumentBlock = z.infer<typeof DocumentBlockSchema>;

// ─── Profile parts ────────────────────────────────────────────────────────────

export const NaicsCodeSchema = z.string().regex(/^\d{6}$/, 'NAICS codes are six digits');

export const CapabilityStatementSchema = z.object({
  text: z.string().min(1),
  tags: z.array(z.string()),
});

export type CapabilityStatement = z.infer<typeof CapabilityStatementSchema>;

export const PastPerformanceEntrySchema = z.object({
  client: z.string().min(1),
  scopeSummary: z.string(),
  outcome: z.string(),
});

export type PastPerformanceEntry = z.infer<typeof PastPerformanceEntrySchema>;

export const CompanyIdentitySchema = z.object({
  name: z.string(),
  duns: z.string(),
  naicsCodes: z.array(NaicsCodeSchema),
  signatory: z.string().optional(),
});

export type CompanyIdentity = z.infer<typeof CompanyIdentitySchema>;

// ─── Profile ──────────────────────────────────────────────────────────────────

export const CapabilityProfileSchema = z.object({
  name: z.string().min(1),
  duns: z.string(),
  /** Sorted, unique. */
  naicsCodes: z.array(NaicsCodeSchema),
  capabilityStatements: z.array(CapabilityStatementSchema),
  /** Unique case-insensitively, first spelling kept. */
  certifications: z.array(z.string()),
  pastPerformance: z.array(PastPerformanceEntrySchema),
  signatory: z.string().optional(),
  sourceDocuments: z.array(z.string()),
  /** sha256 of the normalized content; changes whenever any field changes. */
  version: z.string().min(1),
});

export type CapabilityProfile = z.infer<typeof CapabilityProfileSchema>;
