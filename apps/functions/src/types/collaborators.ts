import type { DocumentTypeHint, ListingSource, Opportunity, RawListing, RenderedDocument } from '@govbid/core';

/**
 * I/O collaborators the pipeline drives. Implementations live in src/adapters;
 * tests use the in-process doubles in src/test/fakes.ts.
 */

export type ExtractedDocument = {
  text: string;
  hint?: DocumentTypeHint;
};

export interface DocumentExtractor {
  /** Throws ExtractionError for unsupported or unreadable documents. */
  extract(path: string): Promise<ExtractedDocument>;
}

export interface ListingScraper {
  readonly source: ListingSource;
  /** Throws SourceUnavailableError when the whole source cannot be read. */
  fetchListings(lookbackDays: number): Promise<RawListing[]>;
}

export type PortalSubmission = {
  portalId: string;
  opportunity: Opportunity;
  documents: RenderedDocument[];
};

export type PortalReceipt = {
  status: string;
  confirmationId: string;
};

export interface PortalSubmissionAdapter {
  /** Throws SubmissionError when the portal rejects or cannot be reached. */
  submit(submission: PortalSubmission): Promise<PortalReceipt>;
}
