import type { ListingSource } from '@govbid/core';

/**
 * Per-source field mapping. Each canonical field lists the raw keys to try, in
 * order; the first non-empty value wins.
 */
export type ListingFieldMapping = {
  sourceId: string[];
  title: string[];
  requirementText: string[];
  naicsCodes: string[];
  dueDate: string[];
  postedDate: string[];
  agency: string[];
  url: string[];
  requiredDocuments: string[];
};

export const LISTING_FIELD_MAPPINGS: Record<ListingSource, ListingFieldMapping> = {
  SAM_GOV: {
    sourceId: ['noticeId', 'solicitationNumber'],
    title: ['title'],
    requirementText: ['description', 'synopsis'],
    naicsCodes: ['naicsCode', 'naicsCodes'],
    dueDate: ['responseDeadLine', 'reponseDeadLine'],
    postedDate: ['postedDate'],
    agency: ['fullParentPathName', 'department', 'organizationName'],
    url: ['uiLink'],
    requiredDocuments: ['requiredDocuments'],
  },
  DIBBS: {
    sourceId: ['solicitationNumber', 'solNum'],
    title: ['title', 'description_title'],
    requirementText: ['description', 'synopsis'],
    naicsCodes: ['naicsCode', 'naics'],
    dueDate: ['closingDate', 'responseDeadLine'],
    postedDate: ['postedDate', 'posted_date'],
    agency: ['dodComponent', 'agency'],
    url: ['url', 'link'],
    requiredDocuments: ['requiredDocuments'],
  },
};
