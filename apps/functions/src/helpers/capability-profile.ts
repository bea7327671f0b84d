import { createHash } from 'crypto';
import type {
  CapabilityProfile,
  CapabilityStatement,
  CompanyIdentity,
  DocumentBlock,
  DocumentTypeHint,
  PastPerformanceEntry,
} from '@govbid/core';
import keywords from '@/data/capability-keywords.json';
import { EmptyProfileError, ExtractionError, errorMessage } from './errors';
import { deepFreeze } from './freeze';
import { withRetry, withTimeout } from './retry';
import type { DocumentExtractor } from '@/types/collaborators';

// ─── Keyword matching ─────────────────────────────────────────────────────────

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Whole-term, case-insensitive. Works for terms ending in symbols such as "Security+". */
const termPattern = (term: string) => new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(term)}(?![A-Za-z0-9])`, 'i');

const TECHNICAL_TERMS = keywords.technical.map((term) => ({ tag: term.toLowerCase(), pattern: termPattern(term) }));
const CERTIFICATION_TERMS = keywords.certifications.map((term) => ({ name: term, pattern: termPattern(term) }));

export const inferTags = (text: string): string[] =>
  TECHNICAL_TERMS.filter(({ pattern }) => pattern.test(text)).map(({ tag }) => tag);

export const findCertificationMentions = (text: string): string[] =>
  CERTIFICATION_TERMS.filter(({ pattern }) => pattern.test(text)).map(({ name }) => name);

// Valid NAICS sectors only, so phone fragments and contract numbers mostly fall out
const NAICS_PATTERN = /\b(?:11|2[1-3]|3[1-3]|4[2-9]|5[1-6]|6[12]|7[12]|81|92)\d{4}\b/g;

export const extractNaicsCodes = (text: string): string[] => text.match(NAICS_PATTERN) ?? [];

// ─── Classification ───────────────────────────────────────────────────────────

const countHits = (lower: string, hints: string[]) => hints.filter((h) => lower.includes(h)).length;

/** Keyword fallback for blocks the extractor could not label. */
export const classifyBlock = (block: DocumentBlock): DocumentTypeHint => {
  if (block.hint) return block.hint;

  const lower = block.text.toLowerCase();
  const scores: Array<[DocumentTypeHint, number]> = [
    ['past-performance', countHits(lower, keywords.pastPerformanceHints)],
    ['certification', countHits(lower, keywords.certificationHints)],
    ['profile', countHits(lower, keywords.profileHints)],
  ];
  const [best, hits] = scores.reduce((a, b) => (b[1] > a[1] ? b : a));
  return hits > 0 ? best : 'other';
};

// ─── Field parsing ────────────────────────────────────────────────────────────

const COMPANY_NAME_PATTERNS = [
  /^\s*company name\s*:\s*(.+)$/im,
  /^\s*company\s*:\s*(.+)$/im,
  /^\s*organization\s*:\s*(.+)$/im,
  /^\s*firm\s*:\s*(.+)$/im,
];
const DUNS_PATTERN = /\bDUNS\s*(?:number|#|no\.?)?\s*:?\s*(\d{9})\b/i;
const IDENTITY_LINE = /^\s*(company name|company|organization|firm|duns|uei|cage|naics)\b[^:\n]*:/i;

const BULLET = /^\s*(?:[-*•]|\d+[.)])\s+/;

const paragraphs = (text: string): string[] =>
  text
    .split(/\n\s*\n/)
    .map((p) =>
      p
        .split('\n')
        .filter((line) => !IDENTITY_LINE.test(line))
        .join('\n')
        .trim(),
    )
    .filter(Boolean);

export const extractCompanyName = (text: string): string | undefined => {
  for (const pattern of COMPANY_NAME_PATTERNS) {
    const name = text.match(pattern)?.[1]?.trim();
    if (name) return name;
  }
  return undefined;
};

const fieldValue = (lines: string[], label: string): string | undefined => {
  const pattern = new RegExp(`^\\s*${label}\\s*:\\s*(.*)$`, 'i');
  for (const line of lines) {
    const m = line.match(pattern);
    if (m) return m[1].trim();
  }
  return undefined;
};

/**
 * Entries are separated by blank lines. Labelled lines (Client / Scope /
 * Outcome) win; otherwise the first line is the client and the rest the scope.
 */
export const parsePastPerformance = (text: string): PastPerformanceEntry[] =>
  text
    .split(/\n\s*\n/)
    .map((chunk) => chunk.split('\n').map((l) => l.trim()).filter(Boolean))
    .filter((lines) => lines.length > 0)
    .flatMap((lines): PastPerformanceEntry[] => {
      const client = fieldValue(lines, '(?:client|customer|agency)');
      if (client !== undefined) {
        return [{
          client,
          scopeSummary: fieldValue(lines, '(?:scope|description)') ?? '',
          outcome: fieldValue(lines, '(?:outcome|result)s?') ?? '',
        }];
      }
      // a lone unlabelled line is a heading
      const [first, ...rest] = lines;
      return rest.length ? [{ client: first.replace(BULLET, '').trim(), scopeSummary: rest.join(' '), outcome: '' }] : [];
    })
    .filter((entry) => entry.client.length > 0);

const certificationLines = (text: string): string[] =>
  text
    .split('\n')
    .map((line) => line.replace(BULLET, '').trim())
    .filter((line) => line.length > 0 && line.length <= 120 && !IDENTITY_LINE.test(line));

const dedupeCaseInsensitive = (values: string[]): string[] => {
  const seen = new Set<string>();
  return values.filter((v) => {
    const key = v.trim().toLowerCase();
    if (!key || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

export const profileVersion = (content: Omit<CapabilityProfile, 'version' | 'sourceDocuments'>): string =>
  createHash('sha256').update(JSON.stringify(content)).digest('hex');

// ─── Builder ──────────────────────────────────────────────────────────────────

/**
 * Folds extracted document text into the company profile. The result is deep
 * frozen. Throws EmptyProfileError when no block has any text.
 */
export function buildCapabilityProfile(blocks: DocumentBlock[], identity: CompanyIdentity): CapabilityProfile {
  const usable = blocks.filter((b) => b.text.trim().length > 0);
  if (!usable.length) {
    throw new EmptyProfileError(`No usable company documents (${blocks.length} provided)`);
  }

  const byType: Record<DocumentTypeHint, string[]> = {
    profile: [],
    'past-performance': [],
    certification: [],
    other: [],
  };
  for (const block of usable) {
    byType[classifyBlock(block)].push(block.text.trim());
  }

  const profileText = byType.profile.join('\n\n');
  const allText = usable.map((b) => b.text).join('\n\n');

  const statementSources = [
    ...paragraphs(profileText).map((text) => ({ text, keepUntagged: true })),
    ...paragraphs(byType.other.join('\n\n')).map((text) => ({ text, keepUntagged: false })),
  ];
  const capabilityStatements: CapabilityStatement[] = statementSources
    .map(({ text, keepUntagged }) => ({ text, tags: inferTags(text), keepUntagged }))
    .filter((s) => s.keepUntagged || s.tags.length > 0)
    .map(({ text, tags }) => ({ text, tags }));

  const certifications = dedupeCaseInsensitive([
    ...byType.certification.flatMap(certificationLines),
    ...findCertificationMentions(allText),
  ]);

  const pastPerformance = byType['past-performance'].flatMap(parsePastPerformance);

  const naicsCodes = Array.from(new Set([...identity.naicsCodes, ...extractNaicsCodes(allText)])).sort();

  const content = {
    name: identity.name.trim() || extractCompanyName(profileText || allText) || 'Unnamed company',
    duns: identity.duns.trim() || allText.match(DUNS_PATTERN)?.[1] || '',
    naicsCodes,
    capabilityStatements,
    certifications,
    pastPerformance,
    signatory: identity.signatory,
  };

  return deepFreeze({
    ...content,
    sourceDocuments: usable.map((b) => b.documentId),
    version: profileVersion(content),
  });
}

// ─── Document collection ──────────────────────────────────────────────────────

export type CollectOptions = {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
};

export type SkippedDocument = { documentId: string; reason: string };

/**
 * Runs the extractor over every document. A document that cannot be read is
 * skipped and reported; only transient failures are retried.
 */
export async function collectDocumentBlocks(
  extractor: DocumentExtractor,
  paths: string[],
  options: CollectOptions,
): Promise<{ blocks: DocumentBlock[]; skipped: SkippedDocument[] }> {
  const blocks: DocumentBlock[] = [];
  const skipped: SkippedDocument[] = [];

  for (const path of paths) {
    try {
      const extracted = await withRetry(
        () =>
          withTimeout(
            () => extractor.extract(path),
            options.timeoutMs,
            () => new ExtractionError(path, `Extraction timed out after ${options.timeoutMs}ms`),
          ),
        {
          maxRetries: options.maxRetries,
          baseDelayMs: options.baseDelayMs,
          sleep: options.sleep,
          shouldRetry: (err) => !(err instanceof ExtractionError),
        },
      );
      blocks.push({ documentId: path, text: extracted.text, hint: extracted.hint });
    } catch (err) {
      const reason = errorMessage(err);
      console.warn(`[capability-profile] skipping document ${path}: ${reason}`);
      skipped.push({ documentId: path, reason });
    }
  }

  console.log(`[capability-profile] extracted ${blocks.length}/${paths.length} documents`);
  return { blocks, skipped };
}
