import mammoth from 'mammoth';
import type { S3Client } from '@aws-sdk/client-s3';
import type { DocumentTypeHint } from '@govbid/core';
import { ExtractionError } from '@/helpers/errors';
import { getObjectBuffer, s3 } from '@/helpers/s3';
import type { DocumentExtractor, ExtractedDocument } from '@/types/collaborators';

const TEXT_EXTENSIONS = new Set(['.txt', '.md']);
const DOCX_EXTENSION = '.docx';

const extensionOf = (key: string): string => {
  const name = key.split('/').pop() ?? '';
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
};

/** Hint from folder or file name; undefined lets the profile builder classify by content. */
export const hintFromKey = (key: string): DocumentTypeHint | undefined => {
  const lower = key.toLowerCase();
  if (/past[-_ ]?performance/.test(lower)) return 'past-performance';
  if (/cert/.test(lower)) return 'certification';
  if (/profile|capabilit/.test(lower)) return 'profile';
  return undefined;
};

/**
 * Company documents stored in S3. Plain text is read as is, DOCX goes through
 * mammoth; anything else is an ExtractionError.
 */
export class S3DocumentExtractor implements DocumentExtractor {
  constructor(
    private readonly bucket: string,
    private readonly client: S3Client = s3,
  ) {}

  async extract(key: string): Promise<ExtractedDocument> {
    const ext = extensionOf(key);
    if (!TEXT_EXTENSIONS.has(ext) && ext !== DOCX_EXTENSION) {
      throw new ExtractionError(key, `Unsupported document format: ${ext || 'no extension'}`);
    }

    let buffer: Buffer;
    try {
      buffer = await getObjectBuffer(this.bucket, key, this.client);
    } catch (err) {
      if (err instanceof Error && (err.name === 'NoSuchKey' || err.name === 'AccessDenied')) {
        throw new ExtractionError(key, `${err.name}: ${err.message}`, { cause: err });
      }
      throw err;
    }

    let text: string;
    if (ext === DOCX_EXTENSION) {
      try {
        ({ value: text } = await mammoth.extractRawText({ buffer }));
      } catch (err) {
        throw new ExtractionError(key, `Corrupt DOCX: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
      }
    } else {
      text = buffer.toString('utf-8');
    }

    return { text, hint: hintFromKey(key) };
  }
}
