import { ExtractionError, EmptyProfileError } from './errors';
import {
  buildCapabilityProfile,
  classifyBlock,
  collectDocumentBlocks,
  extractNaicsCodes,
  inferTags,
  parsePastPerformance,
} from './capability-profile';
import { CERTIFICATION_TEXT, FakeExtractor, PAST_PERFORMANCE_TEXT, PROFILE_TEXT, noWait, testProfile } from '@/test/fakes';

const identity = { name: 'Acme Federal IT', duns: '123456789', naicsCodes: ['541512'] };

describe('inferTags', () => {
  it('matches whole terms case-insensitively', () => {
    expect(inferTags('CYBERSECURITY and Incident Response')).toEqual(['cybersecurity', 'incident response']);
  });

  it('does not match inside longer words', () => {
    expect(inferTags('SOCIAL media outreach')).toEqual([]);
  });
});

describe('extractNaicsCodes', () => {
  it('keeps six digit codes in valid sectors', () => {
    expect(extractNaicsCodes('NAICS 541512, 541519; phone 000123')).toEqual(['541512', '541519']);
  });
});

describe('classifyBlock', () => {
  it('uses the hint when present', () => {
    expect(classifyBlock({ documentId: 'a', text: 'Client: X', hint: 'profile' })).toBe('profile');
  });

  it('falls back to keyword hits', () => {
    expect(classifyBlock({ documentId: 'a', text: 'Client: Navy\nOutcome: delivered' })).toBe('past-performance');
    expect(classifyBlock({ documentId: 'b', text: 'Lunch menu' })).toBe('other');
  });
});

describe('parsePastPerformance', () => {
  it('reads labelled entries', () => {
    expect(parsePastPerformance(PAST_PERFORMANCE_TEXT)).toEqual([
      {
        client: 'Department of Energy',
        scopeSummary: 'Security operations center staffing and SIEM tuning',
        outcome: 'Reduced incident response time by 40%',
      },
    ]);
  });

  it('treats the first unlabelled line as the client and skips lone headings', () => {
    const text = 'Past Performance\n\nU.S. Navy\nHelp desk modernization for 3,000 users';
    expect(parsePastPerformance(text)).toEqual([
      { client: 'U.S. Navy', scopeSummary: 'Help desk modernization for 3,000 users', outcome: '' },
    ]);
  });
});

describe('buildCapabilityProfile', () => {
  it('builds statements, certifications and past performance from typed blocks', () => {
    const profile = testProfile();

    expect(profile.name).toBe('Acme Federal IT');
    expect(profile.duns).toBe('123456789');
    expect(profile.naicsCodes).toEqual(['541512']);
    expect(profile.capabilityStatements).toEqual([
      {
        text: 'We deliver cybersecurity and incident response services for civilian agencies.',
        tags: ['cybersecurity', 'incident response'],
      },
      {
        text: 'Our engineers run cloud computing migrations with zero trust architectures.',
        tags: ['cloud computing', 'zero trust'],
      },
    ]);
    expect(profile.certifications).toEqual(['ISO 27001', 'CMMI Level 3']);
    expect(profile.pastPerformance).toHaveLength(1);
    expect(profile.sourceDocuments).toEqual([
      'company/profile.txt',
      'company/past-performance.txt',
      'company/certifications.txt',
    ]);
    expect(profile.signatory).toBe('Jane Roe, CEO');
  });

  it('returns a deeply frozen profile', () => {
    const profile = testProfile();

    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.capabilityStatements[0].tags)).toBe(true);
    expect(Object.isFrozen(profile.pastPerformance[0])).toBe(true);
  });

  it('produces the same version for the same content', () => {
    expect(testProfile().version).toBe(testProfile().version);
    expect(testProfile().version).toMatch(/^[0-9a-f]{64}$/);
  });

  it('changes the version when content changes', () => {
    const base = buildCapabilityProfile([{ documentId: 'p', text: PROFILE_TEXT, hint: 'profile' }], identity);
    const more = buildCapabilityProfile(
      [
        { documentId: 'p', text: PROFILE_TEXT, hint: 'profile' },
        { documentId: 'c', text: CERTIFICATION_TEXT, hint: 'certification' },
      ],
      identity,
    );
    expect(more.version).not.toBe(base.version);
  });

  it('takes the company name from the documents when the identity has none', () => {
    const profile = buildCapabilityProfile([{ documentId: 'p', text: PROFILE_TEXT, hint: 'profile' }], {
      name: '',
      duns: '',
      naicsCodes: [],
    });
    expect(profile.name).toBe('Acme Federal IT');
  });

  it('drops untagged paragraphs from unclassified documents', () => {
    const profile = buildCapabilityProfile(
      [{ documentId: 'x', text: 'Office hours are 9 to 5.\n\nWe run firewall upgrades.' }],
      identity,
    );
    expect(profile.capabilityStatements).toEqual([{ text: 'We run firewall upgrades.', tags: ['firewall'] }]);
  });

  it('throws EmptyProfileError when no block has text', () => {
    expect(() => buildCapabilityProfile([], identity)).toThrow(EmptyProfileError);
    expect(() => buildCapabilityProfile([{ documentId: 'a', text: '  \n' }], identity)).toThrow(
      'No usable company documents (1 provided)',
    );
  });
});

describe('collectDocumentBlocks', () => {
  const options = { timeoutMs: 1000, maxRetries: 2, baseDelayMs: 0, sleep: noWait };

  it('skips unreadable documents and keeps the rest', async () => {
    const extractor = new FakeExtractor({
      'company/profile.txt': { text: PROFILE_TEXT, hint: 'profile' },
      'company/scan.pdf': new ExtractionError('company/scan.pdf', 'Unsupported document format: .pdf'),
    });

    const { blocks, skipped } = await collectDocumentBlocks(
      extractor,
      ['company/profile.txt', 'company/scan.pdf'],
      options,
    );

    expect(blocks).toEqual([{ documentId: 'company/profile.txt', text: PROFILE_TEXT, hint: 'profile' }]);
    expect(skipped).toEqual([
      { documentId: 'company/scan.pdf', reason: 'ExtractionError: Unsupported document format: .pdf' },
    ]);
    // ExtractionError is not retried
    expect(extractor.calls).toEqual(['company/profile.txt', 'company/scan.pdf']);
  });

  it('retries transient failures', async () => {
    let attempts = 0;
    const extractor = {
      extract: async () => {
        attempts += 1;
        if (attempts === 1) throw new Error('socket hang up');
        return { text: 'We run firewall upgrades.' };
      },
    };

    const { blocks, skipped } = await collectDocumentBlocks(extractor, ['company/a.txt'], options);

    expect(attempts).toBe(2);
    expect(blocks).toHaveLength(1);
    expect(skipped).toEqual([]);
  });
});
