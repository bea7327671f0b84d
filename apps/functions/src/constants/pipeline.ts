// ─── DynamoDB partition keys ──────────────────────────────────────────────────

export const SEEN_OPPORTUNITY_PK = 'SEEN_OPPORTUNITY';
export const APPLICATION_PK = 'APPLICATION';
export const SUBMISSION_PK = 'SUBMISSION';
export const SUBMISSION_CLAIM_PK = 'SUBMISSION_CLAIM';
export const DAILY_COUNTER_PK = 'DAILY_COUNTER';
export const RUN_REPORT_PK = 'RUN_REPORT';

// ─── Matcher ──────────────────────────────────────────────────────────────────

export const NAICS_MISMATCH_CAP = 0.1;
export const LEAD_TIME_CAP = 0.2;

export const NAICS_MISMATCH_GAP = 'NAICS mismatch';
export const LEAD_TIME_GAP = 'insufficient lead time';

export const MATCH_MAX_TOKENS = 1500;

// ─── Generator ────────────────────────────────────────────────────────────────

export const SECTION_MAX_TOKENS = 2500;
export const MAX_GROUNDING_STATEMENTS = 5;
export const MAX_GROUNDING_PAST_PERFORMANCE = 3;

// ─── Run ──────────────────────────────────────────────────────────────────────

export const TOP_OPPORTUNITIES_IN_REPORT = 5;
/** Stop taking new opportunities when the Lambda has less time than this left. */
export const STOP_BEFORE_TIMEOUT_MS = 60_000;
