const DAY_MS = 86_400_000;

export function nowIso(): string {
  return new Date().toISOString();
}

/** UTC calendar day, used as the daily counter key. */
export function dayKey(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function addDays(d: Date, days: number): Date {
  return new Date(d.getTime() + days * DAY_MS);
}

export function mmddyyyy(d: Date): string {
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  const yyyy = String(d.getUTCFullYear());
  return `${mm}/${dd}/${yyyy}`;
}

/**
 * Listing dates come as ISO timestamps or MM/dd/yyyy. Returns an ISO string in
 * UTC, or null when the value is not a date we understand.
 */
export function parseListingDate(value: unknown): string | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null;
  const raw = String(value).trim();
  if (!raw) return null;

  const us = raw.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (us) {
    const [, mm, dd, yyyy] = us;
    const d = new Date(Date.UTC(Number(yyyy), Number(mm) - 1, Number(dd)));
    return d.getUTCDate() === Number(dd) ? d.toISOString() : null;
  }

  const d = new Date(raw);
  return Number.isNaN(d.getTime()) ? null : d.toISOString();
}
