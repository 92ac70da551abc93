export const DAY_MS = 24 * 60 * 60 * 1000;
const EPOCH_ISO = '1970-01-01T00:00:00.000Z';
const MIN_DATE_MS = -8640000000000000;
const MAX_DATE_MS = 8640000000000000;
const ISO_DATE_TIME_RE = /^[+-]?\d{4,6}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,3})?(?:[Zz]|[+-]\d{2}:\d{2})$/;

export type Clock = () => string;

export function isIsoDateTime(value: unknown): value is string {
  return typeof value === 'string' && ISO_DATE_TIME_RE.test(value) && Number.isFinite(Date.parse(value));
}

function parseIso(iso: string): number | null {
  if (!isIsoDateTime(iso)) {
    return null;
  }
  return Date.parse(iso);
}

function toSafeIso(ms: number): string {
  if (!Number.isFinite(ms)) {
    return EPOCH_ISO;
  }
  return new Date(Math.min(MAX_DATE_MS, Math.max(MIN_DATE_MS, ms))).toISOString();
}

export function nowIso(): string {
  return toSafeIso(Date.now());
}

export function addDaysIso(iso: string, days: number): string {
  const base = parseIso(iso);
  const start = base === null ? Date.now() : base;
  const safeDays = Number.isFinite(days) ? days : 0;
  return toSafeIso(start + safeDays * DAY_MS);
}

export function daysBetween(fromIso: string, toIso: string): number {
  const from = parseIso(fromIso);
  const to = parseIso(toIso);

  if (from === null || to === null) {
    return 0;
  }

  return Math.max(0, (to - from) / DAY_MS);
}

// Calendar-style day count: partial days are dropped.
export function wholeDaysBetween(fromIso: string, toIso: string): number {
  return Math.floor(daysBetween(fromIso, toIso));
}

export function isDue(dueAt: string, now: string): boolean {
  const due = parseIso(dueAt);
  const current = parseIso(now);

  if (due === null || current === null) {
    return false;
  }

  return due <= current;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Number.isFinite(ms) ? Math.max(0, Math.floor(ms / 1000)) : 0;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}m ${seconds}s`;
}

// Stable, timezone-independent display form: `2026-02-23 12:00 UTC`.
export function formatTimestamp(iso: string): string {
  const ms = parseIso(iso);
  if (ms === null) {
    return 'unknown';
  }
  const normalized = new Date(ms).toISOString();
  return `${normalized.slice(0, 10)} ${normalized.slice(11, 16)} UTC`;
}
