const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

export interface CursorStep {
  nextDate: string;
  done: boolean;
}

function parseIsoDate(value: string): number {
  const match = ISO_DATE_PATTERN.exec(value.trim());

  if (!match) {
    throw new Error(`Invalid date: ${value}`);
  }

  const [, year, month, day] = match;
  const timestamp = Date.UTC(Number(year), Number(month) - 1, Number(day));
  const date = new Date(timestamp);

  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    throw new Error(`Invalid date: ${value}`);
  }

  return timestamp;
}

export function formatIsoDate(timestampMs: number): string {
  return new Date(timestampMs).toISOString().slice(0, 10);
}

/** Reduces `YYYY-MM-DD`, `YYYY-MM-DD HH:mm:ss` or an ISO timestamp to its date. */
export function normalizeDate(value: string): string {
  return formatIsoDate(parseIsoDate(value));
}

export function todayUtc(nowMs: number): string {
  return formatIsoDate(nowMs);
}

export function addDays(date: string, days: number): string {
  return formatIsoDate(parseIsoDate(date) + days * DAY_MS);
}

/**
 * Pulls a start date back out of the conversion window. Any date on or after
 * `today - conversionWindowDays` becomes exactly that date, so the trailing
 * window is re-read on every run.
 */
export function validStartDate(
  requestedDate: string,
  conversionWindowDays: number,
  nowMs: number
): string {
  const requested = normalizeDate(requestedDate);
  const earliestUnsettled = addDays(todayUtc(nowMs), -Math.max(0, conversionWindowDays));

  return requested >= earliestUnsettled ? earliestUnsettled : requested;
}

export function advanceCursor(
  currentDate: string,
  observedBookmark: string,
  nowMs: number
): CursorStep {
  const today = todayUtc(nowMs);
  const current = normalizeDate(currentDate);

  return {
    nextDate: current < today ? addDays(current, 1) : current,
    done: normalizeDate(observedBookmark) >= today
  };
}
