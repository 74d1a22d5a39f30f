const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

/**
 * Normalizes an ISO date or date-time string to `YYYY-MM-DD`. Returns null when
 * the value is not a real calendar date (e.g. `2024-02-30`).
 */
export const parseCalendarDate = (value: unknown): string | null => {
  if (typeof value !== "string") {
    return null;
  }

  const match = CALENDAR_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, yearText, monthText, dayText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (
    candidate.getUTCFullYear() !== year ||
    candidate.getUTCMonth() !== month - 1 ||
    candidate.getUTCDate() !== day
  ) {
    return null;
  }

  return `${yearText}-${monthText}-${dayText}`;
};
