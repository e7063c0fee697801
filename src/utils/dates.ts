/**
 * Date parsing for metadata values and body text
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

const MONTH_NAME = '(jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\\.?';

// "March 3, 2024" / "Mar 3 2024"
const MONTH_DAY_YEAR = new RegExp(`\\b${MONTH_NAME}\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`, 'i');
// "3 March 2024"
const DAY_MONTH_YEAR = new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+${MONTH_NAME}\\s+(\\d{4})\\b`, 'i');
const ISO_DATE = /\b(\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?)\b/;
const DATE_LABEL = /\b(?:published|posted|updated|last\s+modified|date)\b\s*(?:on|:)?\s*/i;

const MIN_YEAR = 1990;

function isPlausible(date: Date): boolean {
  return !Number.isNaN(date.getTime()) && date.getUTCFullYear() >= MIN_YEAR;
}

/**
 * Parse a metadata date value (ISO 8601, RFC 2822, or unix seconds)
 */
export function parseDate(value: string | number | undefined | null): Date | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') {
    // Seconds vs milliseconds
    const date = new Date(value < 1e12 ? value * 1000 : value);
    return isPlausible(date) ? date : undefined;
  }
  const trimmed = value.trim();
  if (!trimmed) return undefined;
  if (/^\d{9,10}$/.test(trimmed)) return parseDate(Number(trimmed));
  if (!/\d{4}/.test(trimmed)) return undefined;
  const date = new Date(trimmed);
  return isPlausible(date) ? date : undefined;
}

function monthIndex(name: string): number | undefined {
  return MONTHS[name.toLowerCase().slice(0, 3)];
}

function utcDate(year: number, month: number, day: number): Date | undefined {
  if (day < 1 || day > 31) return undefined;
  const date = new Date(Date.UTC(year, month, day));
  return isPlausible(date) ? date : undefined;
}

function matchDate(text: string): Date | undefined {
  const iso = ISO_DATE.exec(text);
  const mdy = MONTH_DAY_YEAR.exec(text);
  const dmy = DAY_MONTH_YEAR.exec(text);

  // Earliest match in the text wins
  const candidates: Array<{ index: number; date: Date | undefined }> = [];
  if (iso) candidates.push({ index: iso.index, date: parseDate(iso[1]) });
  if (mdy) {
    const month = monthIndex(mdy[1]);
    candidates.push({ index: mdy.index, date: month === undefined ? undefined : utcDate(Number(mdy[3]), month, Number(mdy[2])) });
  }
  if (dmy) {
    const month = monthIndex(dmy[2]);
    candidates.push({ index: dmy.index, date: month === undefined ? undefined : utcDate(Number(dmy[3]), month, Number(dmy[1])) });
  }

  candidates.sort((a, b) => a.index - b.index);
  return candidates.find(candidate => candidate.date !== undefined)?.date;
}

/**
 * Find a publication date in visible text. Dates following a label such as
 * "Published" or "Posted on" are preferred over the first bare date.
 */
export function findDateInText(text: string): Date | undefined {
  const label = DATE_LABEL.exec(text);
  if (label) {
    const afterLabel = text.slice(label.index + label[0].length, label.index + label[0].length + 40);
    const labelled = matchDate(afterLabel);
    if (labelled) return labelled;
  }
  return matchDate(text.slice(0, 2000));
}

/**
 * Most recent of a list of optional dates
 */
export function latestDate(dates: Array<Date | undefined>): Date | undefined {
  let latest: Date | undefined;
  for (const date of dates) {
    if (date && (!latest || date.getTime() > latest.getTime())) latest = date;
  }
  return latest;
}
