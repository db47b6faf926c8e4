/**
 * Date helpers for run identifiers, artifact timestamps and grant deadlines.
 * Run dates and processing dates follow the local calendar of the machine running the pipeline.
 */

import { DateTime } from 'luxon';

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** YYYYMMDD */
export function toRunDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** YYYY-MM-DD */
export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** YYYYMMDD_HHMMSS, used in artifact filenames */
export function formatTimestamp(date: Date): string {
  return `${toRunDate(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function runDateToIso(runDate: string): string {
  return `${runDate.slice(0, 4)}-${runDate.slice(4, 6)}-${runDate.slice(6, 8)}`;
}

/**
 * Pull the YYYYMMDD_HHMMSS stamp out of an artifact filename.
 * Returns null when the name carries none.
 */
export function timestampFromFilename(filename: string): string | null {
  const match = filename.match(/(\d{8})_(\d{6})/);
  return match ? `${match[1]}${match[2]}` : null;
}

function buildIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

// Written-out dates must carry day, month and year
const WRITTEN_DATE_FORMATS = ['d MMMM yyyy', 'd MMM yyyy', 'MMMM d, yyyy', 'MMM d, yyyy', 'MMMM d yyyy', 'MMM d yyyy'];

/**
 * Normalise an extracted deadline to YYYY-MM-DD.
 * Supports ISO dates (optionally with a time part), day-first numeric dates
 * (31/12/2026, 31-12-2026, 31.12.2026) and English written dates such as
 * "15 March 2026" or "March 15th, 2026". Partial or vague values ("March 2026",
 * "TBD 2026", "31 Dec") are not deadlines and yield null.
 */
export function parseDeadline(value: string | null | undefined): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  const iso = trimmed.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T\s].*)?$/);
  if (iso) {
    return buildIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }

  const dayFirst = trimmed.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})$/);
  if (dayFirst) {
    return buildIsoDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]));
  }

  const written = trimmed.replace(/\s+/g, ' ').replace(/\b(\d{1,2})(?:st|nd|rd|th)\b/i, '$1');
  for (const format of WRITTEN_DATE_FORMATS) {
    const parsed = DateTime.fromFormat(written, format, { locale: 'en' });
    const isoDate = parsed.toISODate();
    if (parsed.isValid && isoDate) {
      return isoDate;
    }
  }
  return null;
}

/** Whole days from `fromIso` to `toIso` (negative when `toIso` is earlier). */
export function daysBetween(fromIso: string, toIso: string): number {
  const from = Date.parse(`${fromIso}T00:00:00Z`);
  const to = Date.parse(`${toIso}T00:00:00Z`);
  return Math.round((to - from) / (24 * 60 * 60 * 1000));
}
