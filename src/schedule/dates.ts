import { DateTime, IANAZone } from 'luxon';
import { normalizeWhitespace } from '../utils/text.js';

export const DEFAULT_ZONE = 'Europe/London';

/** Hour of day every parsed collection date is pinned to. */
export const COLLECTION_HOUR = 7;

const COLLECTION_DATE_FORMAT = 'd LLLL yyyy';

const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export interface ResolvedZone {
  zone: string;
  fallback: boolean;
}

export function resolveZone(zoneName: string | undefined): ResolvedZone {
  const candidate = zoneName?.trim() ?? '';
  if (candidate && IANAZone.isValidZone(candidate)) {
    return { zone: candidate, fallback: false };
  }
  return { zone: DEFAULT_ZONE, fallback: true };
}

/**
 * Weekday-name heuristic used to tell date cells from label cells.
 * A label that happens to contain a day name ("Sunday School bin") is
 * misread as a date; callers rely on the header mapping to avoid that.
 */
export function looksLikeDate(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return WEEKDAY_NAMES.some((day) => value.includes(day));
}

/**
 * Parses "Monday, 17 November 2025" into 07:00 local time in the given zone.
 * The weekday prefix is ignored. Returns null for anything that does not match.
 */
export function parseCollectionDate(text: string | undefined, zoneName: string): DateTime | null {
  if (!text) {
    return null;
  }

  const commaIndex = text.indexOf(',');
  const datePart = normalizeWhitespace(commaIndex === -1 ? text : text.slice(commaIndex + 1));
  if (!datePart) {
    return null;
  }

  const { zone } = resolveZone(zoneName);
  const parsed = DateTime.fromFormat(datePart, COLLECTION_DATE_FORMAT, { zone, locale: 'en-GB' });
  if (!parsed.isValid) {
    return null;
  }

  return parsed.set({ hour: COLLECTION_HOUR, minute: 0, second: 0, millisecond: 0 });
}
