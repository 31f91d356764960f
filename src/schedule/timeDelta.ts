import type { DateTime } from 'luxon';
import type { TimeDeltas } from '../types.js';
import { pluralize } from '../utils/text.js';
import { parseCollectionDate, resolveZone } from './dates.js';

export const COLLECTION_PASSED_TEXT = 'Collection time has passed';

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 86_400_000;

export function formatDuration(days: number, totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60) - days * 24;
  const minutes = totalMinutes % 60;

  const parts: string[] = [];
  if (days > 0) {
    parts.push(pluralize(days, 'day'));
  }
  if (hours > 0) {
    parts.push(pluralize(hours, 'hour'));
  }
  if (minutes > 0) {
    parts.push(pluralize(minutes, 'minute'));
  }

  if (parts.length === 0) {
    return 'Less than 1 minute';
  }
  if (parts.length === 1) {
    return parts[0];
  }
  return `${parts.slice(0, -1).join(', ')} and ${parts[parts.length - 1]}`;
}

/** Wall-clock reading in `zone`, so a day across a clock change is still 1440 minutes. */
function localClockMillis(value: DateTime, zone: string): number {
  return value.setZone(zone).setZone('UTC', { keepLocalTime: true }).toMillis();
}

function wholeDaysAndMinutes(ms: number): { days: number; minutes: number } {
  return {
    days: Math.floor(ms / MS_PER_DAY),
    minutes: Math.floor(ms / MS_PER_MINUTE),
  };
}

export function computeTimeDeltas(
  nextText: string | undefined,
  lastText: string | undefined,
  now: DateTime,
  zoneName: string,
): TimeDeltas {
  const result: TimeDeltas = {};
  const { zone } = resolveZone(zoneName);
  const nowMs = localClockMillis(now, zone);

  const next = parseCollectionDate(nextText, zoneName);
  if (next) {
    const untilMs = localClockMillis(next, zone) - nowMs;
    if (untilMs >= 0) {
      const { days, minutes } = wholeDaysAndMinutes(untilMs);
      result.days_until_next = days;
      result.minutes_until_next = minutes;
      result.time_until_next_text = formatDuration(days, minutes);
    } else {
      result.days_until_next = 0;
      result.minutes_until_next = 0;
      result.time_until_next_text = COLLECTION_PASSED_TEXT;
    }
  }

  const last = parseCollectionDate(lastText, zoneName);
  if (last) {
    const sinceMs = nowMs - localClockMillis(last, zone);
    if (sinceMs >= 0) {
      const { days, minutes } = wholeDaysAndMinutes(sinceMs);
      result.days_since_last = days;
      result.minutes_since_last = minutes;
    } else {
      result.days_since_last = 0;
      result.minutes_since_last = 0;
    }
  }

  return result;
}
