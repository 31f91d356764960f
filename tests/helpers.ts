import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { DateTime } from 'luxon';

export const LONDON = 'Europe/London';

export function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf8');
}

export function londonTime(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: LONDON });
}
