import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { looksLikeDate, parseCollectionDate, resolveZone } from '../src/schedule/dates.js';
import { LONDON } from './helpers.js';

describe('parseCollectionDate', () => {
  it('pins the date to 07:00 in the given zone', () => {
    const parsed = parseCollectionDate('Monday, 17 November 2025', LONDON);
    assert.equal(parsed?.toISO(), '2025-11-17T07:00:00.000+00:00');
  });

  it('ignores the weekday prefix', () => {
    const monday = parseCollectionDate('Monday, 17 November 2025', LONDON);
    const friday = parseCollectionDate('Friday, 17 November 2025', LONDON);
    assert.equal(friday?.toMillis(), monday?.toMillis());
  });

  it('applies summer time offsets', () => {
    const parsed = parseCollectionDate('Tuesday, 1 July 2025', LONDON);
    assert.equal(parsed?.toISO(), '2025-07-01T07:00:00.000+01:00');
  });

  it('uses the named zone', () => {
    const parsed = parseCollectionDate('Monday, 17 November 2025', 'America/New_York');
    assert.equal(parsed?.toISO(), '2025-11-17T07:00:00.000-05:00');
  });

  it('falls back to Europe/London for an unknown zone', () => {
    const parsed = parseCollectionDate('Monday, 17 November 2025', 'Mars/Olympus_Mons');
    assert.equal(parsed?.toISO(), '2025-11-17T07:00:00.000+00:00');
  });

  it('accepts text without a weekday', () => {
    assert.equal(parseCollectionDate('17 November 2025', LONDON)?.toISO(), '2025-11-17T07:00:00.000+00:00');
  });

  it('collapses whitespace after the comma', () => {
    assert.equal(
      parseCollectionDate('Monday,   17   November 2025 ', LONDON)?.toISO(),
      '2025-11-17T07:00:00.000+00:00',
    );
  });

  it('returns null for text it cannot read', () => {
    assert.equal(parseCollectionDate(undefined, LONDON), null);
    assert.equal(parseCollectionDate('', LONDON), null);
    assert.equal(parseCollectionDate('Monday,', LONDON), null);
    assert.equal(parseCollectionDate('Monday, 2025-11-17', LONDON), null);
    assert.equal(parseCollectionDate('Monday, 31 February 2025', LONDON), null);
    assert.equal(parseCollectionDate('Not subscribed', LONDON), null);
  });
});

describe('resolveZone', () => {
  it('keeps a valid zone', () => {
    assert.deepEqual(resolveZone('America/New_York'), { zone: 'America/New_York', fallback: false });
  });

  it('flags the fallback for invalid or blank names', () => {
    assert.deepEqual(resolveZone('Not/AZone'), { zone: LONDON, fallback: true });
    assert.deepEqual(resolveZone('  '), { zone: LONDON, fallback: true });
    assert.deepEqual(resolveZone(undefined), { zone: LONDON, fallback: true });
  });
});

describe('looksLikeDate', () => {
  it('matches values containing a weekday name', () => {
    assert.equal(looksLikeDate('Monday, 17 November 2025'), true);
    assert.equal(looksLikeDate('next Thursday'), true);
  });

  it('rejects labels and blanks', () => {
    assert.equal(looksLikeDate('Black Rubbish Bin'), false);
    assert.equal(looksLikeDate(''), false);
    assert.equal(looksLikeDate(undefined), false);
    assert.equal(looksLikeDate('monday, 17 November 2025'), false);
  });

  it('treats a label containing a day name as a date', () => {
    assert.equal(looksLikeDate('Sunday School recycling'), true);
  });
});
