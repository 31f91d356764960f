import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { DEFAULT_COLLECTIONS_URL, loadConfig } from '../src/config.js';

const REQUIRED = { POSTCODE: 'BA1 1AA', ADDRESS_LINE: '1 Test Street' };

describe('loadConfig', () => {
  it('applies defaults', () => {
    assert.deepEqual(loadConfig(REQUIRED), {
      postcode: 'BA1 1AA',
      addressLine: '1 Test Street',
      timezone: 'Europe/London',
      collectionsUrl: DEFAULT_COLLECTIONS_URL,
      dbPath: 'data/collections.sqlite',
      logDir: 'logs',
      reportsDir: 'reports',
      debug: false,
      headless: true,
    });
  });

  it('names every missing required variable', () => {
    assert.throws(() => loadConfig({}), {
      message: 'Missing required environment variables: POSTCODE, ADDRESS_LINE',
    });
    assert.throws(() => loadConfig({ POSTCODE: '  ""  ', ADDRESS_LINE: 'x' }), {
      message: 'Missing required environment variables: POSTCODE',
    });
  });

  it('strips surrounding whitespace and quotes', () => {
    const config = loadConfig({ POSTCODE: ' "BA1 1AA" ', ADDRESS_LINE: "'1 Test Street'", TIMEZONE: '"Europe/Dublin"' });
    assert.equal(config.postcode, 'BA1 1AA');
    assert.equal(config.addressLine, '1 Test Street');
    assert.equal(config.timezone, 'Europe/Dublin');
  });

  it('falls back from an invalid timezone and remembers it', () => {
    const config = loadConfig({ ...REQUIRED, TIMEZONE: 'Not/AZone' });
    assert.equal(config.timezone, 'Europe/London');
    assert.equal(config.invalidTimezone, 'Not/AZone');
  });

  it('reads flags and paths', () => {
    const config = loadConfig({ ...REQUIRED, DEBUG: 'TRUE', HEADLESS: 'false', DB_PATH: '/tmp/bins.sqlite' });
    assert.equal(config.debug, true);
    assert.equal(config.headless, false);
    assert.equal(config.dbPath, '/tmp/bins.sqlite');
  });

  it('lets command line overrides win', () => {
    const config = loadConfig(REQUIRED, { postcode: 'BA2 2BB', addressLine: '2 Other Road', debug: true });
    assert.equal(config.postcode, 'BA2 2BB');
    assert.equal(config.addressLine, '2 Other Road');
    assert.equal(config.debug, true);
  });
});
