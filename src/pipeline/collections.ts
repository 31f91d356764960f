import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { DateTime } from 'luxon';
import { chromium } from 'playwright';
import type { CollectionsConfig } from '../config.js';
import { CollectionsDatabase } from '../db/sqlite.js';
import { fetchCollectionPage } from '../fetch/collectionPage.js';
import { assembleCollectionRecords } from '../schedule/records.js';
import { renderCollectionsJson, writeCollectionsCsv, writeCollectionsJson } from '../storage/reports.js';
import type { CollectionRecord, CollectionsOutput } from '../types.js';
import { RunLogger } from '../utils/logger.js';

export interface CollectionsRunOptions {
  /** Parse a saved results page instead of driving the browser. */
  htmlFile?: string;
  now?: DateTime;
}

function dateStamp(now: DateTime): string {
  return now.toFormat('yyyy-MM-dd');
}

async function loadResultsHtml(
  config: CollectionsConfig,
  options: CollectionsRunOptions,
  logger: RunLogger,
): Promise<string> {
  if (options.htmlFile) {
    await logger.info(`Reading results page from ${options.htmlFile}`);
    return readFile(options.htmlFile, 'utf8');
  }

  const browser = await chromium.launch({ headless: config.headless });
  try {
    return await fetchCollectionPage(
      browser,
      { url: config.collectionsUrl, postcode: config.postcode, addressLine: config.addressLine },
      logger,
    );
  } finally {
    await browser.close();
  }
}

async function storeCollections(
  config: CollectionsConfig,
  collections: CollectionRecord[],
  checkedAt: DateTime,
): Promise<number> {
  const db = new CollectionsDatabase(config.dbPath, { zone: config.timezone });
  await db.init();
  try {
    const stored = db.upsertCollections(config.addressLine, collections, checkedAt);
    await db.save();
    return stored;
  } finally {
    db.close();
  }
}

export async function runCollectionPipeline(
  config: CollectionsConfig,
  options: CollectionsRunOptions = {},
): Promise<CollectionsOutput> {
  const now = options.now ?? DateTime.now().setZone(config.timezone);
  const runDate = dateStamp(now);
  const logger = new RunLogger(join(config.logDir, `collections_run_${runDate}.log`), { echo: true });
  await logger.init();

  try {
    await logger.info('Starting bin collection scraper...');
    await logger.info(`postcode=${config.postcode}`);
    await logger.info(`address=${config.addressLine}`);
    await logger.info(`timezone=${config.timezone}`);
    await logger.info(`database=${config.dbPath}`);
    if (config.invalidTimezone !== undefined) {
      await logger.warn(`Invalid timezone '${config.invalidTimezone}', using ${config.timezone}`);
    }

    const html = await loadResultsHtml(config, options, logger);
    const collections = assembleCollectionRecords(html, now, config.timezone);
    if (collections.length === 0) {
      await logger.warn('No collections found in results table');
    }

    const storedBinTypes = await storeCollections(config, collections, now);
    await logger.info(`Stored collection data for ${storedBinTypes} bin types in database`);

    const output: CollectionsOutput = {
      address: config.addressLine,
      postcode: config.postcode,
      timezone: config.timezone,
      checked_at: now.toISO() ?? now.toUTC().toString(),
      count: collections.length,
      collections,
    };

    await writeCollectionsJson(join(config.reportsDir, `collections_${runDate}.json`), output);
    await writeCollectionsCsv(join(config.reportsDir, `collections_${runDate}.csv`), collections);

    await logger.info(`Successfully processed ${collections.length} collection types for ${config.addressLine}`);
    if (config.debug) {
      process.stdout.write(`\n${renderCollectionsJson(output)}`);
    }
    return output;
  } catch (error) {
    await logger.error(`Collections pipeline failed: ${String(error)}`);
    throw error;
  } finally {
    await logger.close();
  }
}
