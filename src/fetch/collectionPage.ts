import type { Browser, Locator, Page } from 'playwright';
import type { RunLogger } from '../utils/logger.js';
import { randomWait } from '../utils/wait.js';

export interface CollectionPageOptions {
  url: string;
  postcode: string;
  addressLine: string;
}

export interface AddressOption {
  value: string;
  text: string;
}

const POSTCODE_INPUT_XPATH = [
  "//label[contains(text(), 'Enter a postcode') or contains(text(), 'postcode')]/following::input[@type='text']",
  "//label[contains(text(), 'Enter a postcode') or contains(text(), 'postcode')]/../input[@type='text']",
  "//form//input[@type='text' and (contains(@name, 'postcode') or contains(@id, 'postcode'))]",
  "//*[contains(@class, 'form') or contains(@id, 'form')]//input[@type='text'][not(contains(@class, 'search') or contains(@id, 'search'))]",
].join(' | ');

const FIND_BUTTON_XPATH = [
  "//button[contains(., 'Find') or contains(text(), 'Find')]",
  "//input[@type='submit' and contains(@value, 'Find')]",
  "//button[@type='submit']",
].join(' | ');

const ADDRESS_SELECT_ID = '#PCSelectp1';
const OPTION_POLL_ATTEMPTS = 20;

/** Exact text match first, then containment in either direction ignoring case. */
export function pickAddressOption(options: AddressOption[], addressLine: string): AddressOption | null {
  const exact = options.find((option) => option.text === addressLine);
  if (exact) {
    return exact;
  }

  const wanted = addressLine.toLowerCase();
  return (
    options.find((option) => {
      const text = option.text.toLowerCase();
      return text.length > 0 && (wanted.includes(text) || text.includes(wanted));
    }) ?? null
  );
}

async function enterPostcode(page: Page, postcode: string): Promise<void> {
  const input = page.locator(`xpath=${POSTCODE_INPUT_XPATH}`).first();
  await input.click();
  await input.fill('');
  await input.pressSequentially(postcode, { delay: 50 });
  await randomWait();

  if ((await input.inputValue()) !== postcode) {
    await input.fill('');
    await input.pressSequentially(postcode, { delay: 50 });
    await randomWait();
  }

  await page.locator(`xpath=${FIND_BUTTON_XPATH}`).first().click();
}

async function waitForAddressSelect(page: Page, logger: RunLogger): Promise<Locator> {
  let select: Locator;
  try {
    await page.waitForSelector(ADDRESS_SELECT_ID, { state: 'attached', timeout: 10000 });
    select = page.locator(ADDRESS_SELECT_ID);
  } catch {
    await page.waitForSelector('select', { state: 'attached', timeout: 10000 });
    select = page.locator('select').first();
  }

  try {
    await select.waitFor({ state: 'visible', timeout: 10000 });
  } catch {
    await logger.warn('Address select found but not visible, attempting to interact anyway');
  }

  await randomWait();
  for (let attempt = 0; attempt < OPTION_POLL_ATTEMPTS; attempt += 1) {
    if ((await select.locator('option').count()) > 1) {
      break;
    }
    await randomWait();
  }
  await randomWait();

  return select;
}

/** Drops placeholder entries (blank value or text) and repeated values. */
export function toAddressOptions(raw: AddressOption[]): AddressOption[] {
  const seen = new Set<string>();
  const out: AddressOption[] = [];
  for (const option of raw) {
    const value = option.value.trim();
    const text = option.text.trim();
    if (value && text && !seen.has(value)) {
      seen.add(value);
      out.push({ value, text });
    }
  }
  return out;
}

async function readAddressOptions(select: Locator): Promise<AddressOption[]> {
  const raw = await select.locator('option').evaluateAll((items) =>
    items.map((item) => ({
      value: item.getAttribute('value') ?? '',
      text: item.textContent ?? '',
    })),
  );
  return toAddressOptions(raw);
}

async function selectAddress(select: Locator, addressLine: string, logger: RunLogger): Promise<void> {
  try {
    await select.selectOption({ label: addressLine });
    return;
  } catch (error) {
    await logger.warn(`Selecting address by label failed (${String(error)}), falling back to option lookup`);
  }

  const options = await readAddressOptions(select);
  if (options.length === 0) {
    throw new Error('Could not retrieve options from address dropdown');
  }

  await logger.info(`Available options in dropdown (${options.length})`);
  const match = pickAddressOption(options, addressLine);
  if (!match) {
    const available = options.slice(0, 10).map((option) => option.text);
    throw new Error(`Could not find address '${addressLine}' in dropdown. Available options: ${available.join('; ')}`);
  }
  if (match.text !== addressLine) {
    await logger.info(`Found partial address match: '${match.text}'`);
  }

  const applied = await select.evaluate((element, value) => {
    if (!(element instanceof HTMLSelectElement)) {
      return false;
    }
    element.value = value;
    element.dispatchEvent(new Event('change', { bubbles: true }));
    return element.value === value;
  }, match.value);
  if (!applied) {
    throw new Error(`Failed to set address select value to '${match.value}'`);
  }
}

/**
 * Walks the council form (postcode, address, submit) and returns the HTML of
 * the results page once its table is visible. The browser is owned by the caller.
 */
export async function fetchCollectionPage(
  browser: Browser,
  options: CollectionPageOptions,
  logger: RunLogger,
): Promise<string> {
  const context = await browser.newContext();
  const page = await context.newPage();
  try {
    await page.goto(options.url, { waitUntil: 'networkidle', timeout: 30000 });
    await enterPostcode(page, options.postcode);

    await logger.info('Waiting for address dropdown to load...');
    const select = await waitForAddressSelect(page, logger);
    await selectAddress(select, options.addressLine, logger);
    await randomWait();

    await logger.info("Waiting for 'Find collection days' button...");
    const nextButton = page.locator('#nextBtn');
    await nextButton.waitFor({ state: 'visible', timeout: 10000 });
    await nextButton.click();

    await logger.info('Waiting for collection dates to load...');
    await randomWait();
    await page.waitForSelector('table', { state: 'visible', timeout: 20000 });
    return await page.content();
  } finally {
    await page.close();
    await context.close();
  }
}
