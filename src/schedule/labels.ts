import { normalizeWhitespace } from '../utils/text.js';

/** Token a line break inside a row header is rendered as. */
export const LABEL_SEPARATOR = ' | ';

export function splitCollectionLabels(text: string | undefined): string[] {
  const normalized = normalizeWhitespace(text ?? '');
  if (!normalized) {
    return [];
  }

  if (!normalized.includes(LABEL_SEPARATOR)) {
    return [normalized];
  }

  return normalized
    .split(LABEL_SEPARATOR)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
