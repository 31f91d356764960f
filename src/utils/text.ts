export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function stripWrappingQuotes(value: string): string {
  const trimmed = value.trim();
  return trimmed.replace(/^["']+|["']+$/g, '').trim();
}

export function pluralize(count: number, unit: string): string {
  return count === 1 ? `1 ${unit}` : `${count} ${unit}s`;
}
