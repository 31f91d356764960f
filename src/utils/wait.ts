export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function randomDelayMs(minMs: number, maxMs: number, random: () => number = Math.random): number {
  if (maxMs < minMs) {
    throw new Error('maxMs must be >= minMs');
  }
  return Math.round(minMs + random() * (maxMs - minMs));
}

/** Human-paced pause between form interactions. */
export function randomWait(minMs = 500, maxMs = 2000): Promise<void> {
  return sleep(randomDelayMs(minMs, maxMs));
}
