export const MAX_BACKOFF_MS = 30_000;

export function calculateBackoffMs(retryCount: number): number {
  const base = 1000;
  const factor = 2 ** Math.max(0, retryCount - 1);
  return Math.min(base * factor, MAX_BACKOFF_MS);
}
