/**
 * Elapsed time as hh:mm:ss, with days prefixed when the run took that long
 */
export function formatElapsed(ms: number | null): string {
  if (ms === null) return '';

  const totalSeconds = Math.floor(ms / 1000);
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const pad = (n: number) => String(n).padStart(2, '0');
  const clock = `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
  return days > 0 ? `${days}.${clock}` : clock;
}

export function bytesToMb(bytes: number): number {
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}

export function randomDatabaseName(random: () => number = Math.random): string {
  return `random-${Math.floor(random() * 2147483647)}`;
}
