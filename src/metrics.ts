/**
 * Calculates a rounded integer percentage.
 * @param part - The numerator value
 * @param total - The denominator value
 * @returns Rounded percentage (0–100). Returns 0 when total is 0.
 */
export function percent(part: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((part / total) * 100);
}

/**
 * Formats a duration in milliseconds into a human-readable string.
 * @param ms - Duration in milliseconds
 * @returns Formatted string (e.g. '500ms', '5s', '2m 30s', '3h 5m', '2d 4h')
 */
export function formatDuration(ms: number): string {
  const sign = ms < 0 ? "-" : "";
  const abs = Math.abs(ms);
  if (abs < 1000) return `${sign}${abs}ms`;
  const totalSeconds = Math.floor(abs / 1000);
  const totalMinutes = Math.floor(totalSeconds / 60);
  const totalHours = Math.floor(totalMinutes / 60);
  const days = Math.floor(totalHours / 24);

  if (days > 0) {
    const hours = totalHours % 24;
    return hours === 0 ? `${sign}${days}d` : `${sign}${days}d ${hours}h`;
  }
  if (totalHours > 0) {
    const minutes = totalMinutes % 60;
    return minutes === 0 ? `${sign}${totalHours}h` : `${sign}${totalHours}h ${minutes}m`;
  }
  const seconds = totalSeconds % 60;
  if (totalMinutes === 0) return `${sign}${seconds}s`;
  if (seconds === 0) return `${sign}${totalMinutes}m`;
  return `${sign}${totalMinutes}m ${seconds}s`;
}

export interface StandardDeviationOptions {
  /** Population (divide by n) rather than sample (divide by n - 1). Default true. */
  population?: boolean;
}

/**
 * Standard deviation of a list of values.
 * Returns 0 for an empty list, and for a single value in sample mode.
 */
export function standardDeviation(
  values: readonly number[],
  options: StandardDeviationOptions = {},
): number {
  const { population = true } = options;
  const n = values.length;
  if (n === 0) return 0;

  const mean = values.reduce((sum, v) => sum + v, 0) / n;
  const ssd = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);

  let variance: number;
  if (population) {
    variance = ssd / n;
  } else if (n > 1) {
    variance = ssd / (n - 1);
  } else {
    variance = 0;
  }
  return Math.sqrt(variance);
}

/** Copy of `record` without the keys whose value is null or undefined. */
export function removeNullFields<T>(
  record: Readonly<Record<string, T | null | undefined>>,
): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== null && value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
