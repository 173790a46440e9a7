const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Format a date as `yyyy-mm-dd` in local time
 */
export function formatLocalDate(date: Date): string {
  const year = date.getFullYear().toString().padStart(4, '0');
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a relative or absolute day given on the command line.
 *
 * Accepts `t`/`today`, `y`/`yester`/`yesterday`, `yy` (two days ago),
 * `<N>d`/`<N> days`, `<N>w`/`<N> weeks` (N defaults to 1) and
 * `yyyy-mm-dd` with or without dashes.
 *
 * @returns the day as `yyyy-mm-dd`
 */
export function parseDateArg(value: string, now: Date = new Date()): string {
  const input = value.trim().toLowerCase();
  const daysAgo = (days: number) => formatLocalDate(new Date(now.getTime() - days * DAY_MS));

  if (/^(t|today)$/.test(input)) return daysAgo(0);
  if (/^(y|yester|yesterday)$/.test(input)) return daysAgo(1);
  if (input === 'yy') return daysAgo(2);

  const relative = input.match(/^([0-9]+)?\s?(d|day|days|w|week|weeks)$/);
  if (relative) {
    const count = Number.parseInt(relative[1] ?? '1', 10);
    const unit = relative[2] ?? 'd';
    return daysAgo(unit.startsWith('w') ? count * 7 : count);
  }

  const absolute = input.match(/^([0-9]{4})-?([0-9]{2})-?([0-9]{2})$/);
  if (absolute) {
    const [, year = '', month = '', day = ''] = absolute;
    const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    if (parsed.getUTCMonth() !== Number(month) - 1 || parsed.getUTCDate() !== Number(day)) {
      throw new Error(`Invalid date: "${value}"`);
    }
    return `${year}-${month}-${day}`;
  }

  throw new Error(`Invalid date: "${value}". Expected yyyy-mm-dd, today, yesterday, <N>d or <N>w`);
}

/**
 * Format duration in human-readable format
 *
 * @param ms - Duration in milliseconds
 * @returns Formatted duration string
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days}d ${hours % 24}h`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Sleep for specified milliseconds. Resolves early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
