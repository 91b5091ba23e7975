/**
 * Terminal formatting helpers: clocks, hours, progress bars, plain tables.
 */

/**
 * Seconds as a countdown clock
 *
 * @example
 * formatClock(65)   // => "01:05"
 * formatClock(3725) // => "1:02:05"
 */
export function formatClock(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;
  const mmss = `${String(minutes).padStart(2, '0')}:${String(rest).padStart(2, '0')}`;
  return hours > 0 ? `${hours}:${mmss}` : mmss;
}

/**
 * Round to `digits` decimals, ties to even, judged on the exact binary value
 *
 * toFixed() already rounds on the exact value but sends ties away from
 * zero, so only exact ties are handled here.
 *
 * @example
 * round(0.625)  // => 0.62 (exact tie)
 * round(0.375)  // => 0.38 (exact tie)
 * round(2.675)  // => 2.67 (stored as 2.67499...)
 */
export function round(value: number, digits = 2): number {
  const nearest = Number(value.toFixed(digits));
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return nearest;

  const exact = Math.abs(value).toFixed(100);
  const cut = exact.indexOf('.') + 1 + digits;
  if (!/^50*$/.test(exact.slice(cut))) return nearest;

  const kept = exact.slice(0, cut).replace(/\.$/, '');
  if (Number(kept.charAt(kept.length - 1)) % 2 === 1) return nearest;
  return Math.sign(value) * Number(kept);
}

export function toHours(seconds: number): number {
  return round(seconds / 3600);
}

/**
 * Human duration from seconds
 *
 * @example
 * formatDuration(5400) // => "1h 30m"
 * formatDuration(300)  // => "5m"
 */
export function formatDuration(seconds: number | null): string {
  if (seconds === null) return '-';
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  return hours > 0 ? `${hours}h ${minutes % 60}m` : `${minutes}m`;
}

export function progressBar(percent: number, width = 30): string {
  const clamped = Math.min(100, Math.max(0, percent));
  const filled = Math.round((clamped / 100) * width);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${clamped.toFixed(1)}%`;
}

export function stars(rating: number | null): string {
  return rating ? '⭐'.repeat(rating) : '-';
}

/**
 * Column-aligned table with a header rule
 *
 * @example
 * renderTable(['ID', 'Name'], [[1, 'Thesis']])
 * // => "ID  Name\n--  ------\n1   Thesis"
 */
export function renderTable(headers: string[], rows: Array<Array<string | number | null>>): string {
  const cells = rows.map((row) => row.map((cell) => (cell === null ? '-' : String(cell))));
  const widths = headers.map((header, i) => Math.max(header.length, ...cells.map((row) => (row[i] ?? '').length)));

  const line = (values: string[]) =>
    values
      .map((value, i) => value.padEnd(widths[i] ?? value.length))
      .join('  ')
      .trimEnd();

  return [
    line(headers),
    widths.map((w) => '-'.repeat(w)).join('  '),
    ...cells.map(line),
  ].join('\n');
}
