import { describe, expect, it } from 'vitest';
import { formatClock, formatDuration, progressBar, renderTable, round, toHours } from './format.js';

describe('format', () => {
  it('formats countdown clocks', () => {
    expect(formatClock(0)).toBe('00:00');
    expect(formatClock(65)).toBe('01:05');
    expect(formatClock(1500)).toBe('25:00');
    expect(formatClock(3725)).toBe('1:02:05');
  });

  it('rounds exact ties to even', () => {
    expect(round(0.625)).toBe(0.62);
    expect(round(0.375)).toBe(0.38);
    expect(round(-0.625)).toBe(-0.62);
    expect(round(0.125)).toBe(0.12);
    expect(round(2.5, 0)).toBe(2);
    expect(round(3.5, 0)).toBe(4);
    expect(round(41.25, 1)).toBe(41.2);
  });

  it('rounds other values to the nearest', () => {
    expect(round(2.494)).toBe(2.49);
    expect(round(2.675)).toBe(2.67); // stored just below the tie
    expect(round(1.005)).toBe(1); // stored just below the tie
    expect(round(125 / 3, 1)).toBe(41.7);
    expect(round(7)).toBe(7);
  });

  it('converts seconds to hours with two decimals', () => {
    expect(toHours(5400)).toBe(1.5);
    expect(toHours(1000)).toBe(0.28);
  });

  it('formats durations', () => {
    expect(formatDuration(5400)).toBe('1h 30m');
    expect(formatDuration(300)).toBe('5m');
    expect(formatDuration(null)).toBe('-');
  });

  it('draws a progress bar', () => {
    expect(progressBar(50, 10)).toBe('[█████░░░░░] 50.0%');
    expect(progressBar(150, 4)).toBe('[████] 100.0%');
  });

  it('aligns table columns', () => {
    expect(renderTable(['ID', 'Name'], [[1, 'Thesis'], [12, null]])).toBe(
      ['ID  Name', '--  ------', '1   Thesis', '12  -'].join('\n'),
    );
  });
});
