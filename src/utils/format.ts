import { ValidationError, type ValidationIssue } from './errors.js';
import type { TimeWindow } from '../modules/records/types.js';

const BAR_WIDTH = 10;

/**
 * Parse a CLI window. Dates may be bare days ("2024-01-01", read as UTC
 * midnight) or full ISO timestamps. The end is exclusive.
 */
export function parseWindow(from: string, to: string): TimeWindow {
  const start = new Date(from);
  const end = new Date(to);
  const issues: ValidationIssue[] = [];
  if (Number.isNaN(start.getTime())) issues.push({ path: 'from', message: `Invalid date "${from}"` });
  if (Number.isNaN(end.getTime())) issues.push({ path: 'to', message: `Invalid date "${to}"` });
  if (issues.length === 0 && end.getTime() <= start.getTime()) {
    issues.push({ path: 'to', message: 'Window end must be after its start' });
  }
  if (issues.length > 0) throw new ValidationError('Invalid window', issues);
  return { start, end };
}

/** "2024-01-01 → 2024-07-01" for day-aligned windows, full ISO otherwise. */
export function formatWindow(window: TimeWindow): string {
  const fmt = (d: Date): string => {
    const iso = d.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
  };
  return `${fmt(window.start)} → ${fmt(window.end)}`;
}

/** Fixed-width signed score: "+0.412", "-0.050", " 0.000". */
export function formatSigned(value: number, digits = 3): string {
  const rounded = Number(value.toFixed(digits));
  if (rounded === 0) return ` ${(0).toFixed(digits)}`;
  return `${rounded > 0 ? '+' : ''}${rounded.toFixed(digits)}`;
}

/** Text bar for a [0, 1] confidence: "███████░░░". */
export function confidenceBar(confidence: number): string {
  const filled = Math.round(Math.max(0, Math.min(1, confidence)) * BAR_WIDTH);
  return '█'.repeat(filled) + '░'.repeat(BAR_WIDTH - filled);
}

export function padRight(text: string, width: number): string {
  return text.length >= width ? text.slice(0, width) : text + ' '.repeat(width - text.length);
}
