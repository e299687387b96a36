/**
 * Strict yyyy-MM-dd handling. Only real calendar dates are accepted,
 * so 2025-02-30 and 2025-13-40 are rejected.
 */

import type { IsoDate } from '../types/task.js';

/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** Format a Date as yyyy-MM-dd in local time */
export function formatDate(d: Date): IsoDate {
  const y = String(d.getFullYear()).padStart(4, '0');
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

export function isIsoDate(input: string): boolean {
  if (!ISO_DATE_RE.test(input)) return false;

  const d = new Date(input + 'T00:00:00');
  if (isNaN(d.getTime())) return false;

  // Round-trip rejects dates the Date constructor rolls over
  return formatDate(d) === input;
}

