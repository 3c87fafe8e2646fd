/**
 * Utility functions
 */

import { randomBytes } from 'crypto';

/**
 * Slugify a string
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '');
}

/**
 * Compact UTC stamp used for default session names: YYYYMMDD-HHMMSS
 */
export function formatCompactStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`;
}

/**
 * Generate a prefixed, time-ordered ID
 */
export function generateId(prefix: string, date: Date = new Date()): string {
  const timestamp = date.getTime().toString(36);
  const random = randomBytes(3).toString('hex');
  return `${prefix}_${timestamp}_${random}`;
}

/**
 * Clock used by stores; injectable for tests
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
