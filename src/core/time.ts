/**
 * Time utilities for consistent date handling
 */

import { format } from 'date-fns';

export function formatTimestamp(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}

export function secondsToMilliseconds(seconds: number): number {
  return Math.round(seconds * 1000);
}

/** Largest delay setTimeout honours; longer ones fire after ~1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function isSchedulableDelaySeconds(seconds: number): boolean {
  return Number.isFinite(seconds) && seconds >= 0 && secondsToMilliseconds(seconds) <= MAX_TIMER_DELAY_MS;
}
