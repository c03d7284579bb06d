/**
 * Range Trimmer - Time Utilities
 * Conversions between seconds and microseconds, and label formatting.
 */

import { TIME } from '../constants';

/**
 * Convert seconds to microseconds
 */
export function secondsToUs(seconds: number): number {
  return Math.round(seconds * TIME.US_PER_SECOND);
}

/**
 * Convert microseconds to seconds
 */
export function usToSeconds(us: number): number {
  return us / TIME.US_PER_SECOND;
}

/**
 * Format microseconds as timecode string (HH:MM:SS.mmm)
 */
export function formatTimecode(us: number): string {
  const totalSeconds = usToSeconds(us);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = Math.floor(totalSeconds % 60);
  const milliseconds = Math.floor((us % TIME.US_PER_SECOND) / TIME.US_PER_MS);

  if (hours > 0) {
    return `${hours}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}.${milliseconds.toString().padStart(3, '0')}`;
  }
  return `${minutes}:${seconds.toString().padStart(2, '0')}.${milliseconds.toString().padStart(3, '0')}`;
}

/**
 * Format a time in seconds as a timecode label
 */
export function formatSeconds(seconds: number): string {
  return formatTimecode(secondsToUs(seconds));
}

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Linear interpolation between two values, t in [0, 1]
 */
export function lerp(from: number, to: number, t: number): number {
  return from + (to - from) * clamp(t, 0, 1);
}
