/**
 * Range Trimmer - Centralized Constants
 * All configuration values in one place for easy maintenance.
 */

/** Time conversion constants */
export const TIME = {
  /** Microseconds per second */
  US_PER_SECOND: 1_000_000,
  /** Microseconds per millisecond */
  US_PER_MS: 1_000,
} as const;

/** Trimmer defaults, used when a config field is missing or invalid */
export const TRIMMER = {
  /** Width of a trim or mark handle in pixels */
  HANDLE_WIDTH: 15,
  /** Minimum selectable duration in seconds */
  MIN_DURATION_SECONDS: 3,
  /** Duration of the animated position bar seek in seconds */
  POSITION_BAR_ANIMATION_SECONDS: 0.1,
  /** No cap on the selected duration */
  MAX_DURATION_SECONDS: Number.POSITIVE_INFINITY,
} as const;

/** Animation scheduling constants */
export const ANIMATION = {
  /** Frame interval used when requestAnimationFrame is unavailable (ms) */
  FALLBACK_FRAME_MS: 16,
} as const;
