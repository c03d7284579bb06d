/**
 * Range Trimmer - Configuration Type Definitions
 */

/** Trimmer configuration, all fields optional */
export interface TrimmerConfig {
  /** Handle width in pixels */
  handleWidth?: number;
  /** Minimum selectable duration in seconds */
  minDuration?: number;
  /** Animated seek duration in seconds */
  positionBarAnimationDuration?: number;
  /** Maximum selectable duration in seconds (Infinity for no cap) */
  maxDuration?: number;
}

/** Configuration with defaults applied */
export type ResolvedTrimmerConfig = Required<TrimmerConfig>;
