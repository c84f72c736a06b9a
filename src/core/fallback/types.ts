/**
 * Fallback model type definitions
 */

/**
 * Single-constituent sinusoid parameters
 */
export interface FallbackModelConfig {
  /** Mean level above chart datum (ft) */
  meanLevelFt: number;

  /** Half the high-to-low range (ft) */
  amplitudeFt: number;

  /** Period of the semidiurnal constituent (hours) */
  periodHours: number;

  /** Moon transit to local high water interval (hours) */
  lunitidalOffsetHours: number;
}
