import type { LogLevel } from './logger.js';

/** Loader-wide settings shared by the decoders and object models. */
export interface TmxConfig {
  /** Segment count of the polygon that approximates an ellipse. */
  readonly ellipseSegments: number;
  /** Minimum level for the default console logger. */
  readonly logLevel: LogLevel;
  /** Subtract object height from tile-object anchors (bottom-left origin). */
  readonly invertY: boolean;
}

export const DEFAULT_CONFIG: TmxConfig = {
  ellipseSegments: 16,
  logLevel: 'warn',
  invertY: false,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Fill unspecified settings from DEFAULT_CONFIG.
 *
 * Throw a RangeError for a segment count that is not a non-negative
 * integer or an unknown log level.
 */
export function resolveConfig(partial: Partial<TmxConfig> = {}): TmxConfig {
  const ellipseSegments = partial.ellipseSegments ?? DEFAULT_CONFIG.ellipseSegments;
  if (!Number.isInteger(ellipseSegments) || ellipseSegments < 0) {
    throw new RangeError(
      `ellipseSegments must be a non-negative integer, got ${ellipseSegments}`,
    );
  }

  const logLevel = partial.logLevel ?? DEFAULT_CONFIG.logLevel;
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new RangeError(`Unknown log level "${logLevel}"`);
  }

  return {
    ellipseSegments,
    logLevel,
    invertY: partial.invertY ?? DEFAULT_CONFIG.invertY,
  };
}
