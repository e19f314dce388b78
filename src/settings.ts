/**
 * Comparison settings: defaults, validation and logging
 */

import { ConfigurationError } from './core/errors';
import type { ComparerSettings, ResolvedSettings } from './types';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;
export const DEFAULT_IMAGE_SIMILARITY_THRESHOLD = 0.95;
export const DEFAULT_DIMENSION_TOLERANCE = 0;

/**
 * Fill defaults and reject values outside their accepted range.
 *
 * @throws ConfigurationError naming the option and the rejected value
 */
export function normalizeSettings(settings: ComparerSettings = {}): ResolvedSettings {
  const resolved: ResolvedSettings = {
    similarityThreshold: settings.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD,
    imageSimilarityThreshold:
      settings.imageSimilarityThreshold ?? DEFAULT_IMAGE_SIMILARITY_THRESHOLD,
    dimensionTolerance: settings.dimensionTolerance ?? DEFAULT_DIMENSION_TOLERANCE,
    logCallback: settings.logCallback,
  };

  requireUnitInterval('similarityThreshold', resolved.similarityThreshold);
  requireUnitInterval('imageSimilarityThreshold', resolved.imageSimilarityThreshold);

  if (!Number.isFinite(resolved.dimensionTolerance) || resolved.dimensionTolerance < 0) {
    throw new ConfigurationError(
      `dimensionTolerance must be a non-negative number, got ${String(resolved.dimensionTolerance)}`,
      { location: 'dimensionTolerance' }
    );
  }

  if (resolved.logCallback !== undefined && typeof resolved.logCallback !== 'function') {
    throw new ConfigurationError('logCallback must be a function', { location: 'logCallback' });
  }

  return resolved;
}

function requireUnitInterval(option: string, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${option} must be a number in [0, 1], got ${String(value)}`, {
      location: option,
    });
  }
}

export function log(settings: { logCallback?: (message: string) => void }, message: string): void {
  if (settings.logCallback) {
    settings.logCallback(message);
  }
}
