/**
 * SIFU ENGINE — Global Assumptions & shared validation
 *
 * Assumptions are an explicit value handed to every calculation.
 * Only ti / mttr / beta / betaD are recognized; anything else is dropped.
 */

import { SilValidationError } from './sifu.errors.js';
import type {
  Assumptions,
  DemandMode,
  LaneRatio,
  LaneRatioTable,
  MetricKey,
} from './sifu.types.js';

// ═══════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_ASSUMPTIONS: Readonly<Assumptions> = Object.freeze({
  ti: 8760,
  mttr: 8,
  beta: 0.1,
  betaD: 0.02,
});

export const DEFAULT_LANE_RATIO: Readonly<LaneRatio> = Object.freeze({ rDU: 0.6, rDD: 0.4 });

export const DEFAULT_LANE_RATIOS: Readonly<LaneRatioTable> = Object.freeze({
  sensor: DEFAULT_LANE_RATIO,
  logic: DEFAULT_LANE_RATIO,
  output: DEFAULT_LANE_RATIO,
});

export const RATIO_TOLERANCE = 1e-9;

// ═══════════════════════════════════════════════════════════════
// DEMAND MODE HELPERS
// ═══════════════════════════════════════════════════════════════

export function isHighDemand(mode: DemandMode): boolean {
  return mode === 'high' || mode === 'continuous';
}

export function metricFor(mode: DemandMode): MetricKey {
  return isHighDemand(mode) ? 'pfh' : 'pfdAvg';
}

// ═══════════════════════════════════════════════════════════════
// VALIDATION PRIMITIVES
// ═══════════════════════════════════════════════════════════════

export function requireNonNegative(value: number, field: string, componentId?: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new SilValidationError(
      'InvalidParameter',
      `${field} must be a finite, non-negative number (got ${value})`,
      componentId
    );
  }
  return value;
}

export function requireBeta(value: number, field: string, componentId?: string): number {
  if (!Number.isFinite(value)) {
    throw new SilValidationError('InvalidParameter', `${field} must be finite (got ${value})`, componentId);
  }
  if (value < 0 || value > 1) {
    throw new SilValidationError('InvalidBeta', `${field} must lie in [0, 1] (got ${value})`, componentId);
  }
  return value;
}

export function requireRatio(ratio: LaneRatio, componentId?: string): LaneRatio {
  const rDU = requireNonNegative(ratio.rDU, 'rDU', componentId);
  const rDD = requireNonNegative(ratio.rDD, 'rDD', componentId);
  if (Math.abs(rDU + rDD - 1) > RATIO_TOLERANCE) {
    throw new SilValidationError(
      'InvalidRatio',
      `rDU + rDD must equal 1 (got ${rDU} + ${rDD} = ${rDU + rDD})`,
      componentId
    );
  }
  return { rDU, rDD };
}

// ═══════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════

/**
 * Build a complete, validated Assumptions value from partial input.
 * Unknown keys are ignored; missing keys take the documented defaults.
 */
export function resolveAssumptions(
  input: Partial<Assumptions> = {},
  defaults: Assumptions = DEFAULT_ASSUMPTIONS
): Assumptions {
  return {
    ti: requireNonNegative(input.ti ?? defaults.ti, 'ti'),
    mttr: requireNonNegative(input.mttr ?? defaults.mttr, 'mttr'),
    beta: requireBeta(input.beta ?? defaults.beta, 'beta'),
    betaD: requireBeta(input.betaD ?? defaults.betaD, 'betaD'),
  };
}
