/**
 * SIFU ENGINE — Rate conversions
 *
 * Turns a Component Record into λDU / λDD plus the per-channel
 * TI / MTTR / β / βD it should be evaluated with.
 *
 * Precedence for the rates:
 *   1. λDU + λDD (native)
 *   2. λD split by rDU / rDD
 *   3. precomputed PFH (high demand) or PFDavg (low demand), split by ratios
 */

import {
  isHighDemand,
  requireBeta,
  requireNonNegative,
  requireRatio,
} from './sifu.assumptions.js';
import { SilValidationError } from './sifu.errors.js';
import type {
  Assumptions,
  ChannelParameters,
  ComponentRecord,
  EvaluationOptions,
  LaneRatio,
  LaneRatioTable,
  ResolvedRates,
} from './sifu.types.js';

export const FIT_PER_HOUR = 1e-9;

export function fitToPerHour(fit: number): number {
  return fit * FIT_PER_HOUR;
}

export function perHourToFit(rate: number): number {
  return rate / FIT_PER_HOUR;
}

// ═══════════════════════════════════════════════════════════════
// RATIOS
// ═══════════════════════════════════════════════════════════════

/**
 * Ratios declared on the component itself. A single ratio implies its
 * complement. Returns null when the component declares none.
 */
function declaredRatio(component: ComponentRecord): LaneRatio | null {
  const { rDU, rDD, id } = component;

  if (rDU !== undefined && rDD !== undefined) {
    return requireRatio({ rDU, rDD }, id);
  }
  if (rDU !== undefined) {
    requireNonNegative(rDU, 'rDU', id);
    if (rDU > 1) throw new SilValidationError('InvalidRatio', `rDU must not exceed 1 (got ${rDU})`, id);
    return { rDU, rDD: 1 - rDU };
  }
  if (rDD !== undefined) {
    requireNonNegative(rDD, 'rDD', id);
    if (rDD > 1) throw new SilValidationError('InvalidRatio', `rDD must not exceed 1 (got ${rDD})`, id);
    return { rDU: 1 - rDD, rDD };
  }
  return null;
}

function splitTotal(
  component: ComponentRecord,
  lambdaD: number,
  laneRatios: LaneRatioTable | undefined,
  ratio: LaneRatio | null
): { lambdaDU: number; lambdaDD: number } {
  const applied = ratio ?? (laneRatios ? requireRatio(laneRatios[component.lane], component.id) : null);
  if (!applied) {
    throw new SilValidationError(
      'MissingRate',
      'a total rate needs rDU/rDD (on the component or as a lane default) to be split',
      component.id
    );
  }
  return { lambdaDU: lambdaD * applied.rDU, lambdaDD: lambdaD * applied.rDD };
}

// ═══════════════════════════════════════════════════════════════
// RATE RESOLUTION
// ═══════════════════════════════════════════════════════════════

export function resolveRates(
  component: ComponentRecord,
  ti: number,
  options: EvaluationOptions
): ResolvedRates {
  const { id } = component;
  const ratio = declaredRatio(component);

  if (component.lambdaDU !== undefined || component.lambdaDD !== undefined) {
    if (component.lambdaDU === undefined || component.lambdaDD === undefined) {
      throw new SilValidationError('MissingRate', 'both lambdaDU and lambdaDD must be provided', id);
    }
    const lambdaDU = requireNonNegative(component.lambdaDU, 'lambdaDU', id);
    const lambdaDD = requireNonNegative(component.lambdaDD, 'lambdaDD', id);
    return { lambdaDU, lambdaDD, lambdaD: lambdaDU + lambdaDD, source: 'native' };
  }

  if (component.lambdaD !== undefined) {
    const lambdaD = requireNonNegative(component.lambdaD, 'lambdaD', id);
    const split = splitTotal(component, lambdaD, options.laneRatios, ratio);
    return { ...split, lambdaD, source: 'ratio' };
  }

  if (isHighDemand(options.demandMode)) {
    if (component.pfh === undefined) {
      throw new SilValidationError('MissingRate', 'PFH or failure rates required in high demand mode', id);
    }
    const lambdaD = requireNonNegative(component.pfh, 'pfh', id);
    const split = splitTotal(component, lambdaD, options.laneRatios, ratio);
    return { ...split, lambdaD, source: 'derived_from_pfh' };
  }

  if (component.pfdAvg === undefined) {
    throw new SilValidationError('MissingRate', 'PFDavg or failure rates required in low demand mode', id);
  }
  const pfd = requireNonNegative(component.pfdAvg, 'pfdAvg', id);
  if (ti <= 0) {
    throw new SilValidationError('InvalidParameter', 'ti must be greater than zero to derive a rate from PFDavg', id);
  }
  const lambdaD = (2 * pfd) / ti;
  const split = splitTotal(component, lambdaD, options.laneRatios, ratio);
  return { ...split, lambdaD, source: 'derived_from_pfd' };
}

/**
 * Component values with Global Assumption fallbacks applied, validated,
 * and the rates resolved.
 */
export function resolveChannelParameters(
  component: ComponentRecord,
  assumptions: Assumptions,
  options: EvaluationOptions
): ChannelParameters {
  const { id } = component;
  const ti = requireNonNegative(component.ti ?? assumptions.ti, 'ti', id);
  const mttr = requireNonNegative(component.mttr ?? assumptions.mttr, 'mttr', id);
  const beta = requireBeta(component.beta ?? assumptions.beta, 'beta', id);
  const betaD = requireBeta(component.betaD ?? assumptions.betaD, 'betaD', id);

  return { ...resolveRates(component, ti, options), ti, mttr, beta, betaD };
}
