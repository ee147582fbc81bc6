/**
 * SIFU ENGINE — Channel Reliability Calculator
 *
 * Closed-form PFDavg / PFH for a single channel (1oo1) and for a
 * redundant pair (1oo2, beta model).
 */

import { isHighDemand, requireNonNegative, requireRatio } from './sifu.assumptions.js';
import { resolveChannelParameters } from './sifu.conversions.js';
import { SilValidationError } from './sifu.errors.js';
import type {
  Assumptions,
  ChannelMetrics,
  ChannelParameters,
  ComponentRecord,
  DemandMode,
  EvaluationOptions,
  PairMetrics,
} from './sifu.types.js';

// ═══════════════════════════════════════════════════════════════
// FORMULAS
// ═══════════════════════════════════════════════════════════════

export function oneOutOfOne(p: ChannelParameters): ChannelMetrics {
  return {
    pfdAvg: p.lambdaDU * (p.ti / 2 + p.mttr) + p.lambdaDD * p.mttr,
    pfh: p.lambdaDU,
  };
}

/**
 * 1oo2 beta model for a symmetric pair described by one parameter set.
 * λDind = 0 means every failure is common cause: exposure times are 0.
 */
export function oneOutOfTwo(p: ChannelParameters): Omit<PairMetrics, 'asymmetric'> {
  const { lambdaDU, lambdaDD, ti, mttr, beta, betaD } = p;
  const lambdaD = lambdaDU + lambdaDD;

  const lambdaDUind = (1 - beta) * lambdaDU;
  const lambdaDDind = (1 - betaD) * lambdaDD;
  const lambdaDind = lambdaDUind + lambdaDDind;

  let tCE = 0;
  let tGE = 0;
  if (lambdaDind > 0) {
    const wDU = lambdaDUind / lambdaDind;
    const wDD = lambdaDDind / lambdaDind;
    tCE = wDU * (ti / 2 + mttr) + wDD * mttr;
    tGE = wDU * (ti / 3 + mttr) + wDD * mttr;
  }

  const pfdAvg =
    2 * (1 - beta) ** 2 * lambdaD ** 2 * tCE * tGE +
    beta * lambdaDU * (ti / 2 + mttr) +
    betaD * lambdaDD * mttr;

  const pfh = 2 * (1 - beta) * lambdaDind * lambdaDUind * tCE + beta * lambdaDU;

  return { pfdAvg, pfh, tCE, tGE };
}

// ═══════════════════════════════════════════════════════════════
// COMPONENT-LEVEL ENTRY POINTS
// ═══════════════════════════════════════════════════════════════

/**
 * A component without a declared mode applies to any SIFU. A declared mode
 * must agree with the SIFU's (high and continuous agree with each other).
 */
export function requireModeApplicable(component: ComponentRecord, mode: DemandMode): void {
  if (component.demandMode && isHighDemand(component.demandMode) !== isHighDemand(mode)) {
    throw new SilValidationError(
      'ModeMismatch',
      `declared for ${component.demandMode} demand, SIFU runs in ${mode} demand`,
      component.id
    );
  }
}

function hasRawParameters(c: ComponentRecord): boolean {
  return c.lambdaDU !== undefined || c.lambdaDD !== undefined || c.lambdaD !== undefined;
}

export function singleChannel(
  component: ComponentRecord,
  assumptions: Assumptions,
  options: EvaluationOptions
): ChannelMetrics {
  requireModeApplicable(component, options.demandMode);

  if (!hasRawParameters(component) && component.pfdAvg !== undefined && component.pfh !== undefined) {
    const { id, rDU, rDD } = component;
    if (rDU !== undefined && rDD !== undefined) requireRatio({ rDU, rDD }, id);
    return {
      pfdAvg: requireNonNegative(component.pfdAvg, 'pfdAvg', id),
      pfh: requireNonNegative(component.pfh, 'pfh', id),
    };
  }

  return oneOutOfOne(resolveChannelParameters(component, assumptions, options));
}

function mean(a: number, b: number): number {
  return a === b ? a : (a + b) / 2;
}

/**
 * Channels with different parameters are combined by arithmetic mean and
 * the result is marked asymmetric.
 */
export function combineChannels(pa: ChannelParameters, pb: ChannelParameters): {
  params: ChannelParameters;
  asymmetric: boolean;
} {
  const keys = ['lambdaDU', 'lambdaDD', 'ti', 'mttr', 'beta', 'betaD'] as const;
  const asymmetric = keys.some((k) => pa[k] !== pb[k]);

  const lambdaDU = mean(pa.lambdaDU, pb.lambdaDU);
  const lambdaDD = mean(pa.lambdaDD, pb.lambdaDD);

  return {
    asymmetric,
    params: {
      lambdaDU,
      lambdaDD,
      lambdaD: lambdaDU + lambdaDD,
      source: pa.source === pb.source ? pa.source : 'native',
      ti: mean(pa.ti, pb.ti),
      mttr: mean(pa.mttr, pb.mttr),
      beta: mean(pa.beta, pb.beta),
      betaD: mean(pa.betaD, pb.betaD),
    },
  };
}

export function redundantPair(
  a: ComponentRecord,
  b: ComponentRecord,
  assumptions: Assumptions,
  options: EvaluationOptions
): PairMetrics {
  if (a.demandMode && b.demandMode && isHighDemand(a.demandMode) !== isHighDemand(b.demandMode)) {
    throw new SilValidationError(
      'ModeMismatch',
      `paired with ${b.id}: demand modes differ (${a.demandMode} vs ${b.demandMode})`,
      a.id
    );
  }
  requireModeApplicable(a, options.demandMode);
  requireModeApplicable(b, options.demandMode);

  const pa = resolveChannelParameters(a, assumptions, options);
  const pb = resolveChannelParameters(b, assumptions, options);
  const { params, asymmetric } = combineChannels(pa, pb);

  return { ...oneOutOfTwo(params), asymmetric };
}
