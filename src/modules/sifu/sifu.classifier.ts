/**
 * SIFU ENGINE — SIL Classifier
 *
 * Bands are [lower, upper). At or above the SIL1 upper bound the result is
 * OUT_OF_RANGE; below the SIL4 lower bound it is reported as SIL4 with
 * betterThanSil4 set.
 */

import { isHighDemand, metricFor } from './sifu.assumptions.js';
import type {
  DemandMode,
  RequirementCheck,
  SilBand,
  SilClassification,
  SilRange,
} from './sifu.types.js';

// ═══════════════════════════════════════════════════════════════
// BAND TABLES
// ═══════════════════════════════════════════════════════════════

export const PFD_RANGES: readonly SilRange[] = [
  { band: 'SIL4', lower: 1e-5, upper: 1e-4 },
  { band: 'SIL3', lower: 1e-4, upper: 1e-3 },
  { band: 'SIL2', lower: 1e-3, upper: 1e-2 },
  { band: 'SIL1', lower: 1e-2, upper: 1e-1 },
];

export const PFH_RANGES: readonly SilRange[] = [
  { band: 'SIL4', lower: 1e-9, upper: 1e-8 },
  { band: 'SIL3', lower: 1e-8, upper: 1e-7 },
  { band: 'SIL2', lower: 1e-7, upper: 1e-6 },
  { band: 'SIL1', lower: 1e-6, upper: 1e-5 },
];

export function rangesFor(mode: DemandMode): readonly SilRange[] {
  return isHighDemand(mode) ? PFH_RANGES : PFD_RANGES;
}

// ═══════════════════════════════════════════════════════════════
// CLASSIFY
// ═══════════════════════════════════════════════════════════════

export function classifyDetailed(total: number, mode: DemandMode): SilClassification {
  const metric = metricFor(mode);
  const ranges = rangesFor(mode);
  const base = { metric, value: total, betterThanSil4: false };

  if (!Number.isFinite(total) || total < 0) {
    return { ...base, band: 'NONE', rank: 0 };
  }
  if (total < ranges[0].lower) {
    return { ...base, band: 'SIL4', rank: 4, betterThanSil4: true };
  }
  for (const range of ranges) {
    if (total >= range.lower && total < range.upper) {
      return { ...base, band: range.band, rank: silRank(range.band) };
    }
  }
  return { ...base, band: 'OUT_OF_RANGE', rank: 0 };
}

export function classify(total: number, mode: DemandMode): SilBand {
  return classifyDetailed(total, mode).band;
}

// ═══════════════════════════════════════════════════════════════
// RANKS & REQUIREMENTS
// ═══════════════════════════════════════════════════════════════

export function silRank(band: SilBand): number {
  switch (band) {
    case 'SIL1': return 1;
    case 'SIL2': return 2;
    case 'SIL3': return 3;
    case 'SIL4': return 4;
    default: return 0;
  }
}

/**
 * Accepts 3, "3", "SIL 3", "sil3". Anything outside 1..4 yields 0.
 */
export function normalizeRequiredSil(value: number | string | null | undefined): number {
  if (typeof value === 'number') {
    const n = Math.trunc(value);
    return n >= 1 && n <= 4 ? n : 0;
  }
  if (typeof value === 'string') {
    const m = value.trim().match(/^(?:sil\s*)?([1-4])$/i);
    return m ? Number(m[1]) : 0;
  }
  return 0;
}

export function formatSil(rank: number): string {
  return rank >= 1 && rank <= 4 ? `SIL ${rank}` : 'n.a.';
}

export function meetsRequirement(band: SilBand, required: number | string | null | undefined): RequirementCheck {
  const req = normalizeRequiredSil(required);
  const achieved = silRank(band);
  return { required: req, achieved, ok: achieved > 0 && achieved >= req };
}
