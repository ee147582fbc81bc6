/**
 * SIFU ENGINE — Self-test
 *
 * Boundary and edge-case checks over the classifier, calculator,
 * partitioner and aggregator. Runs without I/O; the CLI prints the report.
 */

import { DEFAULT_ASSUMPTIONS } from './sifu.assumptions.js';
import { aggregate } from './sifu.aggregator.js';
import { oneOutOfTwo, redundantPair, singleChannel } from './sifu.calculator.js';
import { classify, PFD_RANGES, PFH_RANGES } from './sifu.classifier.js';
import { isSilValidationError, type SilErrorKind } from './sifu.errors.js';
import { assertCountedOnce, partition } from './sifu.partitioner.js';
import { randomSifu } from './sifu.sampling.js';
import type {
  Assumptions,
  ComponentRecord,
  DemandMode,
  SilBand,
  SilRange,
} from './sifu.types.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface SelfTestCheck {
  group: 'classifier' | 'calculator' | 'partitioner' | 'aggregator';
  name: string;
  passed: boolean;
  detail?: string;
}

export interface SelfTestReport {
  ok: boolean;
  passed: number;
  failed: number;
  checks: SelfTestCheck[];
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

const REL_TOLERANCE = 1e-12;

export function closeTo(actual: number, expected: number, tol = REL_TOLERANCE): boolean {
  if (actual === expected) return true;
  return Math.abs(actual - expected) <= tol * Math.max(Math.abs(actual), Math.abs(expected));
}

/** A value just below `x` in the same decade. */
export function justBelow(x: number): number {
  return x * (1 - 1e-9);
}

type Assertion = () => true | string;

function run(group: SelfTestCheck['group'], name: string, assertion: Assertion): SelfTestCheck {
  try {
    const outcome = assertion();
    return outcome === true ? { group, name, passed: true } : { group, name, passed: false, detail: outcome };
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { group, name, passed: false, detail: `unexpected error: ${detail}` };
  }
}

function expectBand(value: number, mode: DemandMode, expected: SilBand): Assertion {
  return () => {
    const band = classify(value, mode);
    return band === expected || `classify(${value}, ${mode}) = ${band}, expected ${expected}`;
  };
}

function expectKind(kind: SilErrorKind, fn: () => unknown): Assertion {
  return () => {
    try {
      fn();
    } catch (err) {
      if (isSilValidationError(err)) {
        return err.kind === kind || `raised ${err.kind}, expected ${kind}`;
      }
      throw err;
    }
    return `no error raised, expected ${kind}`;
  };
}

// ═══════════════════════════════════════════════════════════════
// CHECK GROUPS
// ═══════════════════════════════════════════════════════════════

function boundaryChecks(mode: DemandMode, ranges: readonly SilRange[]): SelfTestCheck[] {
  const label = mode === 'low' ? 'PFD' : 'PFH';
  const checks: SelfTestCheck[] = [];

  ranges.forEach((range, i) => {
    const bandBelow: SilBand = i === 0 ? 'SIL4' : ranges[i - 1].band;
    checks.push(run('classifier', `${label} ${range.band} at lower bound ${range.lower}`, expectBand(range.lower, mode, range.band)));
    checks.push(run('classifier', `${label} just below ${range.band} lower bound`, expectBand(justBelow(range.lower), mode, bandBelow)));
    checks.push(run('classifier', `${label} just below ${range.band} upper bound`, expectBand(justBelow(range.upper), mode, range.band)));
  });

  const top = ranges[ranges.length - 1];
  checks.push(run('classifier', `${label} at SIL1 upper bound ${top.upper} is out of range`, expectBand(top.upper, mode, 'OUT_OF_RANGE')));
  checks.push(run('classifier', `${label} zero is better than SIL4`, expectBand(0, mode, 'SIL4')));
  checks.push(run('classifier', `${label} NaN has no band`, expectBand(Number.NaN, mode, 'NONE')));
  return checks;
}

function calculatorChecks(): SelfTestCheck[] {
  const asm: Assumptions = { ...DEFAULT_ASSUMPTIONS };
  const low = { demandMode: 'low' as const };

  const ref: ComponentRecord = { id: 'ref', lane: 'sensor', lambdaDU: 1e-6, lambdaDD: 0 };

  const pair = (id: string, lambdaDU: number, lambdaDD: number, extra: Partial<ComponentRecord> = {}): ComponentRecord =>
    ({ id, lane: 'output', lambdaDU, lambdaDD, ...extra });

  return [
    run('calculator', '1oo1 PFDavg reference (λDU=1e-6, TI=8760, MTTR=8)', () => {
      const m = singleChannel(ref, asm, low);
      return closeTo(m.pfdAvg, 4.388e-3) || `PFDavg = ${m.pfdAvg}`;
    }),
    run('calculator', '1oo1 PFH equals λDU', () => {
      const m = singleChannel(ref, asm, low);
      return m.pfh === 1e-6 || `PFH = ${m.pfh}`;
    }),
    run('calculator', '1oo2 with zero beta has no common-cause terms', () => {
      const zero: Assumptions = { ...asm, beta: 0, betaD: 0 };
      const lambdaDU = 2e-6;
      const lambdaDD = 3e-6;
      const m = redundantPair(pair('a', lambdaDU, lambdaDD), pair('b', lambdaDU, lambdaDD), zero, low);
      const lambdaD = lambdaDU + lambdaDD;
      const tCE = (lambdaDU / lambdaD) * (asm.ti / 2 + asm.mttr) + (lambdaDD / lambdaD) * asm.mttr;
      const tGE = (lambdaDU / lambdaD) * (asm.ti / 3 + asm.mttr) + (lambdaDD / lambdaD) * asm.mttr;
      const expected = 2 * lambdaD ** 2 * tCE * tGE;
      return closeTo(m.pfdAvg, expected) || `PFDavg = ${m.pfdAvg}, expected ${expected}`;
    }),
    run('calculator', '1oo2 with zero rates guards the exposure-time division', () => {
      const m = oneOutOfTwo({ lambdaDU: 0, lambdaDD: 0, lambdaD: 0, source: 'native', ...asm });
      if (Number.isNaN(m.pfh) || Number.isNaN(m.pfdAvg)) return 'NaN result';
      return (m.tCE === 0 && m.tGE === 0 && m.pfh === 0) || `tCE=${m.tCE} tGE=${m.tGE} PFH=${m.pfh}`;
    }),
    run('calculator', '1oo2 with β=βD=1 is pure common cause', () => {
      const full: Assumptions = { ...asm, beta: 1, betaD: 1 };
      const m = redundantPair(pair('a', 4e-6, 1e-6), pair('b', 4e-6, 1e-6), full, low);
      return (m.tCE === 0 && m.pfh === 4e-6) || `tCE=${m.tCE} PFH=${m.pfh}`;
    }),
    run('calculator', 'rDU + rDD ≠ 1 is rejected', expectKind('InvalidRatio', () =>
      singleChannel({ id: 'r', lane: 'logic', lambdaD: 1e-6, rDU: 0.6, rDD: 0.5 }, asm, low))),
    run('calculator', 'beta outside [0, 1] is rejected', expectKind('InvalidBeta', () =>
      redundantPair(pair('a', 1e-6, 1e-6, { beta: 1.2 }), pair('b', 1e-6, 1e-6), asm, low))),
    run('calculator', 'negative rate is rejected', expectKind('InvalidParameter', () =>
      singleChannel(pair('n', -1e-6, 0), asm, low))),
    run('calculator', 'missing rate is rejected', expectKind('MissingRate', () =>
      singleChannel({ id: 'm', lane: 'sensor', lambdaDU: 1e-6 }, asm, low))),
    run('calculator', 'paired demand modes must match', expectKind('ModeMismatch', () =>
      redundantPair(pair('a', 1e-6, 0, { demandMode: 'low' }), pair('b', 1e-6, 0, { demandMode: 'high' }), asm, low))),
  ];
}

function partitionerChecks(): SelfTestCheck[] {
  const tagged = (id: string, colour: string | null): ComponentRecord =>
    ({ id, lane: 'sensor', colour, lambdaDU: 1e-7, lambdaDD: 1e-7 });

  return [
    run('partitioner', '"#FF0000" and "#ff0000" share a subgroup', () => {
      const p = partition({
        id: 'c1', demandMode: 'low',
        lanes: { sensor: [tagged('a', '#FF0000')], logic: [tagged('b', '#ff0000')], output: [] },
      });
      return p.subgroups.get('#ff0000')?.members.length === 2 || 'expected one subgroup of two';
    }),
    run('partitioner', '"Red" and "#FF0000" stay apart', () => {
      const p = partition({
        id: 'c2', demandMode: 'low',
        lanes: { sensor: [tagged('a', 'Red')], logic: [tagged('b', '#FF0000')], output: [] },
      });
      return p.subgroups.size === 0 || `expected no subgroup, got ${p.subgroups.size}`;
    }),
    run('partitioner', 'every component counted once over 200 random assignments', () => {
      for (let seed = 1; seed <= 200; seed++) {
        const sifu = randomSifu(seed);
        assertCountedOnce(sifu, partition(sifu));
      }
      return true;
    }),
  ];
}

function aggregatorChecks(): SelfTestCheck[] {
  return [
    run('aggregator', 'aggregate is idempotent', () => {
      const sifu = randomSifu(42);
      const first = aggregate(sifu, DEFAULT_ASSUMPTIONS);
      const second = aggregate(sifu, DEFAULT_ASSUMPTIONS);
      return JSON.stringify(first) === JSON.stringify(second) || 'results differ between runs';
    }),
    run('aggregator', 'a subgroup coloured "__proto__" is counted', () => {
      const member = (id: string, lane: ComponentRecord['lane']): ComponentRecord =>
        ({ id, lane, colour: '__proto__', lambdaDU: 1e-6, lambdaDD: 0 });
      const r = aggregate(
        { id: 'keys', demandMode: 'low', lanes: { sensor: [member('a', 'sensor')], logic: [], output: [member('b', 'output')] } },
        DEFAULT_ASSUMPTIONS
      );
      return (Object.keys(r.subgroups).length === 1 && r.total > 0) || `subgroups=${Object.keys(r.subgroups).length} total=${r.total}`;
    }),
    run('aggregator', 'total equals the sum of subgroup and lane values', () => {
      const r = aggregate(randomSifu(7), DEFAULT_ASSUMPTIONS);
      const parts = [...Object.values(r.subgroups), r.lanes.sensor, r.lanes.logic, r.lanes.output];
      const sum = parts.reduce((acc, p) => acc + p.value, 0);
      return closeTo(r.total, sum) || `total ${r.total} vs sum ${sum}`;
    }),
  ];
}

// ═══════════════════════════════════════════════════════════════
// ENTRY
// ═══════════════════════════════════════════════════════════════

export function runSelfTest(): SelfTestReport {
  const checks = [
    ...boundaryChecks('low', PFD_RANGES),
    run('classifier', 'PFD 9.999999e-2 is SIL1', expectBand(9.999999e-2, 'low', 'SIL1')),
    ...boundaryChecks('high', PFH_RANGES),
    ...calculatorChecks(),
    ...partitionerChecks(),
    ...aggregatorChecks(),
  ];
  const passed = checks.filter((c) => c.passed).length;
  return { ok: passed === checks.length, passed, failed: checks.length - passed, checks };
}
