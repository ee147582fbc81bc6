/**
 * Aggregator — subgroups, lanes and the SIFU total
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_ASSUMPTIONS, DEFAULT_LANE_RATIOS } from '../sifu.assumptions.js';
import { aggregate, architectureOf } from '../sifu.aggregator.js';
import { classify } from '../sifu.classifier.js';
import { randomSifu } from '../sifu.sampling.js';
import type { Sifu } from '../sifu.types.js';
import { expectClose, expectKind, native, REFERENCE_PAIR, referenceSifu } from './sifu.fixtures.js';

const asm = { ...DEFAULT_ASSUMPTIONS };

describe('architectureOf', () => {
  it('should map member counts onto the closed set of architectures', () => {
    const a = native('a', 'sensor', 1e-6, 0);
    const b = native('b', 'sensor', 1e-6, 0);
    const c = native('c', 'sensor', 1e-6, 0);
    expect(architectureOf([a]).kind).toBe('single');
    expect(architectureOf([a, b]).kind).toBe('redundant_pair');
    expect(architectureOf([a, b, c])).toEqual({ kind: 'degraded', members: [a, b, c], n: 3 });
  });
});

describe('aggregate', () => {
  it('should sum the pair and the ungrouped lanes in low demand', () => {
    const r = aggregate(referenceSifu('low'), asm);

    expect(r.metric).toBe('pfdAvg');
    expect(Object.keys(r.subgroups)).toEqual(['#2e406e']);

    const pair = r.subgroups['#2e406e'];
    expect(pair.architecture).toBe('redundant_pair');
    expect(pair.memberIds).toEqual(['s1', 'o1']);
    expect(pair.lanes).toEqual(['sensor', 'output']);
    expect(pair.degraded).toBe(false);
    expect(pair.asymmetric).toBe(false);
    expectClose(pair.value, REFERENCE_PAIR.pfdAvg, 1e-10);

    expect(r.lanes.sensor).toMatchObject({ componentIds: ['s2'], value: 0.003 });
    expect(r.lanes.logic).toMatchObject({ componentIds: ['l1'], value: 0.002 });
    expect(r.lanes.output).toMatchObject({ componentIds: ['o2'], value: 0.004 });

    expectClose(r.total, 0.00945961386368, 1e-10);
    expect(r.total).toBe(r.totals.pfdAvg);
    expect(r.degraded).toBe(false);
    expect(classify(r.total, 'low')).toBe('SIL2');
  });

  it('should select PFH in high demand', () => {
    const r = aggregate(referenceSifu('high'), asm);
    expect(r.metric).toBe('pfh');
    expectClose(r.total, 1.006397704e-6, 1e-10);
    expect(classify(r.total, 'high')).toBe('SIL1');
  });

  it('should score 3+ members as a sum of single channels and flag it', () => {
    const sifu: Sifu = {
      id: 'TRIPLE',
      demandMode: 'low',
      lanes: {
        sensor: [native('a', 'sensor', 1e-6, 0, { colour: 'amber' }), native('b', 'sensor', 1e-6, 0, { colour: 'Amber' })],
        logic: [native('c', 'logic', 1e-6, 0, { colour: 'AMBER' })],
        output: [],
      },
    };
    const r = aggregate(sifu, asm);
    expect(r.subgroups.amber.architecture).toBe('degraded');
    expect(r.subgroups.amber.degraded).toBe(true);
    expect(r.degraded).toBe(true);
    expectClose(r.total, 3 * 4.388e-3);
  });

  it('should abort the whole SIFU on one invalid component', () => {
    const sifu = referenceSifu();
    sifu.lanes.logic = [{ id: 'l1', lane: 'logic', lambdaDU: 1e-6 }];
    expectKind(() => aggregate(sifu, asm), 'MissingRate', 'l1');
  });

  it('should apply a lane ratio table to total rates', () => {
    const sifu: Sifu = {
      id: 'RATIO',
      demandMode: 'high',
      lanes: { sensor: [{ id: 's', lane: 'sensor', lambdaD: 1e-6 }], logic: [], output: [] },
    };
    expectKind(() => aggregate(sifu, asm), 'MissingRate', 's');

    const r = aggregate(sifu, asm, {
      sensor: { rDU: 0.3, rDD: 0.7 },
      logic: { rDU: 0.6, rDD: 0.4 },
      output: { rDU: 0.6, rDD: 0.4 },
    });
    expectClose(r.total, 3e-7);
  });

  it.each(['__proto__', 'constructor'])('should count a subgroup coloured %s', (colour) => {
    const sifu: Sifu = {
      id: 'KEYS',
      demandMode: 'low',
      lanes: {
        sensor: [native('a', 'sensor', 1e-6, 0, { colour })],
        logic: [],
        output: [native('b', 'output', 1e-6, 0, { colour })],
      },
    };
    const r = aggregate(sifu, asm);
    expect(Object.keys(r.subgroups)).toEqual([colour]);
    expect(r.subgroups[colour].memberIds).toEqual(['a', 'b']);
    expectClose(r.total, REFERENCE_PAIR.pfdAvg, 1e-10);
  });

  it('should split precomputed chips of a pair by the lane ratio table', () => {
    const chip = (id: string, lane: 'sensor' | 'output') => ({ id, lane, colour: 'red', pfdAvg: 1e-3, pfh: 1e-7 });
    const sifu: Sifu = { id: 'CHIPS', demandMode: 'low', lanes: { sensor: [chip('x', 'sensor')], logic: [], output: [chip('y', 'output')] } };

    expectKind(() => aggregate(sifu, asm), 'MissingRate', 'x');

    const r = aggregate(sifu, asm, { ...DEFAULT_LANE_RATIOS });
    expect(r.subgroups.red.architecture).toBe('redundant_pair');
    expectClose(r.total, 6.048962326301696e-5, 1e-9);
  });

  it('should reject a component declared for another demand mode', () => {
    const sifu = referenceSifu('low');
    sifu.lanes.logic = [{ id: 'l1', lane: 'logic', demandMode: 'high', pfdAvg: 0.002, pfh: 2e-7 }];
    expectKind(() => aggregate(sifu, asm), 'ModeMismatch', 'l1');

    sifu.lanes.logic = [{ id: 'l1', lane: 'logic', demandMode: 'low', pfdAvg: 0.002, pfh: 2e-7 }];
    expectClose(aggregate(sifu, asm).total, 0.00945961386368, 1e-10);
  });

  it('should give an empty SIFU a zero total', () => {
    const r = aggregate({ id: 'EMPTY', demandMode: 'low', lanes: { sensor: [], logic: [], output: [] } }, asm);
    expect(r.total).toBe(0);
    expect(r.subgroups).toEqual({});
  });

  it('should be idempotent and leave the input untouched', () => {
    const sifu = randomSifu(11);
    const before = JSON.stringify(sifu);
    const first = aggregate(sifu, asm);
    const second = aggregate(sifu, asm);
    expect(second).toEqual(first);
    expect(JSON.stringify(sifu)).toBe(before);
  });

  it('should equal the sum of its parts for random assignments', () => {
    for (let seed = 1; seed <= 50; seed++) {
      const r = aggregate(randomSifu(seed), asm);
      const parts = [...Object.values(r.subgroups), r.lanes.sensor, r.lanes.logic, r.lanes.output];
      const memberCount = parts.reduce(
        (n, p) => n + ('memberIds' in p ? p.memberIds.length : p.componentIds.length),
        0
      );
      expect(memberCount).toBe(12);
      expectClose(r.total, parts.reduce((sum, p) => sum + p.value, 0));
    }
  });
});
