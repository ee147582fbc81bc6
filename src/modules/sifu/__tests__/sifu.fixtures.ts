import { expect } from 'vitest';
import { SilValidationError, type SilErrorKind } from '../sifu.errors.js';
import type { ComponentRecord, DemandMode, Sifu } from '../sifu.types.js';

export function expectClose(actual: number, expected: number, rel = 1e-12): void {
  const scale = Math.max(Math.abs(actual), Math.abs(expected));
  expect(Math.abs(actual - expected)).toBeLessThanOrEqual(rel * scale);
}

export function catchSilError(fn: () => unknown): SilValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SilValidationError) return err;
    throw err;
  }
  throw new Error('expected a SilValidationError');
}

export function expectKind(fn: () => unknown, kind: SilErrorKind, componentId?: string): void {
  const err = catchSilError(fn);
  expect(err.kind).toBe(kind);
  if (componentId !== undefined) expect(err.componentId).toBe(componentId);
}

/**
 * sensor: s1 (linked), s2
 * logic:  l1
 * output: o1 (linked), o2
 *
 * s1 and o1 share "#2E406E" / "#2e406e" and form a 1oo2 pair with
 * λDU = 1e-6, λDD = 0. Under the default assumptions that pair gives
 * PFDavg = 4.5961386368e-4 and PFH = 1.06397704e-7.
 */
export function referenceSifu(demandMode: DemandMode = 'low'): Sifu {
  return {
    id: 'SIFU-01',
    name: 'High level trip',
    demandMode,
    requiredSil: 2,
    lanes: {
      sensor: [
        { id: 's1', lane: 'sensor', colour: '#2E406E', lambdaDU: 1e-6, lambdaDD: 0 },
        { id: 's2', lane: 'sensor', pfdAvg: 0.003, pfh: 3e-7 },
      ],
      logic: [{ id: 'l1', lane: 'logic', pfdAvg: 0.002, pfh: 2e-7 }],
      output: [
        { id: 'o1', lane: 'output', colour: '#2e406e', lambdaDU: 1e-6, lambdaDD: 0 },
        { id: 'o2', lane: 'output', pfdAvg: 0.004, pfh: 4e-7 },
      ],
    },
  };
}

export const REFERENCE_PAIR = { pfdAvg: 4.5961386368e-4, pfh: 1.06397704e-7 };

export function native(id: string, lane: ComponentRecord['lane'], lambdaDU: number, lambdaDD: number, extra: Partial<ComponentRecord> = {}): ComponentRecord {
  return { id, lane, lambdaDU, lambdaDD, ...extra };
}
