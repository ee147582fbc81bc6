/**
 * SIFU ENGINE — Deterministic sampling
 *
 * Seeded generators for invariant checks over random colour assignments.
 */

import { LANES } from './sifu.types.js';
import type { ComponentRecord, Lane, Sifu } from './sifu.types.js';

export function mulberry32(seed: number): () => number {
  return function () {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const PALETTE = ['#2E406E', '#2e406e', ' #C0392B ', 'red', 'Red', '#FF0000', '#ff0000', ''];

/**
 * A SIFU with `perLane` native-rate components per lane and random colour
 * tags drawn from a small palette (including null and blank tags).
 */
export function randomSifu(seed: number, perLane = 4): Sifu {
  const rng = mulberry32(seed);
  const pick = (): string | null => {
    const i = Math.floor(rng() * (PALETTE.length + 2));
    return i < PALETTE.length ? PALETTE[i] : null;
  };

  const laneOf = (lane: Lane): ComponentRecord[] =>
    Array.from({ length: perLane }, (_, i) => ({
      id: `${lane}-${i + 1}`,
      lane,
      colour: pick(),
      lambdaDU: (1 + Math.floor(rng() * 9)) * 1e-7,
      lambdaDD: (1 + Math.floor(rng() * 9)) * 1e-7,
    }));

  const lanes: Record<Lane, ComponentRecord[]> = { sensor: [], logic: [], output: [] };
  for (const lane of LANES) lanes[lane] = laneOf(lane);

  return { id: `random-${seed}`, demandMode: rng() < 0.5 ? 'low' : 'high', lanes };
}
