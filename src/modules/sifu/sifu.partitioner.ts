/**
 * SIFU ENGINE — Subgroup Partitioner
 *
 * Colour is the only grouping key and is lane-independent. A colour held
 * by a single component is not a subgroup: that component stays ungrouped.
 */

import { SilValidationError } from './sifu.errors.js';
import { LANES } from './sifu.types.js';
import type { ComponentRecord, Lane, Partition, Sifu, Subgroup } from './sifu.types.js';

// ═══════════════════════════════════════════════════════════════
// COLOUR KEYS
// ═══════════════════════════════════════════════════════════════

/**
 * Case- and whitespace-insensitive key. No colour-space equivalence:
 * "red" and "#ff0000" stay different keys.
 */
export function normalizeColour(colour: string | null | undefined): string | null {
  if (colour == null) return null;
  const key = colour.replace(/\s+/g, '').toLowerCase();
  return key.length > 0 ? key : null;
}

export function applyColourAssignment(sifu: Sifu, assignment: Record<string, string | null>): Sifu {
  const recolour = (components: ComponentRecord[]) =>
    components.map((c) => ({ ...c, colour: Object.hasOwn(assignment, c.id) ? assignment[c.id] : null }));

  return {
    ...sifu,
    lanes: {
      sensor: recolour(sifu.lanes.sensor),
      logic: recolour(sifu.lanes.logic),
      output: recolour(sifu.lanes.output),
    },
  };
}

// ═══════════════════════════════════════════════════════════════
// PARTITION
// ═══════════════════════════════════════════════════════════════

export function allComponents(sifu: Sifu): ComponentRecord[] {
  return LANES.flatMap((lane) => sifu.lanes[lane]);
}

function assertUniqueIds(sifu: Sifu): void {
  const seen = new Set<string>();
  for (const c of allComponents(sifu)) {
    if (seen.has(c.id)) {
      throw new SilValidationError('DuplicateIdentifier', `identifier used more than once in SIFU ${sifu.id}`, c.id);
    }
    seen.add(c.id);
  }
}

export function partition(sifu: Sifu): Partition {
  assertUniqueIds(sifu);

  // Lane order, then position: keeps iteration order stable across calls
  const byColour = new Map<string, ComponentRecord[]>();
  for (const component of allComponents(sifu)) {
    const key = normalizeColour(component.colour);
    if (key === null) continue;
    const bucket = byColour.get(key);
    if (bucket) bucket.push(component);
    else byColour.set(key, [component]);
  }

  const subgroups = new Map<string, Subgroup>();
  const grouped = new Set<string>();
  for (const [key, members] of byColour) {
    if (members.length < 2) continue;
    const lanes = LANES.filter((lane) => members.some((m) => m.lane === lane));
    subgroups.set(key, { key, members, lanes, singleLane: lanes.length === 1 });
    for (const m of members) grouped.add(m.id);
  }

  const ungrouped: Record<Lane, ComponentRecord[]> = { sensor: [], logic: [], output: [] };
  for (const lane of LANES) {
    ungrouped[lane] = sifu.lanes[lane].filter((c) => !grouped.has(c.id));
  }

  return { subgroups, ungrouped };
}

// ═══════════════════════════════════════════════════════════════
// COUNTED-ONCE INVARIANT
// ═══════════════════════════════════════════════════════════════

export function assertCountedOnce(sifu: Sifu, result: Partition): void {
  const counts = new Map<string, number>();
  const bump = (c: ComponentRecord) => counts.set(c.id, (counts.get(c.id) ?? 0) + 1);

  for (const group of result.subgroups.values()) group.members.forEach(bump);
  for (const lane of LANES) result.ungrouped[lane].forEach(bump);

  const expected = allComponents(sifu);
  for (const c of expected) {
    const n = counts.get(c.id) ?? 0;
    if (n !== 1) {
      throw new SilValidationError('PartitionInvariantViolation', `component covered ${n} times`, c.id);
    }
  }
  if (counts.size !== expected.length) {
    const known = new Set(expected.map((c) => c.id));
    const stray = [...counts.keys()].find((id) => !known.has(id));
    throw new SilValidationError('PartitionInvariantViolation', 'partition covers a component outside the SIFU', stray);
  }
}
