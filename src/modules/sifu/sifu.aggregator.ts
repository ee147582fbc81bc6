/**
 * SIFU ENGINE — Aggregator
 *
 * Scores every subgroup by its architecture and every ungrouped component
 * as a 1oo1 channel, then sums. Each component contributes exactly once.
 */

import { metricFor } from './sifu.assumptions.js';
import { redundantPair, singleChannel } from './sifu.calculator.js';
import { assertCountedOnce, partition } from './sifu.partitioner.js';
import { LANES } from './sifu.types.js';
import type {
  AggregatedResult,
  Architecture,
  Assumptions,
  ChannelMetrics,
  ComponentRecord,
  EvaluationOptions,
  Lane,
  LaneResult,
  Sifu,
  SubgroupResult,
} from './sifu.types.js';

// ═══════════════════════════════════════════════════════════════
// ARCHITECTURE DISPATCH
// ═══════════════════════════════════════════════════════════════

export function architectureOf(members: ComponentRecord[]): Architecture {
  if (members.length === 1) return { kind: 'single', member: members[0] };
  if (members.length === 2) return { kind: 'redundant_pair', a: members[0], b: members[1] };
  return { kind: 'degraded', members, n: members.length };
}

interface ScoredArchitecture extends ChannelMetrics {
  degraded: boolean;
  asymmetric: boolean;
}

function sumMetrics(items: ChannelMetrics[]): ChannelMetrics {
  let pfdAvg = 0;
  let pfh = 0;
  for (const m of items) {
    pfdAvg += m.pfdAvg;
    pfh += m.pfh;
  }
  return { pfdAvg, pfh };
}

export function scoreArchitecture(
  architecture: Architecture,
  assumptions: Assumptions,
  options: EvaluationOptions
): ScoredArchitecture {
  switch (architecture.kind) {
    case 'single':
      return { ...singleChannel(architecture.member, assumptions, options), degraded: false, asymmetric: false };

    case 'redundant_pair': {
      const { pfdAvg, pfh, asymmetric } = redundantPair(architecture.a, architecture.b, assumptions, options);
      return { pfdAvg, pfh, degraded: false, asymmetric };
    }

    case 'degraded': {
      // No 1ooN formula: conservative sum of 1oo1 channels
      const sum = sumMetrics(architecture.members.map((m) => singleChannel(m, assumptions, options)));
      return { ...sum, degraded: true, asymmetric: false };
    }
  }
}

// ═══════════════════════════════════════════════════════════════
// AGGREGATE
// ═══════════════════════════════════════════════════════════════

export function aggregate(
  sifu: Sifu,
  assumptions: Assumptions,
  laneRatios?: EvaluationOptions['laneRatios']
): AggregatedResult {
  const options: EvaluationOptions = { demandMode: sifu.demandMode, laneRatios };
  const metric = metricFor(sifu.demandMode);

  const parts = partition(sifu);
  assertCountedOnce(sifu, parts);

  // Colour keys are user text: keep them out of plain-object assignment
  const subgroupList = [...parts.subgroups.values()].map((group): SubgroupResult => {
    const architecture = architectureOf(group.members);
    const scored = scoreArchitecture(architecture, assumptions, options);
    return {
      key: group.key,
      architecture: architecture.kind,
      memberIds: group.members.map((m) => m.id),
      lanes: group.lanes,
      pfdAvg: scored.pfdAvg,
      pfh: scored.pfh,
      value: scored[metric],
      singleLane: group.singleLane,
      degraded: scored.degraded,
      asymmetric: scored.asymmetric,
    };
  });
  const subgroups: Record<string, SubgroupResult> = Object.fromEntries(
    subgroupList.map((g): [string, SubgroupResult] => [g.key, g])
  );

  const laneResult = (lane: Lane): LaneResult => {
    const members = parts.ungrouped[lane];
    const sum = sumMetrics(members.map((c) => singleChannel(c, assumptions, options)));
    return { lane, componentIds: members.map((c) => c.id), ...sum, value: sum[metric] };
  };
  const lanes: Record<Lane, LaneResult> = {
    sensor: laneResult('sensor'),
    logic: laneResult('logic'),
    output: laneResult('output'),
  };

  const totals = sumMetrics([...subgroupList, ...LANES.map((lane) => lanes[lane])]);

  return {
    sifuId: sifu.id,
    demandMode: sifu.demandMode,
    metric,
    subgroups,
    lanes,
    totals,
    total: totals[metric],
    degraded: subgroupList.some((g) => g.degraded),
  };
}
