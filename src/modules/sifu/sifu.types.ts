/**
 * SIFU ENGINE — Types
 *
 * Reliability aggregation for Safety Functions (SIFUs).
 * Everything here is a plain value: no behavior, no ambient state.
 */

// ═══════════════════════════════════════════════════════════════
// LANES & DEMAND MODES
// ═══════════════════════════════════════════════════════════════

export type Lane = 'sensor' | 'logic' | 'output';

export const LANES: readonly Lane[] = ['sensor', 'logic', 'output'] as const;

// 'continuous' is evaluated like 'high' (PFH)
export type DemandMode = 'low' | 'high' | 'continuous';

export type MetricKey = 'pfdAvg' | 'pfh';

// ═══════════════════════════════════════════════════════════════
// COMPONENT RECORD
// ═══════════════════════════════════════════════════════════════

export interface ComponentRecord {
  id: string;                 // unique within a SIFU
  lane: Lane;
  label?: string;
  demandMode?: DemandMode;    // applicability; undefined = any
  colour?: string | null;     // link colour, raw (normalized by the partitioner)

  // (a) precomputed metrics
  pfdAvg?: number;
  pfh?: number;               // 1/h

  // (b) raw parameters
  lambdaDU?: number;          // 1/h
  lambdaDD?: number;          // 1/h
  lambdaD?: number;           // 1/h, split by rDU/rDD
  rDU?: number;
  rDD?: number;
  beta?: number;
  betaD?: number;
  ti?: number;                // h
  mttr?: number;              // h
}

// ═══════════════════════════════════════════════════════════════
// GLOBAL ASSUMPTIONS
// ═══════════════════════════════════════════════════════════════

export interface Assumptions {
  ti: number;     // proof-test interval, h
  mttr: number;   // mean time to repair, h
  beta: number;   // common-cause fraction, DU
  betaD: number;  // common-cause fraction, DD
}

export interface LaneRatio {
  rDU: number;
  rDD: number;
}

export type LaneRatioTable = Record<Lane, LaneRatio>;

export interface EvaluationOptions {
  demandMode: DemandMode;
  laneRatios?: LaneRatioTable;
}

// ═══════════════════════════════════════════════════════════════
// RESOLVED RATES & CHANNEL METRICS
// ═══════════════════════════════════════════════════════════════

export type RateSource = 'native' | 'ratio' | 'derived_from_pfh' | 'derived_from_pfd';

export interface ResolvedRates {
  lambdaDU: number;
  lambdaDD: number;
  lambdaD: number;
  source: RateSource;
}

/** Component parameters after defaults and rate resolution. */
export interface ChannelParameters extends ResolvedRates {
  ti: number;
  mttr: number;
  beta: number;
  betaD: number;
}

export interface ChannelMetrics {
  pfdAvg: number;
  pfh: number;
}

export interface PairMetrics extends ChannelMetrics {
  tCE: number;
  tGE: number;
  asymmetric: boolean;
}

// ═══════════════════════════════════════════════════════════════
// SIFU & SUBGROUPS
// ═══════════════════════════════════════════════════════════════

export interface Sifu {
  id: string;
  name?: string;
  demandMode: DemandMode;
  requiredSil?: number;       // 1..4
  lanes: Record<Lane, ComponentRecord[]>;
}

export interface Subgroup {
  key: string;                // normalized colour
  members: ComponentRecord[];
  lanes: Lane[];
  singleLane: boolean;
}

export interface Partition {
  subgroups: Map<string, Subgroup>;
  ungrouped: Record<Lane, ComponentRecord[]>;
}

// Closed set of architectures the aggregator knows how to score
export type Architecture =
  | { kind: 'single'; member: ComponentRecord }
  | { kind: 'redundant_pair'; a: ComponentRecord; b: ComponentRecord }
  | { kind: 'degraded'; members: ComponentRecord[]; n: number };

// ═══════════════════════════════════════════════════════════════
// AGGREGATED RESULT
// ═══════════════════════════════════════════════════════════════

export interface SubgroupResult extends ChannelMetrics {
  key: string;
  architecture: Architecture['kind'];
  memberIds: string[];
  lanes: Lane[];
  value: number;              // selected metric
  singleLane: boolean;
  degraded: boolean;
  asymmetric: boolean;
}

export interface LaneResult extends ChannelMetrics {
  lane: Lane;
  componentIds: string[];
  value: number;              // selected metric
}

export interface AggregatedResult {
  sifuId: string;
  demandMode: DemandMode;
  metric: MetricKey;
  subgroups: Record<string, SubgroupResult>;
  lanes: Record<Lane, LaneResult>;
  totals: ChannelMetrics;     // both metrics, summed separately
  total: number;              // selected metric
  degraded: boolean;
}

// ═══════════════════════════════════════════════════════════════
// SIL CLASSIFICATION
// ═══════════════════════════════════════════════════════════════

export type SilBand = 'NONE' | 'SIL1' | 'SIL2' | 'SIL3' | 'SIL4' | 'OUT_OF_RANGE';

export interface SilRange {
  band: Exclude<SilBand, 'NONE' | 'OUT_OF_RANGE'>;
  lower: number;              // inclusive
  upper: number;              // exclusive
}

export interface SilClassification {
  band: SilBand;
  rank: number;               // 0 when no SIL is achieved
  betterThanSil4: boolean;
  metric: MetricKey;
  value: number;
}

export interface RequirementCheck {
  required: number;           // 0 = not specified
  achieved: number;
  ok: boolean;
}

export interface SifuEvaluation {
  result: AggregatedResult;
  classification: SilClassification;
  requirement: RequirementCheck;
}
