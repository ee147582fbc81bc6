/**
 * SIFU ENGINE — Input schemas
 *
 * Collaborator data (lane editor, catalogue import, HTTP bodies, CLI files)
 * enters through these schemas. Range checks on the numbers are left to the
 * engine so that failures carry an error kind and the component id.
 */

import { z } from 'zod';
import { DEFAULT_LANE_RATIO } from './sifu.assumptions.js';
import { normalizeRequiredSil } from './sifu.classifier.js';
import { fitToPerHour } from './sifu.conversions.js';
import type { ComponentRecord, Lane, LaneRatioTable, Sifu } from './sifu.types.js';

// ═══════════════════════════════════════════════════════════════
// ENUMS WITH ALIASES
// ═══════════════════════════════════════════════════════════════

const LANE_ALIASES: Record<string, Lane> = {
  sensor: 'sensor',
  sensors: 'sensor',
  input: 'sensor',
  logic: 'logic',
  output: 'output',
  outputs: 'output',
  actuator: 'output',
  actuators: 'output',
};

const lowerTrim = (v: unknown) => (typeof v === 'string' ? v.trim().toLowerCase() : v);

export const LaneSchema = z.preprocess(
  (v) => {
    const key = lowerTrim(v);
    return typeof key === 'string' && Object.hasOwn(LANE_ALIASES, key) ? LANE_ALIASES[key] : key;
  },
  z.enum(['sensor', 'logic', 'output'])
);

export const DemandModeSchema = z.preprocess(
  (v) => {
    const key = lowerTrim(v);
    return typeof key === 'string' ? key.replace(/[\s_-]*demand$/, '') : key;
  },
  z.enum(['low', 'high', 'continuous'])
);

// ═══════════════════════════════════════════════════════════════
// COMPONENT RECORD
// ═══════════════════════════════════════════════════════════════

const componentFields = {
  id: z.string().trim().min(1),
  label: z.string().optional(),
  demandMode: DemandModeSchema.optional(),
  colour: z.string().nullable().optional(),
  rateUnit: z.enum(['per_hour', 'FIT']).default('per_hour'),

  pfdAvg: z.number().optional(),
  pfh: z.number().optional(),

  lambdaDU: z.number().optional(),
  lambdaDD: z.number().optional(),
  lambdaD: z.number().optional(),
  rDU: z.number().optional(),
  rDD: z.number().optional(),
  beta: z.number().optional(),
  betaD: z.number().optional(),
  ti: z.number().optional(),
  mttr: z.number().optional(),
};

type ComponentInput = z.infer<z.ZodObject<typeof componentFields>> & { lane: Lane };

function toRecord({ rateUnit, ...rest }: ComponentInput): ComponentRecord {
  if (rateUnit === 'per_hour') return rest;
  const scale = (v: number | undefined) => (v === undefined ? undefined : fitToPerHour(v));
  return {
    ...rest,
    lambdaDU: scale(rest.lambdaDU),
    lambdaDD: scale(rest.lambdaDD),
    lambdaD: scale(rest.lambdaD),
    pfh: scale(rest.pfh),
  };
}

export const ComponentRecordSchema = z
  .object({ ...componentFields, lane: LaneSchema })
  .transform(toRecord);

// inside a lane array the lane key is implied
const LaneMemberSchema = z.object({ ...componentFields, lane: LaneSchema.optional() });

function laneArray(lane: Lane) {
  return z
    .array(LaneMemberSchema)
    .default([])
    .superRefine((members, ctx) => {
      members.forEach((m, i) => {
        if (m.lane !== undefined && m.lane !== lane) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'lane'],
            message: `component ${m.id} declares lane '${m.lane}' but is listed under '${lane}'`,
          });
        }
      });
    })
    .transform((members) => members.map((m) => toRecord({ ...m, lane })));
}

// ═══════════════════════════════════════════════════════════════
// SIFU
// ═══════════════════════════════════════════════════════════════

export const SifuSchema = z
  .object({
    id: z.string().trim().min(1),
    name: z.string().optional(),
    demandMode: DemandModeSchema,
    requiredSil: z.union([z.number(), z.string()]).optional(),
    lanes: z
      .object({
        sensor: laneArray('sensor'),
        logic: laneArray('logic'),
        output: laneArray('output'),
      })
      .default({}),
  })
  .transform(({ requiredSil, ...rest }): Sifu => {
    const required = normalizeRequiredSil(requiredSil);
    return required > 0 ? { ...rest, requiredSil: required } : rest;
  });

// ═══════════════════════════════════════════════════════════════
// ASSUMPTIONS, RATIOS, COLOURS
// ═══════════════════════════════════════════════════════════════

// unknown keys are stripped
export const AssumptionsSchema = z
  .object({
    ti: z.number(),
    mttr: z.number(),
    beta: z.number(),
    betaD: z.number(),
  })
  .partial();

const LaneRatioSchema = z.object({ rDU: z.number(), rDD: z.number() });

export const LaneRatioTableSchema = z
  .object({
    sensor: LaneRatioSchema.optional(),
    logic: LaneRatioSchema.optional(),
    output: LaneRatioSchema.optional(),
  })
  .transform(
    (t): LaneRatioTable => ({
      sensor: t.sensor ?? { ...DEFAULT_LANE_RATIO },
      logic: t.logic ?? { ...DEFAULT_LANE_RATIO },
      output: t.output ?? { ...DEFAULT_LANE_RATIO },
    })
  );

export const ColourAssignmentSchema = z.record(z.string(), z.string().nullable());

// ═══════════════════════════════════════════════════════════════
// REQUESTS
// ═══════════════════════════════════════════════════════════════

export const EvaluateRequestSchema = z.object({
  sifu: SifuSchema,
  assumptions: AssumptionsSchema.optional(),
  laneRatios: LaneRatioTableSchema.optional(),
  colourAssignment: ColourAssignmentSchema.optional(),
});

export const ClassifyRequestSchema = z.object({
  total: z.number(),
  demandMode: DemandModeSchema,
  requiredSil: z.union([z.number(), z.string()]).optional(),
});
