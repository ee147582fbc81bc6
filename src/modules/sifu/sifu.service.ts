/**
 * SIFU ENGINE — Main Service
 *
 * Entry point for SIFU evaluation: aggregate → classify → requirement check.
 * One call evaluates one snapshot; nothing is cached between calls.
 */

import { defaultLogger, type Logger } from '../../common/logger.js';
import { DEFAULT_ASSUMPTIONS, DEFAULT_LANE_RATIOS, resolveAssumptions } from './sifu.assumptions.js';
import { aggregate } from './sifu.aggregator.js';
import { classifyDetailed, formatSil, meetsRequirement } from './sifu.classifier.js';
import { isSilValidationError } from './sifu.errors.js';
import type {
  Assumptions,
  LaneRatioTable,
  Sifu,
  SifuEvaluation,
} from './sifu.types.js';

export interface SifuServiceDeps {
  logger?: Logger;
  defaults?: Assumptions;
  laneRatios?: LaneRatioTable;
}

export interface EvaluateInput {
  sifu: Sifu;
  assumptions?: Partial<Assumptions>;
  laneRatios?: LaneRatioTable;
}

// ═══════════════════════════════════════════════════════════════
// MAIN SERVICE CLASS
// ═══════════════════════════════════════════════════════════════

export class SifuService {
  private readonly logger: Logger;
  private readonly defaults: Assumptions;
  private readonly laneRatios: LaneRatioTable;

  constructor(deps: SifuServiceDeps = {}) {
    this.logger = deps.logger ?? defaultLogger;
    this.defaults = resolveAssumptions(deps.defaults ?? DEFAULT_ASSUMPTIONS);
    this.laneRatios = deps.laneRatios ?? DEFAULT_LANE_RATIOS;
  }

  /**
   * Assumptions actually used for a request: request values over the
   * service defaults.
   */
  assumptionsFor(input: Partial<Assumptions> = {}): Assumptions {
    return resolveAssumptions(input, this.defaults);
  }

  /**
   * DU/DD split applied to components that only carry a total rate or a
   * precomputed PFDavg / PFH.
   */
  laneRatiosFor(input?: LaneRatioTable): LaneRatioTable {
    return input ?? this.laneRatios;
  }

  evaluate({ sifu, assumptions, laneRatios }: EvaluateInput): SifuEvaluation {
    const asm = this.assumptionsFor(assumptions);

    try {
      const result = aggregate(sifu, asm, this.laneRatiosFor(laneRatios));
      const classification = classifyDetailed(result.total, sifu.demandMode);
      const requirement = meetsRequirement(classification.band, sifu.requiredSil);

      if (result.degraded) {
        this.logger.warn(
          { sifuId: sifu.id, subgroups: Object.values(result.subgroups).filter((g) => g.degraded).map((g) => g.key) },
          '[SIFU] subgroup with 3+ members scored as sum of 1oo1 channels'
        );
      }
      this.logger.info(
        {
          sifuId: sifu.id,
          metric: result.metric,
          total: result.total,
          band: classification.band,
          required: formatSil(requirement.required),
          ok: requirement.ok,
        },
        '[SIFU] evaluated'
      );

      return { result, classification, requirement };
    } catch (err) {
      if (isSilValidationError(err)) {
        this.logger.warn(
          { sifuId: sifu.id, kind: err.kind, componentId: err.componentId },
          `[SIFU] evaluation aborted: ${err.message}`
        );
      }
      throw err;
    }
  }
}

export default SifuService;
