/**
 * SIFU ROUTES — HTTP Endpoints
 *
 * One request body is one SIFU snapshot; it is evaluated in full.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { classifyDetailed, meetsRequirement } from './sifu.classifier.js';
import { applyColourAssignment } from './sifu.partitioner.js';
import { ClassifyRequestSchema, EvaluateRequestSchema } from './sifu.schema.js';
import { runSelfTest } from './sifu.selftest.js';
import { SifuService } from './sifu.service.js';

export interface SifuRouteDeps {
  service: SifuService;
}

// ═══════════════════════════════════════════════════════════════
// ROUTE REGISTRATION
// ═══════════════════════════════════════════════════════════════

export async function registerSifuRoutes(app: FastifyInstance, deps: SifuRouteDeps): Promise<void> {
  const prefix = '/api/sifu';
  const { service } = deps;

  /**
   * POST /api/sifu/evaluate
   *
   * Aggregate, classify and check the required SIL of one SIFU
   */
  app.post(`${prefix}/evaluate`, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = EvaluateRequestSchema.parse(request.body);
    const sifu = body.colourAssignment ? applyColourAssignment(body.sifu, body.colourAssignment) : body.sifu;

    const evaluation = service.evaluate({
      sifu,
      assumptions: body.assumptions,
      laneRatios: body.laneRatios,
    });

    return reply.send({
      ok: true,
      data: {
        ...evaluation,
        assumptions: service.assumptionsFor(body.assumptions),
        laneRatios: service.laneRatiosFor(body.laneRatios),
      },
    });
  });

  /**
   * POST /api/sifu/classify
   *
   * Band for a precomputed total
   */
  app.post(`${prefix}/classify`, async (request: FastifyRequest, reply: FastifyReply) => {
    const body = ClassifyRequestSchema.parse(request.body);
    const classification = classifyDetailed(body.total, body.demandMode);

    return reply.send({
      ok: true,
      data: {
        classification,
        requirement: meetsRequirement(classification.band, body.requiredSil),
      },
    });
  });

  /**
   * GET /api/sifu/assumptions
   */
  app.get(`${prefix}/assumptions`, async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ok: true,
      data: {
        assumptions: service.assumptionsFor(),
        laneRatios: service.laneRatiosFor(),
      },
    });
  });

  /**
   * GET /api/sifu/selftest
   */
  app.get(`${prefix}/selftest`, async (_request: FastifyRequest, reply: FastifyReply) => {
    const report = runSelfTest();
    if (!report.ok) {
      app.log.error({ failed: report.checks.filter((c) => !c.passed) }, '[SIFU] self-test failed');
    }
    return reply.status(report.ok ? 200 : 500).send({ ok: report.ok, data: report });
  });

  app.log.info('[SIFU] Routes registered at /api/sifu/*');
}
