/**
 * SIFU routes — exercised through Fastify inject, no network
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../../app.js';
import { DEFAULT_ASSUMPTIONS } from '../sifu.assumptions.js';
import { expectClose, REFERENCE_PAIR, referenceSifu } from './sifu.fixtures.js';

describe('SIFU routes', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = buildApp({ logger: false, defaults: { ...DEFAULT_ASSUMPTIONS } });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('POST /api/sifu/evaluate', () => {
    it('should evaluate a SIFU', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/sifu/evaluate', payload: { sifu: referenceSifu() } });
      expect(res.statusCode).toBe(200);

      const body = res.json();
      expect(body.ok).toBe(true);
      expect(body.data.classification.band).toBe('SIL2');
      expect(body.data.requirement).toEqual({ required: 2, achieved: 2, ok: true });
      expect(body.data.assumptions).toEqual({ ti: 8760, mttr: 8, beta: 0.1, betaD: 0.02 });
      expectClose(body.data.result.total, 0.00945961386368, 1e-10);
    });

    it('should apply a colour assignment over the stored colours', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/sifu/evaluate',
        payload: { sifu: referenceSifu(), colourAssignment: {} },
      });
      const body = res.json();
      expect(body.data.result.subgroups).toEqual({});
      // every component as 1oo1: 0.003 + 0.002 + 0.004 + 2 × 4.388e-3
      expectClose(body.data.result.total, 0.017776, 1e-10);
      expect(body.data.requirement).toEqual({ required: 2, achieved: 1, ok: false });
    });

    it('should pair catalogue chips that only carry PFDavg and PFH', async () => {
      const chip = { colour: 'Red', pfdAvg: 1e-3, pfh: 1e-7 };
      const res = await app.inject({
        method: 'POST',
        url: '/api/sifu/evaluate',
        payload: {
          sifu: { id: 'CHIPS', demandMode: 'low', lanes: { sensor: [{ id: 'x', ...chip }], output: [{ id: 'y', ...chip }] } },
        },
      });
      expect(res.statusCode).toBe(200);

      const { data } = res.json();
      expect(data.result.subgroups.red.memberIds).toEqual(['x', 'y']);
      expectClose(data.result.total, 6.048962326301696e-5, 1e-9);
      expect(data.classification.band).toBe('SIL4');
      expect(data.laneRatios.sensor).toEqual({ rDU: 0.6, rDD: 0.4 });
    });

    it('should keep a subgroup whose colour is an object member name', async () => {
      const member = { colour: '__proto__', lambdaDU: 1e-6, lambdaDD: 0 };
      const res = await app.inject({
        method: 'POST',
        url: '/api/sifu/evaluate',
        payload: {
          sifu: { id: 'KEYS', demandMode: 'low', lanes: { sensor: [{ id: 'a', ...member }], output: [{ id: 'b', ...member }] } },
        },
      });
      const { data } = res.json();
      expect(Object.keys(data.result.subgroups)).toEqual(['__proto__']);
      expectClose(data.result.total, REFERENCE_PAIR.pfdAvg, 1e-10);
    });

    it('should evaluate components whose ids are object member names', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/sifu/evaluate',
        payload: {
          sifu: {
            id: 'IDS',
            demandMode: 'low',
            lanes: { sensor: [{ id: 'toString', pfdAvg: 0.001, pfh: 1e-7 }], logic: [{ id: 'constructor', pfdAvg: 0.002, pfh: 2e-7 }] },
          },
          colourAssignment: {},
        },
      });
      expect(res.statusCode).toBe(200);
      expectClose(res.json().data.result.total, 0.003);
    });

    it('should answer 422 with the component id on an invalid component', async () => {
      const sifu = referenceSifu();
      sifu.lanes.logic = [{ id: 'l1', lane: 'logic', lambdaDU: 1e-6 }];

      const res = await app.inject({ method: 'POST', url: '/api/sifu/evaluate', payload: { sifu } });
      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        ok: false,
        error: 'MissingRate',
        message: 'l1: both lambdaDU and lambdaDD must be provided',
        componentId: 'l1',
      });
    });

    it('should answer 400 on a malformed body', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/sifu/evaluate', payload: { sifu: { id: 'X' } } });
      expect(res.statusCode).toBe(400);

      const body = res.json();
      expect(body.error).toBe('VALIDATION_ERROR');
      expect(body.issues.map((i: { path: string }) => i.path)).toContain('sifu.demandMode');
    });
  });

  describe('POST /api/sifu/classify', () => {
    it('should classify a precomputed total', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/api/sifu/classify',
        payload: { total: 5e-4, demandMode: 'low', requiredSil: 'SIL 3' },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json().data).toEqual({
        classification: { band: 'SIL3', rank: 3, betterThanSil4: false, metric: 'pfdAvg', value: 5e-4 },
        requirement: { required: 3, achieved: 3, ok: true },
      });
    });
  });

  describe('GET endpoints', () => {
    it('should expose the default assumptions and lane ratios', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/sifu/assumptions' });
      expect(res.json().data).toEqual({
        assumptions: { ti: 8760, mttr: 8, beta: 0.1, betaD: 0.02 },
        laneRatios: {
          sensor: { rDU: 0.6, rDD: 0.4 },
          logic: { rDU: 0.6, rDD: 0.4 },
          output: { rDU: 0.6, rDD: 0.4 },
        },
      });
    });

    it('should run the self-test', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/sifu/selftest' });
      expect(res.statusCode).toBe(200);
      expect(res.json().data.failed).toBe(0);
    });

    it('should report health', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/health' });
      expect(res.json()).toMatchObject({ ok: true, service: 'sil-calc' });
    });

    it('should answer 404 for unknown routes', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/nope' });
      expect(res.statusCode).toBe(404);
      expect(res.json().error).toBe('NOT_FOUND');
    });
  });
});
