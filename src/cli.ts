#!/usr/bin/env node
/**
 * SIL Calc CLI
 *
 *   sil-calc --selftest              boundary / edge-case checks, exit 1 on failure
 *   sil-calc --evaluate <file.json>  evaluate one SIFU document, print JSON
 *
 * Run from source: npx tsx src/cli.ts --selftest
 */

import * as fs from 'fs';
import { pathToFileURL } from 'url';
import type { Logger } from './common/logger.js';
import { isSilValidationError } from './modules/sifu/sifu.errors.js';
import { applyColourAssignment } from './modules/sifu/sifu.partitioner.js';
import { EvaluateRequestSchema } from './modules/sifu/sifu.schema.js';
import { runSelfTest } from './modules/sifu/sifu.selftest.js';
import { SifuService } from './modules/sifu/sifu.service.js';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  readFile: (path: string) => string;
}

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readFile: (path) => fs.readFileSync(path, 'utf-8'),
};

const USAGE = [
  'Usage:',
  '  sil-calc --selftest',
  '  sil-calc --evaluate <file.json> [--verbose]',
].join('\n');

// ═══════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════

function selftest(io: CliIo): number {
  io.out('═══════════════════════════════════════════════════════════');
  io.out('     SIL CALC ENGINE SELF-TEST');
  io.out('═══════════════════════════════════════════════════════════');

  const report = runSelfTest();
  for (const check of report.checks) {
    const mark = check.passed ? 'PASS' : 'FAIL';
    io.out(`[${mark}] ${check.group}: ${check.name}${check.detail ? ` (${check.detail})` : ''}`);
  }

  io.out('───────────────────────────────────────────────────────────');
  if (report.ok) {
    io.out(`✅ ${report.passed} checks passed`);
    return 0;
  }
  io.err(`❌ ${report.failed} of ${report.checks.length} checks failed`);
  return 1;
}

function stderrLogger(io: CliIo, verbose: boolean): Logger {
  const write = (level: string) => (obj: unknown, msg?: string) =>
    io.err(`[${level}] ${msg || ''} ${JSON.stringify(obj)}`);
  return {
    info: verbose ? write('INFO') : () => undefined,
    warn: write('WARN'),
    error: write('ERROR'),
  };
}

function evaluate(file: string, io: CliIo, verbose: boolean): number {
  let raw: unknown;
  try {
    raw = JSON.parse(io.readFile(file));
  } catch (err) {
    io.err(`❌ Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  // a bare SIFU document is accepted as well as a full request
  const wrapped = typeof raw === 'object' && raw !== null && 'sifu' in raw ? raw : { sifu: raw };
  const parsed = EvaluateRequestSchema.safeParse(wrapped);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      io.err(`❌ ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return 1;
  }

  const body = parsed.data;
  const sifu = body.colourAssignment ? applyColourAssignment(body.sifu, body.colourAssignment) : body.sifu;
  const service = new SifuService({ logger: stderrLogger(io, verbose) });

  try {
    const evaluation = service.evaluate({ sifu, assumptions: body.assumptions, laneRatios: body.laneRatios });
    io.out(JSON.stringify(evaluation, null, 2));
    return 0;
  } catch (err) {
    if (isSilValidationError(err)) {
      io.err(`❌ ${err.kind}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

// ═══════════════════════════════════════════════════════════════
// ENTRY
// ═══════════════════════════════════════════════════════════════

export function runCli(argv: string[], io: CliIo = defaultIo): number {
  if (argv.includes('--selftest')) {
    return selftest(io);
  }

  const at = argv.indexOf('--evaluate');
  if (at !== -1) {
    const file = argv[at + 1];
    if (!file || file.startsWith('--')) {
      io.err('❌ --evaluate needs a file path');
      io.err(USAGE);
      return 1;
    }
    return evaluate(file, io, argv.includes('--verbose'));
  }

  io.err(USAGE);
  return argv.includes('--help') ? 0 : 1;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script || !fs.existsSync(script)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(script)).href;
}

if (isEntryPoint()) {
  process.exit(runCli(process.argv.slice(2)));
}
