/**
 * SIFU MODULE — Index
 */

export * from './sifu.types.js';
export * from './sifu.errors.js';
export * from './sifu.assumptions.js';
export * from './sifu.conversions.js';
export * from './sifu.calculator.js';
export * from './sifu.partitioner.js';
export * from './sifu.aggregator.js';
export * from './sifu.classifier.js';
export * from './sifu.schema.js';
export * from './sifu.selftest.js';
export * from './sifu.service.js';
export * from './sifu.routes.js';

export { SifuService } from './sifu.service.js';
