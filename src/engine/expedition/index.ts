export * from './errors.js';
export * from './names.js';
export * from './pools.js';
export * from './scope.js';
export * from './pool-filter.js';
export * from './schedule.js';
export * from './sampler.js';
export * from './validator.js';
export * from './assembler.js';
export * from './orchestrator.js';
export * from './request.js';
export * from './selector.js';
export * from './replacement.js';
export * from './catalog.js';
export * from './packet-tools.js';
export * from '../../schema/expedition.js';
