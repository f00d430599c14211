export * from './model';
export * from './errors';
export * from './config/loader';
export * from './analysis/source-locator';
export * from './analysis/context';
export * from './analysis/attribution';
export * from './analysis/aggregator';
export * from './filters/parser';
export * from './filters/predicates';
export * from './filters/compiler';
export * from './tree/arena';
export * from './tree/menu';
export * from './tree/controller';
export * from './render/colors';
export * from './render/format';
export * from './profiling/sampler';
export * from './profiling/track';
