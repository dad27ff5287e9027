export * from './lib/trends.types';
export * from './lib/request-plan.types';
export * from './lib/lookup.types';
export * from './lib/api.types';
