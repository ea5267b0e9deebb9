export * from './commerce.types';
export * from './analytics.types';
export * from './common.types';
