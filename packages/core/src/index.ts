export * from './types';
export * from './schemas';
export * from './errors';
export { indexCandidates } from './utils/index-hints';
