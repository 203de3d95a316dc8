export * from './types/job.js';
export * from './schemas/index.js';
