/**
 * @flowqa/shared
 * Shared TypeScript types for the flowqa worker and its callers.
 * This package contains only type definitions, no runtime code.
 */

export type * from './types/api.js';
export type * from './types/flow.js';
export type * from './types/question.js';
export type * from './types/job.js';
