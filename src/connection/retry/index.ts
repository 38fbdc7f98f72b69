export { RetryHandler, createRetryHandler } from './retry-handler.js';
export type { RetryOutcome } from './retry-handler.js';
