export { logger } from './logger.js';
export { withSpan } from './tracing.js';
export { sleep, isAbortError } from './sleep.js';
