export { createLogReporter } from './log-reporter.js';
export type { ErrorHandler } from './log-reporter.js';
