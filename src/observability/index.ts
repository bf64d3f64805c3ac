export { ProgressReporter } from './progress-reporter.js';
