export { logger, createLogger } from './logger.js';
export { sleep } from './sleep.js';
