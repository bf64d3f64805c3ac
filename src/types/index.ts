export * from './content.js';
export * from './workflow.js';
