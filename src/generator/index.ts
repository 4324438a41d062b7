export * from './readme.js';
export * from './report.js';
