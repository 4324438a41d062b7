export * from './client.js';
export * from './detect.js';
