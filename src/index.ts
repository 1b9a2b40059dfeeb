export * from './config/index.js';
export * from './requirements/index.js';
export * from './submissions/index.js';
export * from './graders/index.js';
export * from './inference/index.js';
export * from './report/index.js';
export * from './pipeline/index.js';
