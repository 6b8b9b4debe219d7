export * from './logger.js';
export * from './subject.js';
export * from './context.js';
