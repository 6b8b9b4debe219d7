export * from './types.js';
export * from './interfaces/logger.js';
export * from './interfaces/subject.js';
export * from './interfaces/context.js';
