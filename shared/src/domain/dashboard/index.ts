export * from './summaries.js';
