export * from './symbols.js';
export * from './graph.js';
