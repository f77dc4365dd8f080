export * from './palette.js';
export * from './format.js';
export * from './viewport.js';
