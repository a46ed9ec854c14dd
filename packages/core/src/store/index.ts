export * from './device-store.js';
export * from './property-diff.js';
