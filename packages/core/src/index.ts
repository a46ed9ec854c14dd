/**
 * @homesync/core - device model, errors and the in-memory device store
 *
 * @packageDocumentation
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './store/index.js';
