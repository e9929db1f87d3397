/**
 * Fleetplan — Type Exports
 */

export * from './common.js';
export * from './fleet.js';
export * from './scoring.js';
export * from './negotiation.js';
export * from './cycle.js';
export * from './config.js';
