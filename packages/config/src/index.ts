/**
 * Main entry point for @contractor-connect/config
 */

export * from './constants.js';
export * from './server.js';
