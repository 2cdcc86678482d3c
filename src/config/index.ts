/**
 * Centralized configuration exports
 *
 * This file serves as the main entry point for all configuration data,
 * providing a single import location for other modules.
 */

export * from './app.js';
export * from './proxy.js';
