/**
 * CLI Parser - Main entry point
 * Re-exports all parser functions and types
 */

export * from './argumentParser.js';
export * from './formatResolver.js';
export * from './actionSelector.js';
export * from './helpText.js';
