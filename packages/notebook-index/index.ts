/**
 * Notebook Index - incremental semantic and exact search over notebook pages.
 *
 * @packageDocumentation
 */

export * from './src/index.js';
