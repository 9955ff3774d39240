/**
 * ca-loadgen - AD CS enrollment load generator
 *
 * Main entry point for library use; the CLI lives in ./cli.ts
 */

export * from './lib/index.js';
