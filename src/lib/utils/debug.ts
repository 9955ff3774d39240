/**
 * Debug logging for ca-loadgen
 *
 * Enable with the DEBUG environment variable:
 *
 * DEBUG=ca-loadgen:* - All debug output
 * DEBUG=ca-loadgen:certreq - Only certreq invocations
 * DEBUG=ca-loadgen:generation,ca-loadgen:submission - Stage progress
 */

import debug from 'debug';

const createDebugger = (namespace: string) => debug(`ca-loadgen:${namespace}`);

export const debugGeneration = createDebugger('generation');
export const debugSubmission = createDebugger('submission');
export const debugCertreq = createDebugger('certreq');
export const debugX509 = createDebugger('x509');
export const debugRun = createDebugger('run');
