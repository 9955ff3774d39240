/**
 * Default configuration constants for ca-loadgen
 *
 * Used as fallbacks when neither a CLI flag nor an environment variable is set.
 */

// Run size
export const DEFAULT_REQUEST_COUNT = 100;
export const DEFAULT_OUTPUT_DIR = './loadtest-output';

// Worker pools
export const DEFAULT_GENERATION_CONCURRENCY = 4;
export const DEFAULT_SUBMISSION_CONCURRENCY = 4;

// certreq invocation
export const DEFAULT_CERTREQ_PATH = 'certreq';
export const DEFAULT_COMMAND_TIMEOUT_MS = 120_000; // 2 minutes
export const DEFAULT_PROVIDER_NAME = 'Microsoft RSA SChannel Cryptographic Provider';

// Request content
export const SUBJECT_PREFIX = 'LoadTestCert-';
export const KEY_LENGTH = 2048;
export const HASH_ALGORITHM = 'sha256';

// Report rendering
export const ERROR_MESSAGE_MAX_LENGTH = 500;
