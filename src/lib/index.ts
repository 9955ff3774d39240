/**
 * ca-loadgen library - core exports
 */

// Runner
export {
  runLoadTest,
  validateLoadTestOptions,
  ensureOutputDirectory,
  type LoadTestOptions,
  type LoadTestResult,
  type LoadTestPhase,
} from './run/load-test.js';
export { runGenerationStage } from './run/generation-stage.js';
export { runSubmissionStage } from './run/submission-stage.js';
export { runWithConcurrency, type PoolOutcome } from './run/worker-pool.js';
export { OutcomeCollector, errorStageFor } from './run/outcome-collector.js';
export type { StageOptions, StageOutcome, StageProgress } from './run/stage.js';
export {
  summarizeRun,
  renderRunReport,
  formatErrorMessage,
  formatDuration,
  formatRate,
  type RunReport,
  type RunSummaryInput,
} from './run/run-report.js';

// Requests
export {
  buildRequestSpec,
  buildRequestSpecs,
  commonNameFor,
  newSubjectId,
} from './request/spec-builder.js';
export {
  renderRequestDescriptor,
  keyUsageMask,
  type DescriptorOptions,
} from './request/descriptor.js';
export { parseCaRequestId, type CaRequestIdResult } from './request/request-id.js';

// Enrollment
export {
  CertreqEnrollmentClient,
  artifactPaths,
  caConfigString,
  type CertreqClientOptions,
} from './enrollment/certreq-client.js';
export {
  execFileRunner,
  commandOutput,
  type CommandRunner,
  type CommandResult,
  type CommandOptions,
} from './enrollment/command-runner.js';
export {
  REQUEST_GENERATORS,
  type EnrollmentClient,
  type RequestArtifact,
  type RequestGenerator,
  type SubmissionResponse,
} from './enrollment/types.js';
export { createLoadTestCsr, type LoadTestCsr } from './crypto/csr.js';

// Errors
export {
  LoadTestError,
  CreationError,
  SubmissionError,
  UnexpectedError,
  SetupError,
  ValidationError,
} from './errors/load-test-errors.js';

// Types
export {
  REQUEST_STAGE,
  ERROR_STAGE,
  type RequestStage,
  type ErrorStage,
  type RequestSpec,
  type RequestRecord,
  type ErrorRecord,
  type IssuedCertificate,
  type CaTarget,
} from './types/request.js';

export * from './constants/defaults.js';
