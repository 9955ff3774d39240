/**
 * Load test runner
 *
 * Phase 1 generates every request; only once it has finished does phase 2
 * submit the generated ones. Item failures are recorded, never thrown. The only
 * fatal errors are invalid options and an output directory that cannot be created,
 * both raised before any request is generated.
 */

import { mkdir } from 'node:fs/promises';
import {
  DEFAULT_GENERATION_CONCURRENCY,
  DEFAULT_SUBMISSION_CONCURRENCY,
} from '../constants/defaults.js';
import type { EnrollmentClient } from '../enrollment/types.js';
import { SetupError, ValidationError } from '../errors/load-test-errors.js';
import { buildRequestSpecs, newSubjectId } from '../request/spec-builder.js';
import type { CaTarget, IssuedCertificate, RequestRecord } from '../types/request.js';
import { debugRun } from '../utils/debug.js';
import { runGenerationStage } from './generation-stage.js';
import { summarizeRun, type RunReport } from './run-report.js';
import type { StageProgress } from './stage.js';
import { runSubmissionStage } from './submission-stage.js';

export type LoadTestPhase = 'generation' | 'submission';

export interface LoadTestOptions extends CaTarget {
  client: EnrollmentClient;
  /** Number of requests to generate */
  count: number;
  outputDir: string;
  generationConcurrency?: number;
  submissionConcurrency?: number;
  signal?: AbortSignal;
  now?: () => number;
  /** Subject id source (default: random UUID) */
  nextId?: () => string;
  onPhaseStart?: (phase: LoadTestPhase, total: number) => void;
  onProgress?: (phase: LoadTestPhase, progress: StageProgress) => void;
}

export interface LoadTestResult {
  report: RunReport;
  generated: readonly RequestRecord[];
  issued: readonly IssuedCertificate[];
}

function assertCount(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw ValidationError.invalid(field, value, `an integer >= ${min}`);
  }
}

export function validateLoadTestOptions(options: LoadTestOptions): void {
  assertCount('count', options.count, 0);
  assertCount(
    'generationConcurrency',
    options.generationConcurrency ?? DEFAULT_GENERATION_CONCURRENCY,
    1,
  );
  assertCount(
    'submissionConcurrency',
    options.submissionConcurrency ?? DEFAULT_SUBMISSION_CONCURRENCY,
    1,
  );
  if (!options.caServer?.trim()) throw ValidationError.required('caServer');
  if (!options.caName?.trim()) throw ValidationError.required('caName');
  if (!options.templateName?.trim()) throw ValidationError.required('templateName');
  if (!options.outputDir?.trim()) throw ValidationError.required('outputDir');
}

export async function ensureOutputDirectory(path: string): Promise<void> {
  try {
    await mkdir(path, { recursive: true });
  } catch (e) {
    throw SetupError.outputDirectory(path, e);
  }
}

export async function runLoadTest(options: LoadTestOptions): Promise<LoadTestResult> {
  validateLoadTestOptions(options);
  await ensureOutputDirectory(options.outputDir);

  const { client, signal, now } = options;
  const target: CaTarget = {
    caServer: options.caServer,
    caName: options.caName,
    templateName: options.templateName,
  };
  const specs = buildRequestSpecs(options.templateName, options.count, options.nextId ?? newSubjectId);

  debugRun('phase 1: %d requests into %s', specs.length, options.outputDir);
  options.onPhaseStart?.('generation', specs.length);
  const generation = await runGenerationStage(client, specs, {
    concurrency: options.generationConcurrency ?? DEFAULT_GENERATION_CONCURRENCY,
    ...(signal && { signal }),
    ...(now && { now }),
    onProgress: (progress) => options.onProgress?.('generation', progress),
  });

  debugRun('phase 2: %d requests to %s\\%s', generation.results.length, target.caServer, target.caName);
  options.onPhaseStart?.('submission', generation.results.length);
  const submission = await runSubmissionStage(client, generation.results, target, {
    concurrency: options.submissionConcurrency ?? DEFAULT_SUBMISSION_CONCURRENCY,
    ...(signal && { signal }),
    ...(now && { now }),
    onProgress: (progress) => options.onProgress?.('submission', progress),
  });

  const report = summarizeRun({
    totalRequested: specs.length,
    generated: generation.results.length,
    submitted: submission.results.length,
    errors: [...generation.errors, ...submission.errors],
    elapsedMs: submission.elapsedMs,
    generationElapsedMs: generation.elapsedMs,
    cancelled: generation.cancelled + submission.cancelled,
  });

  return { report, generated: generation.results, issued: submission.results };
}
