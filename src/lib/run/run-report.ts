/**
 * Run report
 *
 * Aggregates the outcome of both stages once they are done. The rate is
 * submission throughput: submitted requests per second of submission-phase
 * elapsed time. With no measurable elapsed time the rate is null, rendered
 * as "unavailable".
 */

import { ERROR_MESSAGE_MAX_LENGTH } from '../constants/defaults.js';
import type { ErrorRecord } from '../types/request.js';

export interface RunReport {
  readonly totalRequested: number;
  readonly generated: number;
  readonly submitted: number;
  /** Requests with at least one error record */
  readonly failed: number;
  /** Requests never attempted because the run was cancelled */
  readonly cancelled: number;
  readonly errors: readonly ErrorRecord[];
  /** Submission-phase elapsed time */
  readonly elapsedMs: number;
  readonly generationElapsedMs: number;
  readonly ratePerSecond: number | null;
}

export interface RunSummaryInput {
  totalRequested: number;
  generated: number;
  submitted: number;
  errors: readonly ErrorRecord[];
  elapsedMs: number;
  generationElapsedMs?: number;
  cancelled?: number;
}

export function summarizeRun(input: RunSummaryInput): RunReport {
  const failed = new Set(input.errors.map((e) => e.subjectId)).size;
  const ratePerSecond = input.elapsedMs > 0 ? input.submitted / (input.elapsedMs / 1000) : null;

  return Object.freeze({
    totalRequested: input.totalRequested,
    generated: input.generated,
    submitted: input.submitted,
    failed,
    cancelled: input.cancelled ?? 0,
    errors: Object.freeze([...input.errors]),
    elapsedMs: input.elapsedMs,
    generationElapsedMs: input.generationElapsedMs ?? 0,
    ratePerSecond,
  });
}

/** Collapse whitespace and cap length of a tool diagnostic. */
export function formatErrorMessage(message: string, maxLength = ERROR_MESSAGE_MAX_LENGTH): string {
  const flat = message.replace(/\s+/g, ' ').trim();
  if (flat.length <= maxLength) return flat;
  return flat.slice(0, maxLength - 3) + '...';
}

export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

export function formatRate(ratePerSecond: number | null): string {
  return ratePerSecond === null ? 'unavailable' : `${ratePerSecond.toFixed(2)} requests/s`;
}

/** Plain-text report, one entry per line. */
export function renderRunReport(report: RunReport): string[] {
  const lines = [
    '=== CA Load Test Report ===',
    `Requested:       ${report.totalRequested}`,
    `Generated:       ${report.generated}`,
    `Submitted:       ${report.submitted}`,
    `Failed:          ${report.failed}`,
  ];
  if (report.cancelled > 0) lines.push(`Cancelled:       ${report.cancelled}`);
  lines.push(
    `Generation time: ${formatDuration(report.generationElapsedMs)}`,
    `Submission time: ${formatDuration(report.elapsedMs)}`,
    `Rate:            ${formatRate(report.ratePerSecond)}`,
  );

  if (report.errors.length) {
    lines.push('', `Errors (${report.errors.length}):`);
    for (const error of report.errors) {
      lines.push(
        `[${error.timestamp.toISOString()}] ${error.subjectId} (${error.stage})`,
        `  ${formatErrorMessage(error.message)}`,
      );
    }
  }
  return lines;
}
