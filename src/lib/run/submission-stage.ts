/**
 * Submission stage
 *
 * Sends every generated request to one CA endpoint through a bounded worker
 * pool. The elapsed time measured here is the basis of the reported rate.
 */

import { DEFAULT_SUBMISSION_CONCURRENCY } from '../constants/defaults.js';
import type { EnrollmentClient } from '../enrollment/types.js';
import { SubmissionError } from '../errors/load-test-errors.js';
import { parseCaRequestId } from '../request/request-id.js';
import {
  ERROR_STAGE,
  REQUEST_STAGE,
  type CaTarget,
  type IssuedCertificate,
  type RequestRecord,
} from '../types/request.js';
import { debugSubmission } from '../utils/debug.js';
import { OutcomeCollector } from './outcome-collector.js';
import type { StageOptions, StageOutcome } from './stage.js';
import { runWithConcurrency } from './worker-pool.js';

export async function runSubmissionStage(
  client: EnrollmentClient,
  records: readonly RequestRecord[],
  target: CaTarget,
  options: StageOptions = {},
): Promise<StageOutcome<IssuedCertificate>> {
  const now = options.now ?? Date.now;
  const concurrency = options.concurrency ?? DEFAULT_SUBMISSION_CONCURRENCY;
  const collector = new OutcomeCollector<IssuedCertificate>(ERROR_STAGE.SUBMISSION, now);
  const started = now();

  debugSubmission(
    'submitting %d requests to %s\\%s (concurrency %d)',
    records.length,
    target.caServer,
    target.caName,
    concurrency,
  );

  const pool = await runWithConcurrency(
    records,
    concurrency,
    async (record) => {
      try {
        if (!record.artifactPath) throw SubmissionError.missingArtifact(record.id);
        const response = await client.submit(
          { subjectId: record.id, requestPath: record.artifactPath },
          target,
        );
        const parsed = parseCaRequestId(response.output);
        if (!parsed.found) {
          debugSubmission('%s: no request id in response', record.commonName);
        }
        record.stage = REQUEST_STAGE.SUBMITTED;
        collector.succeed({
          subjectId: record.id,
          caRequestId: parsed.found ? parsed.requestId : '',
          ...(response.certificatePath && { certificatePath: response.certificatePath }),
        });
      } catch (e) {
        record.stage = REQUEST_STAGE.FAILED;
        const error = collector.fail(record.id, e);
        debugSubmission('%s failed (%s): %s', record.commonName, error.stage, error.message);
      }
      options.onProgress?.({
        completed: collector.resultCount + collector.errorCount,
        succeeded: collector.resultCount,
        failed: collector.errorCount,
        total: records.length,
      });
    },
    options.signal,
  );

  const { results, errors } = collector.snapshot();
  const elapsedMs = now() - started;
  debugSubmission(
    'submitted %d, failed %d, cancelled %d in %dms',
    results.length,
    errors.length,
    pool.skipped,
    elapsedMs,
  );
  return { results, errors, cancelled: pool.skipped, elapsedMs };
}
