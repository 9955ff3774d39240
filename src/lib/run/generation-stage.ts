/**
 * Generation stage
 *
 * Turns request specs into request blobs on disk through a bounded worker pool.
 * A failed item is recorded and never reaches submission.
 */

import { DEFAULT_GENERATION_CONCURRENCY } from '../constants/defaults.js';
import type { EnrollmentClient } from '../enrollment/types.js';
import {
  ERROR_STAGE,
  REQUEST_STAGE,
  type RequestRecord,
  type RequestSpec,
} from '../types/request.js';
import { debugGeneration } from '../utils/debug.js';
import { OutcomeCollector } from './outcome-collector.js';
import type { StageOptions, StageOutcome } from './stage.js';
import { runWithConcurrency } from './worker-pool.js';

export async function runGenerationStage(
  client: EnrollmentClient,
  specs: readonly RequestSpec[],
  options: StageOptions = {},
): Promise<StageOutcome<RequestRecord>> {
  const now = options.now ?? Date.now;
  const concurrency = options.concurrency ?? DEFAULT_GENERATION_CONCURRENCY;
  const collector = new OutcomeCollector<RequestRecord>(ERROR_STAGE.GENERATION, now);
  const started = now();

  debugGeneration('generating %d requests (concurrency %d)', specs.length, concurrency);

  const pool = await runWithConcurrency(
    specs,
    concurrency,
    async (spec) => {
      const record: RequestRecord = {
        id: spec.id,
        commonName: spec.commonName,
        templateName: spec.templateName,
        stage: REQUEST_STAGE.CREATED,
      };
      try {
        const artifact = await client.create(spec);
        record.stage = REQUEST_STAGE.GENERATED;
        record.artifactPath = artifact.requestPath;
        collector.succeed(record);
      } catch (e) {
        record.stage = REQUEST_STAGE.FAILED;
        const error = collector.fail(spec.id, e);
        debugGeneration('%s failed (%s): %s', spec.commonName, error.stage, error.message);
      }
      options.onProgress?.({
        completed: collector.resultCount + collector.errorCount,
        succeeded: collector.resultCount,
        failed: collector.errorCount,
        total: specs.length,
      });
    },
    options.signal,
  );

  const { results, errors } = collector.snapshot();
  const elapsedMs = now() - started;
  debugGeneration(
    'generated %d, failed %d, cancelled %d in %dms',
    results.length,
    errors.length,
    pool.skipped,
    elapsedMs,
  );
  return { results, errors, cancelled: pool.skipped, elapsedMs };
}
