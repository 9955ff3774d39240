import { describe, it, expect } from '@jest/globals';
import { runSubmissionStage, type RequestRecord } from '../../src/index.js';
import { FakeEnrollmentClient, testTarget } from '../test-utils.js';

function generatedRecords(count: number): RequestRecord[] {
  return Array.from({ length: count }, (_, i): RequestRecord => ({
    id: `id-${i + 1}`,
    commonName: `LoadTestCert-id-${i + 1}`,
    templateName: 'WebServer',
    stage: 'generated',
    artifactPath: `/fake/LoadTestCert-id-${i + 1}.req`,
  }));
}

describe('runSubmissionStage', () => {
  it('issues a certificate with a CA request id for every record', async () => {
    const client = new FakeEnrollmentClient();
    const records = generatedRecords(5);
    const outcome = await runSubmissionStage(client, records, testTarget);

    expect(outcome.results).toHaveLength(5);
    expect(outcome.errors).toEqual([]);
    expect(outcome.results.every((c) => c.caRequestId !== '')).toBe(true);
    expect(records.every((r) => r.stage === 'submitted')).toBe(true);
    expect(client.targets.every((t) => t === testTarget)).toBe(true);
  });

  it('keeps the issued certificate path', async () => {
    const outcome = await runSubmissionStage(
      new FakeEnrollmentClient({ responseFor: () => 'RequestId: 12' }),
      generatedRecords(1),
      testTarget,
    );
    expect(outcome.results).toEqual([
      {
        subjectId: 'id-1',
        caRequestId: '12',
        certificatePath: '/fake/LoadTestCert-id-1.cer',
      },
    ]);
  });

  it('records a rejected submission and still attempts the rest', async () => {
    const client = new FakeEnrollmentClient({ submitFails: ['id-2'] });
    const records = generatedRecords(5);
    const outcome = await runSubmissionStage(client, records, testTarget, { now: () => 0 });

    expect(client.submitted.sort()).toEqual(['id-1', 'id-2', 'id-3', 'id-4', 'id-5']);
    expect(outcome.results.map((c) => c.subjectId).sort()).toEqual(['id-1', 'id-3', 'id-4', 'id-5']);
    expect(outcome.errors).toEqual([
      {
        subjectId: 'id-2',
        stage: 'submission',
        message: 'Denied by Policy Module for id-2',
        timestamp: new Date(0),
      },
    ]);
    expect(records.find((r) => r.id === 'id-2')?.stage).toBe('failed');
  });

  it('counts a response without a request id as a success', async () => {
    const client = new FakeEnrollmentClient({
      responseFor: () => 'Certificate request is pending: Taken Under Submission (0)',
    });
    const outcome = await runSubmissionStage(client, generatedRecords(2), testTarget);

    expect(outcome.errors).toEqual([]);
    expect(outcome.results.map((c) => c.caRequestId)).toEqual(['', '']);
  });

  it('fails a record that has no request artifact', async () => {
    const records = generatedRecords(2);
    delete records[1].artifactPath;
    const client = new FakeEnrollmentClient();
    const outcome = await runSubmissionStage(client, records, testTarget);

    expect(client.submitted).toEqual(['id-1']);
    expect(outcome.errors).toHaveLength(1);
    expect(outcome.errors[0]).toMatchObject({
      subjectId: 'id-2',
      stage: 'submission',
      message: 'No request artifact recorded for id-2',
    });
  });

  it('measures elapsed time from stage entry', async () => {
    let clock = 1_000;
    const client = new FakeEnrollmentClient();
    const outcome = await runSubmissionStage(client, generatedRecords(3), testTarget, {
      now: () => (clock += 250),
    });
    // one reading on entry, one on exit, no error timestamps in between
    expect(outcome.elapsedMs).toBe(250);
  });

  it('lets a submission in flight at cancellation finish', async () => {
    const controller = new AbortController();
    const client = new FakeEnrollmentClient({
      responseFor: (_id, n) => {
        controller.abort();
        return `RequestId: ${n}`;
      },
    });
    const records = generatedRecords(3);
    const outcome = await runSubmissionStage(client, records, testTarget, {
      concurrency: 1,
      signal: controller.signal,
    });

    expect(outcome.results).toEqual([
      { subjectId: 'id-1', caRequestId: '1', certificatePath: '/fake/LoadTestCert-id-1.cer' },
    ]);
    expect(outcome.errors).toEqual([]);
    expect(outcome.cancelled).toBe(2);
    expect(records.map((r) => r.stage)).toEqual(['submitted', 'generated', 'generated']);
  });

  it('limits concurrent submissions to the pool size', async () => {
    const client = new FakeEnrollmentClient({ delayMs: 5 });
    await runSubmissionStage(client, generatedRecords(9), testTarget, { concurrency: 2 });
    expect(client.maxInFlight).toBe(2);
  });
});
