import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync } from 'fs';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  CertreqEnrollmentClient,
  CreationError,
  SubmissionError,
  buildRequestSpec,
  caConfigString,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from '../../src/index.js';
import { makeTempDir, removeTempDir, testTarget } from '../test-utils.js';

interface RunnerCall {
  file: string;
  args: readonly string[];
  opts: CommandOptions;
}

function fakeRunner(handler: (args: readonly string[]) => Promise<CommandResult>) {
  const calls: RunnerCall[] = [];
  const runner: CommandRunner = async (file, args, opts) => {
    calls.push({ file, args, opts });
    return handler(args);
  };
  return { runner, calls };
}

const ok = (stdout = ''): CommandResult => ({ exitCode: 0, stdout, stderr: '' });

describe('CertreqEnrollmentClient', () => {
  let dir: string;
  const spec = buildRequestSpec('WebServer', 'abc');

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('create', () => {
    it('runs certreq -new on a descriptor and removes it afterwards', async () => {
      const descriptorPath = join(dir, 'LoadTestCert-abc.inf');
      const requestPath = join(dir, 'LoadTestCert-abc.req');
      let descriptorSeen = '';
      const { runner, calls } = fakeRunner(async () => {
        descriptorSeen = await readFile(descriptorPath, 'utf-8');
        await writeFile(requestPath, '-----BEGIN NEW CERTIFICATE REQUEST-----');
        return ok('CertReq: Request Created');
      });
      const client = new CertreqEnrollmentClient({ outputDir: dir, runner, timeoutMs: 5_000 });

      const artifact = await client.create(spec);

      expect(artifact).toEqual({ subjectId: 'abc', requestPath });
      expect(calls).toHaveLength(1);
      expect(calls[0].file).toBe('certreq');
      expect(calls[0].args).toEqual(['-new', '-q', '-f', descriptorPath, requestPath]);
      expect(calls[0].opts.timeoutMs).toBe(5_000);
      expect(descriptorSeen).toContain('Subject = "CN=LoadTestCert-abc"');
      expect(existsSync(descriptorPath)).toBe(false);
      expect(existsSync(requestPath)).toBe(true);
    });

    it('raises a CreationError with the tool output on a non-zero exit', async () => {
      const { runner } = fakeRunner(async () => ({
        exitCode: 1,
        stdout: '',
        stderr: '  Template not found. 0x80094800  ',
      }));
      const client = new CertreqEnrollmentClient({ outputDir: dir, runner });

      const attempt = client.create(spec);
      await expect(attempt).rejects.toBeInstanceOf(CreationError);
      await expect(attempt).rejects.toThrow(
        'Request generation failed (exit code 1): Template not found. 0x80094800',
      );
      expect(existsSync(join(dir, 'LoadTestCert-abc.inf'))).toBe(false);
    });

    it('passes through failures to start the tool', async () => {
      const { runner } = fakeRunner(async () => {
        throw Object.assign(new Error('spawn certreq ENOENT'), { code: 'ENOENT' });
      });
      const client = new CertreqEnrollmentClient({ outputDir: dir, runner });

      const attempt = client.create(spec);
      await expect(attempt).rejects.toThrow('spawn certreq ENOENT');
      await expect(attempt).rejects.not.toBeInstanceOf(CreationError);
      expect(existsSync(join(dir, 'LoadTestCert-abc.inf'))).toBe(false);
    });

    it('uses the configured certreq path', async () => {
      const { runner, calls } = fakeRunner(async () => ok());
      const client = new CertreqEnrollmentClient({
        outputDir: dir,
        runner,
        certreqPath: 'C:\\Windows\\System32\\certreq.exe',
      });
      await client.create(spec);
      expect(calls[0].file).toBe('C:\\Windows\\System32\\certreq.exe');
    });

    it('generates the request in process with the x509 generator', async () => {
      const { runner, calls } = fakeRunner(async () => ok());
      const client = new CertreqEnrollmentClient({ outputDir: dir, runner, generator: 'x509' });

      const artifact = await client.create(spec);

      expect(calls).toEqual([]);
      const pem = await readFile(artifact.requestPath, 'utf-8');
      expect(pem.startsWith('-----BEGIN CERTIFICATE REQUEST-----')).toBe(true);
      expect(existsSync(join(dir, 'LoadTestCert-abc.inf'))).toBe(false);
    });
  });

  describe('submit', () => {
    const requestPath = () => join(dir, 'LoadTestCert-abc.req');

    it('submits to the CA config with the template attribute', async () => {
      const certificatePath = join(dir, 'LoadTestCert-abc.cer');
      const { runner, calls } = fakeRunner(async () => {
        await writeFile(certificatePath, '-----BEGIN CERTIFICATE-----');
        return ok('RequestId: 77\r\nCertificate retrieved(Issued) Issued\r\n');
      });
      const client = new CertreqEnrollmentClient({ outputDir: dir, runner });

      const response = await client.submit(
        { subjectId: 'abc', requestPath: requestPath() },
        testTarget,
      );

      expect(calls[0].args).toEqual([
        '-submit',
        '-q',
        '-f',
        '-config',
        'ca01.example.test\\Test Issuing CA',
        '-attrib',
        'CertificateTemplate:WebServer',
        requestPath(),
        certificatePath,
      ]);
      expect(response).toEqual({
        output: 'RequestId: 77\r\nCertificate retrieved(Issued) Issued\r\n',
        certificatePath,
      });
    });

    it('leaves the certificate path out when nothing was issued yet', async () => {
      const { runner } = fakeRunner(async () => ok('RequestId: 78\r\nTaken Under Submission'));
      const client = new CertreqEnrollmentClient({ outputDir: dir, runner });

      const response = await client.submit(
        { subjectId: 'abc', requestPath: requestPath() },
        testTarget,
      );
      expect(response).toEqual({ output: 'RequestId: 78\r\nTaken Under Submission' });
    });

    it('raises a SubmissionError when the CA denies the request', async () => {
      const { runner } = fakeRunner(async () => ({
        exitCode: 2,
        stdout: 'RequestId: 79',
        stderr: 'Denied by Policy Module',
      }));
      const client = new CertreqEnrollmentClient({ outputDir: dir, runner });

      await expect(
        client.submit({ subjectId: 'abc', requestPath: requestPath() }, testTarget),
      ).rejects.toThrow(
        new SubmissionError('Submission failed (exit code 2): RequestId: 79\nDenied by Policy Module'),
      );
    });

    it('passes only the per-call timeout to the runner', async () => {
      const { runner, calls } = fakeRunner(async () => ok());
      const client = new CertreqEnrollmentClient({ outputDir: dir, runner, timeoutMs: 750 });

      await client.submit({ subjectId: 'abc', requestPath: requestPath() }, testTarget);
      expect(calls[0].opts).toEqual({ timeoutMs: 750 });
    });
  });
});

describe('caConfigString', () => {
  it('joins server and CA name with a backslash', () => {
    expect(caConfigString({ caServer: 'ca01', caName: 'Issuing CA 1' })).toBe('ca01\\Issuing CA 1');
  });
});
