/**
 * certreq-backed enrollment client
 *
 * create: `certreq -new -q -f <inf> <req>` (or in-process generation with @peculiar/x509)
 * submit: `certreq -submit -q -f -config <server\ca> -attrib CertificateTemplate:<t> <req> <cer>`
 *
 * Every artifact is named after the request's common name, so concurrent workers
 * never touch the same path.
 */

import { access, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  DEFAULT_CERTREQ_PATH,
  DEFAULT_COMMAND_TIMEOUT_MS,
} from '../constants/defaults.js';
import { createLoadTestCsr } from '../crypto/csr.js';
import { CreationError, SubmissionError } from '../errors/load-test-errors.js';
import { renderRequestDescriptor, type DescriptorOptions } from '../request/descriptor.js';
import type { CaTarget, RequestSpec } from '../types/request.js';
import { debugCertreq, debugX509 } from '../utils/debug.js';
import {
  commandOutput,
  execFileRunner,
  type CommandResult,
  type CommandRunner,
} from './command-runner.js';
import type {
  EnrollmentClient,
  RequestArtifact,
  RequestGenerator,
  SubmissionResponse,
} from './types.js';

export interface CertreqClientOptions {
  /** Directory receiving descriptors, request blobs and issued certificates */
  outputDir: string;
  /** certreq executable (default: certreq on PATH) */
  certreqPath?: string;
  /** Per-invocation timeout in ms (default: 2 minutes) */
  timeoutMs?: number;
  /** Who creates the request blob (default: certreq) */
  generator?: RequestGenerator;
  descriptor?: DescriptorOptions;
  /** Process runner, replaceable for tests */
  runner?: CommandRunner;
}

/** CA config string understood by certreq's -config switch. */
export function caConfigString(target: Pick<CaTarget, 'caServer' | 'caName'>): string {
  return `${target.caServer}\\${target.caName}`;
}

export function artifactPaths(outputDir: string, commonName: string) {
  return {
    descriptorPath: join(outputDir, `${commonName}.inf`),
    requestPath: join(outputDir, `${commonName}.req`),
    certificatePath: join(outputDir, `${commonName}.cer`),
  };
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class CertreqEnrollmentClient implements EnrollmentClient {
  private readonly certreqPath: string;
  private readonly timeoutMs: number;
  private readonly generator: RequestGenerator;
  private readonly runner: CommandRunner;

  constructor(private readonly opts: CertreqClientOptions) {
    this.certreqPath = opts.certreqPath ?? DEFAULT_CERTREQ_PATH;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.generator = opts.generator ?? 'certreq';
    this.runner = opts.runner ?? execFileRunner;
  }

  async create(spec: RequestSpec): Promise<RequestArtifact> {
    const { descriptorPath, requestPath } = artifactPaths(this.opts.outputDir, spec.commonName);

    if (this.generator === 'x509') {
      return this.createInProcess(spec, requestPath);
    }

    try {
      await writeFile(descriptorPath, renderRequestDescriptor(spec, this.opts.descriptor));
      const result = await this.run(['-new', '-q', '-f', descriptorPath, requestPath]);
      if (result.exitCode !== 0) {
        throw CreationError.toolFailed(spec.id, result.exitCode, commandOutput(result));
      }
      return { subjectId: spec.id, requestPath };
    } finally {
      await rm(descriptorPath, { force: true });
    }
  }

  async submit(artifact: RequestArtifact, target: CaTarget): Promise<SubmissionResponse> {
    const certificatePath = artifact.requestPath.replace(/\.req$/i, '') + '.cer';
    const result = await this.run([
      '-submit',
      '-q',
      '-f',
      '-config',
      caConfigString(target),
      '-attrib',
      `CertificateTemplate:${target.templateName}`,
      artifact.requestPath,
      certificatePath,
    ]);
    if (result.exitCode !== 0) {
      throw SubmissionError.toolFailed(artifact.subjectId, result.exitCode, commandOutput(result));
    }

    const issued = await fileExists(certificatePath);
    return {
      output: result.stdout,
      ...(issued && { certificatePath }),
    };
  }

  private async createInProcess(spec: RequestSpec, requestPath: string): Promise<RequestArtifact> {
    let pem: string;
    try {
      ({ pem } = await createLoadTestCsr(spec));
    } catch (e) {
      throw CreationError.generatorFailed(spec.id, e);
    }
    debugX509('generated request for %s', spec.commonName);
    await writeFile(requestPath, pem);
    return { subjectId: spec.id, requestPath };
  }

  private async run(args: string[]): Promise<CommandResult> {
    debugCertreq('%s %s', this.certreqPath, args.join(' '));
    const started = Date.now();
    const result = await this.runner(this.certreqPath, args, { timeoutMs: this.timeoutMs });
    debugCertreq('exit %s in %dms', result.exitCode, Date.now() - started);
    return result;
  }
}
