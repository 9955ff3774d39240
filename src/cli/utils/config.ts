/**
 * Run option resolution: CLI flag, then environment variable, then default.
 */

import {
  DEFAULT_CERTREQ_PATH,
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_GENERATION_CONCURRENCY,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_REQUEST_COUNT,
  DEFAULT_SUBMISSION_CONCURRENCY,
  REQUEST_GENERATORS,
  ValidationError,
  type RequestGenerator,
} from '../../index.js';

/** Raw flags as commander hands them over. */
export interface RunCommandOptions {
  caServer?: string;
  caName?: string;
  template?: string;
  count?: string;
  output?: string;
  concurrency?: string;
  generationConcurrency?: string;
  submissionConcurrency?: string;
  generator?: string;
  certreq?: string;
  timeout?: string;
  userKeySet?: boolean;
}

export interface ResolvedRunOptions {
  caServer?: string;
  caName?: string;
  templateName?: string;
  count: number;
  outputDir: string;
  generationConcurrency: number;
  submissionConcurrency: number;
  generator: RequestGenerator;
  certreqPath: string;
  timeoutMs: number;
  machineKeySet: boolean;
}

export const ENV = {
  CA_SERVER: 'CA_LOADGEN_CA_SERVER',
  CA_NAME: 'CA_LOADGEN_CA_NAME',
  TEMPLATE: 'CA_LOADGEN_TEMPLATE',
  CONCURRENCY: 'CA_LOADGEN_CONCURRENCY',
  CERTREQ: 'CA_LOADGEN_CERTREQ',
} as const;

type Env = Record<string, string | undefined>;

export function parseIntegerOption(
  field: string,
  raw: string | undefined,
  fallback: number,
  min: number,
): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    throw ValidationError.invalid(field, raw, `an integer >= ${min}`);
  }
  return value;
}

function isRequestGenerator(value: string): value is RequestGenerator {
  return REQUEST_GENERATORS.some((generator) => generator === value);
}

function nonEmpty(...values: (string | undefined)[]): string | undefined {
  return values.map((v) => v?.trim()).find((v) => v);
}

export function resolveRunOptions(opts: RunCommandOptions, env: Env = process.env): ResolvedRunOptions {
  const sharedConcurrency = opts.concurrency ?? env[ENV.CONCURRENCY];
  const generator = opts.generator ?? 'certreq';
  if (!isRequestGenerator(generator)) {
    throw ValidationError.invalid('generator', generator, REQUEST_GENERATORS.join(' or '));
  }

  const caServer = nonEmpty(opts.caServer, env[ENV.CA_SERVER]);
  const caName = nonEmpty(opts.caName, env[ENV.CA_NAME]);
  const templateName = nonEmpty(opts.template, env[ENV.TEMPLATE]);

  return {
    ...(caServer && { caServer }),
    ...(caName && { caName }),
    ...(templateName && { templateName }),
    count: parseIntegerOption('count', opts.count, DEFAULT_REQUEST_COUNT, 0),
    outputDir: nonEmpty(opts.output) ?? DEFAULT_OUTPUT_DIR,
    generationConcurrency: parseIntegerOption(
      'generation-concurrency',
      opts.generationConcurrency,
      parseIntegerOption('concurrency', sharedConcurrency, DEFAULT_GENERATION_CONCURRENCY, 1),
      1,
    ),
    submissionConcurrency: parseIntegerOption(
      'submission-concurrency',
      opts.submissionConcurrency,
      parseIntegerOption('concurrency', sharedConcurrency, DEFAULT_SUBMISSION_CONCURRENCY, 1),
      1,
    ),
    generator,
    certreqPath: nonEmpty(opts.certreq, env[ENV.CERTREQ]) ?? DEFAULT_CERTREQ_PATH,
    timeoutMs: parseIntegerOption('timeout', opts.timeout, DEFAULT_COMMAND_TIMEOUT_MS, 1),
    machineKeySet: !opts.userKeySet,
  };
}
