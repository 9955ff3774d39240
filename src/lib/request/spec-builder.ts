import { randomUUID } from 'node:crypto';
import { HASH_ALGORITHM, KEY_LENGTH, SUBJECT_PREFIX } from '../constants/defaults.js';
import { ValidationError } from '../errors/load-test-errors.js';
import type { RequestSpec } from '../types/request.js';

/** Fresh subject id for one request. */
export function newSubjectId(): string {
  return randomUUID();
}

/** Common name carried by every load test request. */
export function commonNameFor(id: string): string {
  return `${SUBJECT_PREFIX}${id}`;
}

/**
 * Build the logical content of one enrollment request.
 * Pure: the caller supplies a unique id.
 */
export function buildRequestSpec(templateName: string, id: string): RequestSpec {
  if (!templateName?.trim()) throw ValidationError.required('templateName');
  if (!id?.trim()) throw ValidationError.required('id');

  const commonName = commonNameFor(id);
  return {
    id,
    commonName,
    subject: `CN=${commonName}`,
    templateName,
    key: { algorithm: 'RSA', length: KEY_LENGTH, exportable: false },
    hashAlgorithm: HASH_ALGORITHM,
    keyUsage: ['digitalSignature'],
  };
}

/** Build `count` specs, each with a freshly drawn id. */
export function buildRequestSpecs(
  templateName: string,
  count: number,
  nextId: () => string = newSubjectId,
): RequestSpec[] {
  const specs: RequestSpec[] = [];
  for (let i = 0; i < count; i++) {
    specs.push(buildRequestSpec(templateName, nextId()));
  }
  return specs;
}
