import type { CaTarget, RequestSpec } from '../types/request.js';

/**
 * Opaque reference to a generated request blob
 */
export interface RequestArtifact {
  subjectId: string;
  /** Path of the request blob (PKCS#10, base64) */
  requestPath: string;
}

/**
 * Raw outcome of a successful submission
 */
export interface SubmissionResponse {
  /** Free-text response of the enrollment tool, parsed for the CA request id */
  output: string;
  /** Issued certificate file, absent when the CA left the request pending */
  certificatePath?: string;
}

/**
 * External enrollment collaborator
 *
 * Implementations throw CreationError / SubmissionError for tool- or CA-reported
 * failures; anything else they throw is recorded as unexpected.
 */
export interface EnrollmentClient {
  create(spec: RequestSpec): Promise<RequestArtifact>;
  submit(artifact: RequestArtifact, target: CaTarget): Promise<SubmissionResponse>;
}

export type RequestGenerator = 'certreq' | 'x509';

export const REQUEST_GENERATORS: readonly RequestGenerator[] = ['certreq', 'x509'];
