/**
 * Load Test Request Types
 *
 * Records describing one synthetic enrollment request as it moves through a run.
 */

/**
 * Request record lifecycle
 *
 * created -> generated -> submitted
 *    |-> failed   |-> failed
 */
export const REQUEST_STAGE = {
  CREATED: 'created',
  GENERATED: 'generated',
  SUBMITTED: 'submitted',
  FAILED: 'failed',
} as const;

export type RequestStage = (typeof REQUEST_STAGE)[keyof typeof REQUEST_STAGE];

/**
 * Phase an error record is attributed to
 */
export const ERROR_STAGE = {
  GENERATION: 'generation',
  SUBMISSION: 'submission',
  UNEXPECTED: 'unexpected',
} as const;

export type ErrorStage = (typeof ERROR_STAGE)[keyof typeof ERROR_STAGE];

/**
 * Logical content of one enrollment request
 */
export interface RequestSpec {
  /** Unique subject id (fresh UUID per request) */
  id: string;
  /** LoadTestCert-<id> */
  commonName: string;
  /** Distinguished name, CN=<commonName> */
  subject: string;
  templateName: string;
  key: {
    algorithm: 'RSA';
    length: 2048;
    exportable: boolean;
  };
  hashAlgorithm: 'sha256';
  keyUsage: readonly 'digitalSignature'[];
}

export interface RequestRecord {
  id: string;
  commonName: string;
  templateName: string;
  stage: RequestStage;
  /** Request blob on disk, set once generated */
  artifactPath?: string;
}

export interface ErrorRecord {
  readonly subjectId: string;
  readonly stage: ErrorStage;
  readonly message: string;
  readonly timestamp: Date;
}

export interface IssuedCertificate {
  subjectId: string;
  /** Empty when the CA response carried no request id */
  caRequestId: string;
  certificatePath?: string;
}

/**
 * CA endpoint and template a run submits to
 */
export interface CaTarget {
  /** Host name of the CA server */
  caServer: string;
  /** CA common name as configured in AD CS */
  caName: string;
  templateName: string;
}
