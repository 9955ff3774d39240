/**
 * Load test errors
 *
 * Typed representation of every failure a load test run can record or abort on.
 * Item-level errors (creation, submission, unexpected) are recorded in the run
 * report; setup and validation errors abort the run before any request is made.
 */

/**
 * Base class for all load test errors
 */
export abstract class LoadTestError extends Error {
  abstract readonly code: string;
  abstract readonly type: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Request blob generation failed
 */
export class CreationError extends LoadTestError {
  readonly code = 'CREATION_ERROR';
  readonly type = 'creation';

  static toolFailed(subjectId: string, exitCode: number | null, output: string): CreationError {
    return new CreationError(
      `Request generation failed (exit code ${exitCode ?? 'unknown'})${output ? `: ${output}` : ''}`,
      { subjectId, exitCode },
    );
  }

  static generatorFailed(subjectId: string, cause: unknown): CreationError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new CreationError(`Request generation failed: ${reason}`, { subjectId });
  }
}

/**
 * The CA rejected the request or could not be reached
 */
export class SubmissionError extends LoadTestError {
  readonly code = 'SUBMISSION_ERROR';
  readonly type = 'submission';

  static toolFailed(subjectId: string, exitCode: number | null, output: string): SubmissionError {
    return new SubmissionError(
      `Submission failed (exit code ${exitCode ?? 'unknown'})${output ? `: ${output}` : ''}`,
      { subjectId, exitCode },
    );
  }

  static missingArtifact(subjectId: string): SubmissionError {
    return new SubmissionError(`No request artifact recorded for ${subjectId}`, { subjectId });
  }
}

/**
 * Any fault that is neither a creation nor a submission failure
 */
export class UnexpectedError extends LoadTestError {
  readonly code = 'UNEXPECTED_ERROR';
  readonly type = 'unexpected';

  static from(cause: unknown): UnexpectedError {
    if (cause instanceof UnexpectedError) return cause;
    const message = cause instanceof Error ? cause.message : String(cause);
    return new UnexpectedError(message, {
      cause: cause instanceof Error ? cause.name : typeof cause,
    });
  }
}

/**
 * The run could not be prepared (fatal, raised before generation starts)
 */
export class SetupError extends LoadTestError {
  readonly code = 'SETUP_ERROR';
  readonly type = 'setup';

  static outputDirectory(path: string, cause: unknown): SetupError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new SetupError(`Unable to create output directory ${path}: ${reason}`, { path });
  }
}

/**
 * Invalid run options or request parameters
 */
export class ValidationError extends LoadTestError {
  readonly code = 'VALIDATION_ERROR';
  readonly type = 'validation';

  static required(field: string): ValidationError {
    return new ValidationError(`${field} must not be empty`, { field });
  }

  static invalid(field: string, value: unknown, expected: string): ValidationError {
    return new ValidationError(`Invalid ${field}: ${String(value)} (expected ${expected})`, {
      field,
      value,
    });
  }
}
