import { CreationError, SubmissionError, UnexpectedError } from '../errors/load-test-errors.js';
import { ERROR_STAGE, type ErrorRecord, type ErrorStage } from '../types/request.js';

type StagePhase = typeof ERROR_STAGE.GENERATION | typeof ERROR_STAGE.SUBMISSION;

/** Stage an error is attributed to: its own phase for the phase's error type, else unexpected. */
export function errorStageFor(cause: unknown, phase: StagePhase): ErrorStage {
  if (phase === ERROR_STAGE.GENERATION && cause instanceof CreationError) return phase;
  if (phase === ERROR_STAGE.SUBMISSION && cause instanceof SubmissionError) return phase;
  return ERROR_STAGE.UNEXPECTED;
}

function messageOf(cause: unknown, stage: ErrorStage): string {
  if (stage === ERROR_STAGE.UNEXPECTED) return UnexpectedError.from(cause).message;
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Single sink for the results and errors of one stage.
 *
 * Workers only append through succeed/fail; readers only see frozen snapshots.
 */
export class OutcomeCollector<T> {
  private readonly results: T[] = [];
  private readonly errors: ErrorRecord[] = [];

  constructor(
    private readonly phase: StagePhase,
    private readonly now: () => number = Date.now,
  ) {}

  succeed(result: T): void {
    this.results.push(result);
  }

  fail(subjectId: string, cause: unknown): ErrorRecord {
    const stage = errorStageFor(cause, this.phase);
    const record: ErrorRecord = Object.freeze({
      subjectId,
      stage,
      message: messageOf(cause, stage),
      timestamp: new Date(this.now()),
    });
    this.errors.push(record);
    return record;
  }

  get resultCount(): number {
    return this.results.length;
  }

  get errorCount(): number {
    return this.errors.length;
  }

  snapshot(): { results: readonly T[]; errors: readonly ErrorRecord[] } {
    return {
      results: Object.freeze([...this.results]),
      errors: Object.freeze([...this.errors]),
    };
  }
}
