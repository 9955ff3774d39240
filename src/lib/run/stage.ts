import type { ErrorRecord } from '../types/request.js';

export interface StageOptions {
  /** Maximum calls in flight (default: 4) */
  concurrency?: number;
  /** Stops dispatch of new items once aborted; calls already in flight run to completion */
  signal?: AbortSignal;
  /** Millisecond clock for elapsed time and error timestamps */
  now?: () => number;
  /** Called after each item settles */
  onProgress?: (progress: StageProgress) => void;
}

export interface StageProgress {
  completed: number;
  succeeded: number;
  failed: number;
  total: number;
}

export interface StageOutcome<T> {
  results: readonly T[];
  errors: readonly ErrorRecord[];
  /** Items never dispatched because the run was cancelled */
  cancelled: number;
  elapsedMs: number;
}
