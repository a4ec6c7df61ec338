/**
 * Ingestion job tracking
 *
 * At most one job runs per tracker. `tryStart` checks and claims the slot
 * in one synchronous step, so two concurrent callers can never both win.
 */

import { randomUUID } from 'node:crypto';
import { errorMessage } from '../core/errors.js';
import type { IngestionResult } from './IngestionPipeline.js';

export type JobStatus = 'idle' | 'running' | 'completed' | 'failed';

export interface JobSnapshot {
  status: JobStatus;
  jobId: string | null;
  totalDocuments: number;
  startedAt: Date | null;
  finishedAt: Date | null;
  result: IngestionResult | null;
  error: string | null;
}

/**
 * Handle held by the caller that owns the running job
 */
export interface IngestionJob {
  readonly id: string;
  complete(result: IngestionResult): void;
  fail(error: unknown): void;
}

const IDLE: JobSnapshot = {
  status: 'idle',
  jobId: null,
  totalDocuments: 0,
  startedAt: null,
  finishedAt: null,
  result: null,
  error: null,
};

export class IngestionJobTracker {
  private state: JobSnapshot = { ...IDLE };

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Claim the tracker for a new job
   *
   * @returns The job handle, or `null` while another job is running
   */
  tryStart(totalDocuments: number): IngestionJob | null {
    if (this.state.status === 'running') {
      return null;
    }

    const id = randomUUID();
    this.state = {
      ...IDLE,
      status: 'running',
      jobId: id,
      totalDocuments,
      startedAt: this.now(),
    };

    return {
      id,
      complete: (result) => this.finish(id, { status: 'completed', result }),
      fail: (error) => this.finish(id, { status: 'failed', error: errorMessage(error) }),
    };
  }

  isRunning(): boolean {
    return this.state.status === 'running';
  }

  snapshot(): JobSnapshot {
    return { ...this.state };
  }

  private finish(id: string, outcome: Pick<JobSnapshot, 'status'> & Partial<JobSnapshot>): void {
    // A stale handle must not overwrite a newer job
    if (this.state.jobId !== id || this.state.status !== 'running') {
      return;
    }
    this.state = { ...this.state, ...outcome, finishedAt: this.now() };
  }
}
