/**
 * Narrow interfaces the engine uses to persist jobs and notify observers
 */

import type { Job, JobDelta, JobStatus, JobSummary } from '../types/pipeline.js';

export interface ListJobsOptions {
  limit?: number;
  offset?: number;
  status?: JobStatus;
}

export interface IJobStore {
  /** Rejects with JobExistsError when the id is taken */
  createJob(job: Job): Promise<void>;
  /** Replace the persisted snapshot; rejects with PersistenceError */
  saveJob(job: Job): Promise<void>;
  getJob(jobId: string): Promise<Job | undefined>;
  listJobs(options?: ListJobsOptions): Promise<JobSummary[]>;
  /** Idempotent; resolves false when nothing was stored under the id */
  deleteJob(jobId: string): Promise<boolean>;
  findUnfinishedJobs(): Promise<Job[]>;
}

export type JobEndStatus = Extract<JobStatus, 'completed' | 'failed'> | 'deleted';

export type JobEvent =
  | { type: 'update'; jobId: string; sequence: number; delta: JobDelta }
  | { type: 'end'; jobId: string; sequence: number; status: JobEndStatus };

export type JobEventInput =
  | { type: 'update'; delta: JobDelta }
  | { type: 'end'; status: JobEndStatus };

export type JobEventListener = (event: JobEvent) => void;

export interface IJobEventHub {
  publish(jobId: string, event: JobEventInput): JobEvent;
  subscribe(jobId: string, listener: JobEventListener): () => void;
}
