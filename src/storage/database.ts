/**
 * Database layer using LowDB
 *
 * Jobs and user glossaries live in one JSON file that survives restarts.
 * lowdb rewrites the whole file on every write, so writes go through a
 * single chain and never overlap.
 */

import { Low, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { randomUUID } from 'crypto';
import path from 'path';
import fs from 'fs';
import {
  JobExistsError,
  PersistenceError,
  type Glossary,
  type IJobStore,
  type Job,
  type JobSummary,
  type ListJobsOptions,
} from '../engine/index.js';
import { createLogger } from '../logger.js';

const log = createLogger('database');

export interface StoredGlossary {
  id: string;
  name: string;
  terms: Glossary;
  isDefault: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface DatabaseSchema {
  jobs: Job[];
  glossaries: StoredGlossary[];
}

function createDefaultData(): DatabaseSchema {
  return { jobs: [], glossaries: [] };
}

/**
 * Wraps a lowdb instance and serializes its writes
 */
export class Database {
  readonly db: Low<DatabaseSchema>;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(adapter: Adapter<DatabaseSchema>) {
    this.db = new Low(adapter, createDefaultData());
  }

  get data(): DatabaseSchema {
    return this.db.data;
  }

  async read(): Promise<void> {
    try {
      await this.db.read();
    } catch (error) {
      throw new PersistenceError('Failed to read database', { cause: error });
    }
    this.db.data ||= createDefaultData();
    this.db.data.jobs ||= [];
    this.db.data.glossaries ||= [];
  }

  /**
   * Queue a write of the current in-memory data.
   * `undo` reverts the caller's in-memory change when the write fails; it runs
   * before any write queued later, so a rejected change never reaches disk.
   */
  write(undo?: () => void): Promise<void> {
    const next = this.writeChain
      .then(() => this.db.write())
      .catch((error: unknown) => {
        undo?.();
        throw new PersistenceError('Failed to write database', { cause: error });
      });
    // a failed write must not block the ones queued after it
    this.writeChain = next.catch(() => undefined);
    return next;
  }
}

/** Remove `entry` (by identity) if it is still in the list */
function removeEntry<T>(list: T[], entry: T): void {
  const index = list.indexOf(entry);
  if (index !== -1) list.splice(index, 1);
}

/** Put `previous` back where `current` sits, unless a later change replaced it */
function replaceEntry<T>(list: T[], current: T, previous: T): void {
  const index = list.indexOf(current);
  if (index !== -1) list[index] = previous;
}

/**
 * Initialize database backed by a JSON file in `dataDir`
 */
export async function initDatabase(dataDir: string = './data'): Promise<Database> {
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  const dbPath = path.join(dataDir, 'translator-db.json');
  const database = new Database(new JSONFile<DatabaseSchema>(dbPath));
  await database.read();

  log.info({ dbPath, jobs: database.data.jobs.length, glossaries: database.data.glossaries.length }, 'Database initialized');
  return database;
}

function toSummary(job: Job): JobSummary {
  return {
    jobId: job.jobId,
    status: job.status,
    currentStep: job.currentStep,
    progressPercent: job.progressPercent,
    mode: job.mode,
    originalFilename: job.originalFilename,
    sourceLang: job.config.sourceLang,
    targetLang: job.config.targetLang,
    totalChunks: job.chunks.length,
    errorInfo: job.errorInfo,
    createdAt: job.createdAt,
    updatedAt: job.updatedAt,
  };
}

// ============ Job Operations ============

export class JobStore implements IJobStore {
  constructor(private database: Database) {}

  async createJob(job: Job): Promise<void> {
    const { jobs } = this.database.data;
    if (jobs.some((j) => j.jobId === job.jobId)) {
      throw new JobExistsError(job.jobId);
    }
    const snapshot = structuredClone(job);
    jobs.push(snapshot);
    await this.database.write(() => removeEntry(jobs, snapshot));
  }

  async saveJob(job: Job): Promise<void> {
    const { jobs } = this.database.data;
    const snapshot = structuredClone(job);
    const index = jobs.findIndex((j) => j.jobId === job.jobId);

    if (index === -1) {
      jobs.push(snapshot);
      await this.database.write(() => removeEntry(jobs, snapshot));
      return;
    }

    const previous = jobs[index];
    jobs[index] = snapshot;
    await this.database.write(() => replaceEntry(jobs, snapshot, previous));
  }

  async getJob(jobId: string): Promise<Job | undefined> {
    const job = this.database.data.jobs.find((j) => j.jobId === jobId);
    return job ? structuredClone(job) : undefined;
  }

  async listJobs(options: ListJobsOptions = {}): Promise<JobSummary[]> {
    const { limit = 100, offset = 0, status } = options;

    return this.database.data.jobs
      .filter((job) => status === undefined || job.status === status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(offset, offset + limit)
      .map(toSummary);
  }

  async deleteJob(jobId: string): Promise<boolean> {
    const { jobs } = this.database.data;
    const index = jobs.findIndex((j) => j.jobId === jobId);
    if (index === -1) return false;

    const [removed] = jobs.splice(index, 1);
    await this.database.write(() => {
      if (!jobs.some((j) => j.jobId === jobId)) jobs.splice(Math.min(index, jobs.length), 0, removed);
    });
    log.info({ jobId }, 'Job deleted');
    return true;
  }

  async findUnfinishedJobs(): Promise<Job[]> {
    return this.database.data.jobs
      .filter((job) => job.status === 'pending' || job.status === 'running')
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((job) => structuredClone(job));
  }
}

// ============ Glossary Operations ============

export class GlossaryStore {
  constructor(private database: Database) {}

  async list(): Promise<StoredGlossary[]> {
    return this.database.data.glossaries.map((g) => structuredClone(g));
  }

  async get(id: string): Promise<StoredGlossary | undefined> {
    const glossary = this.database.data.glossaries.find((g) => g.id === id);
    return glossary ? structuredClone(glossary) : undefined;
  }

  async getDefault(): Promise<StoredGlossary | undefined> {
    const glossary = this.database.data.glossaries.find((g) => g.isDefault);
    return glossary ? structuredClone(glossary) : undefined;
  }

  async create(data: { name: string; terms: Glossary; isDefault?: boolean }): Promise<StoredGlossary> {
    const now = new Date().toISOString();
    const glossary: StoredGlossary = {
      id: randomUUID(),
      name: data.name,
      terms: data.terms,
      isDefault: false,
      createdAt: now,
      updatedAt: now,
    };

    const { glossaries } = this.database.data;
    const previousDefault = glossaries.find((g) => g.isDefault);
    glossaries.push(glossary);
    if (data.isDefault) {
      this.markDefault(glossary.id);
    }
    await this.database.write(() => {
      removeEntry(glossaries, glossary);
      if (data.isDefault) this.restoreDefault(previousDefault);
    });

    log.info({ glossaryId: glossary.id, terms: glossary.terms.length }, 'Glossary created');
    return structuredClone(glossary);
  }

  async update(id: string, updates: { name?: string; terms?: Glossary }): Promise<StoredGlossary | undefined> {
    const { glossaries } = this.database.data;
    const current = glossaries.find((g) => g.id === id);
    if (!current) return undefined;

    const updated: StoredGlossary = {
      ...current,
      name: updates.name ?? current.name,
      terms: updates.terms ?? current.terms,
      updatedAt: new Date().toISOString(),
    };
    replaceEntry(glossaries, current, updated);
    await this.database.write(() => replaceEntry(glossaries, updated, current));

    return structuredClone(updated);
  }

  async delete(id: string): Promise<boolean> {
    const { glossaries } = this.database.data;
    const index = glossaries.findIndex((g) => g.id === id);
    if (index === -1) return false;

    const [removed] = glossaries.splice(index, 1);
    await this.database.write(() => {
      if (!glossaries.some((g) => g.id === id)) glossaries.splice(Math.min(index, glossaries.length), 0, removed);
    });
    return true;
  }

  async setDefault(id: string): Promise<StoredGlossary | undefined> {
    const previousDefault = this.database.data.glossaries.find((g) => g.isDefault);
    if (!this.markDefault(id)) return undefined;
    await this.database.write(() => this.restoreDefault(previousDefault));
    return this.get(id);
  }

  private restoreDefault(previous: StoredGlossary | undefined): void {
    for (const glossary of this.database.data.glossaries) {
      glossary.isDefault = glossary.id === previous?.id;
    }
  }

  private markDefault(id: string): boolean {
    const { glossaries } = this.database.data;
    if (!glossaries.some((g) => g.id === id)) return false;

    for (const glossary of glossaries) {
      glossary.isDefault = glossary.id === id;
    }
    return true;
  }
}
