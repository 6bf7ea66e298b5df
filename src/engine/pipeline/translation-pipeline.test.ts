import { beforeEach, describe, expect, it } from 'vitest';
import { TranslationPipeline, type PipelineSettings } from './translation-pipeline.js';
import { splitDocument } from '../utils/chunker.js';
import { GenerationFatalError, PersistenceError } from '../errors.js';
import type { JobEvent } from '../interfaces/job-store.js';
import type { Job } from '../types/pipeline.js';
import { JobEventHub } from '../../services/job-events.js';
import { JobStore } from '../../storage/database.js';
import { FakeProvider, Gate, type FakeStage, type FakeHandler } from '../../test/fake-provider.js';
import { FAST_RETRY, createMemoryDatabase, makeJob } from '../../test/helpers.js';

const THREE_PARAGRAPHS = 'A1.\n\nB2.\n\nC3.';
const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/** Rejects every save once a chunk has been translated */
class JobStoreLosingTranslations extends JobStore {
  override async saveJob(job: Job): Promise<void> {
    if (job.chunks.some((chunk) => chunk.status === 'translated')) {
      throw new PersistenceError('Failed to write database');
    }
    return super.saveJob(job);
  }
}

const settings: Partial<PipelineSettings> = {
  maxChunkSize: 4,
  maxParallelWorkers: 4,
  retry: FAST_RETRY,
};

describe('TranslationPipeline', () => {
  let store: JobStore;
  let events: JobEventHub;
  let received: JobEvent[];

  beforeEach(async () => {
    ({ store } = await createMemoryDatabase());
    events = new JobEventHub();
    received = [];
  });

  async function runJob(job: Job, handlers: Partial<Record<FakeStage, FakeHandler>> = {}, signal?: AbortSignal) {
    const provider = new FakeProvider(handlers);
    const pipeline = new TranslationPipeline({ provider, store, events, settings });
    events.subscribe(job.jobId, (event) => received.push(event));

    await store.createJob(job);
    const result = await pipeline.run(job, signal);
    const stored = await store.getJob(job.jobId);
    if (!stored) throw new Error('job disappeared from the store');
    return { result, stored, provider };
  }

  const progressUpdates = () =>
    received.flatMap((event) =>
      event.type === 'update' && event.delta.progressPercent !== undefined ? [event.delta.progressPercent] : []
    );

  it('translates a quick job chunk by chunk and assembles it', async () => {
    const { result, stored, provider } = await runJob(makeJob('Hi.\n\nYo.', { config: { translationMode: 'quick' } }));

    expect(result).toBe('completed');
    expect(stored.status).toBe('completed');
    expect(stored.currentStep).toBe('completed');
    expect(stored.progressPercent).toBe(100);
    expect(stored.finalDocument).toBe('T(Hi.)\n\nT(Yo.)');
    expect(stored.chunks.map((chunk) => chunk.status)).toEqual(['translated', 'translated']);
    expect(provider.callsFor('translate')).toHaveLength(2);
    expect(provider.callsFor('critique')).toHaveLength(0);
    expect(provider.callsFor('revise')).toHaveLength(0);
    expect(stored.metrics).toMatchObject({ generationCalls: 2, totalTokens: 30, totalChunks: 2, sourceWordCount: 2 });
  });

  it('publishes non-decreasing progress and ends with the terminal status', async () => {
    await runJob(makeJob(THREE_PARAGRAPHS));

    const progress = progressUpdates();
    expect(progress.length).toBeGreaterThan(3);
    expect(progress).toEqual([...progress].sort((a, b) => a - b));
    expect(progress[progress.length - 1]).toBe(100);

    const last = received[received.length - 1];
    expect(last).toMatchObject({ type: 'end', status: 'completed' });
    const sequences = received.map((event) => event.sequence);
    expect(sequences).toEqual(sequences.map((_, i) => i + 1));
  });

  it('keeps document order when chunks finish out of order', async () => {
    const finished: string[] = [];
    const waits: Record<string, number> = { 'A1.': 30, 'B2.': 15, 'C3.': 0 };

    const { stored } = await runJob(makeJob(THREE_PARAGRAPHS), {
      translate: async ({ text }) => {
        await delay(waits[text] ?? 0);
        finished.push(text);
        return `T(${text})`;
      },
    });

    expect(finished).toEqual(['C3.', 'B2.', 'A1.']);
    expect(stored.finalDocument).toBe('T(A1.)\n\nT(B2.)\n\nT(C3.)');
  });

  it('fails the job when a chunk fails but keeps the other translations', async () => {
    const document = 'A1.\n\nB2.\n\nC3.\n\nD4.\n\nE5.';

    const { result, stored } = await runJob(makeJob(document), {
      translate: ({ text }) => {
        if (text === 'C3.') throw new GenerationFatalError('content rejected', { status: 400 });
        return `T(${text})`;
      },
    });

    expect(result).toBe('failed');
    expect(stored.status).toBe('failed');
    expect(stored.finalDocument).toBeNull();
    expect(stored.errorInfo).toBe('1 of 5 chunks failed to translate (chunk 2: content rejected)');
    expect(stored.chunks.map((chunk) => chunk.status)).toEqual([
      'translated',
      'translated',
      'failed',
      'translated',
      'translated',
    ]);
    expect(stored.chunks[0].translatedText).toBe('T(A1.)\n\n');
    expect(stored.chunks[2].error).toBe('content rejected');
    expect(received[received.length - 1]).toMatchObject({ type: 'end', status: 'failed' });
  });

  it('runs deep mode through terminology, critique and one revision per chunk', async () => {
    const { result, stored, provider } = await runJob(makeJob(THREE_PARAGRAPHS, { config: { translationMode: 'deep' } }), {
      terminology: () => JSON.stringify({ terms: [{ source_term: 'B2', translations: { fr: 'Bé-deux' } }] }),
      critique: () => JSON.stringify({ has_critical_error: false, issues: ['register too casual'] }),
    });

    expect(result).toBe('completed');
    expect(stored.jobGlossary).toEqual([{ sourceTerm: 'B2', translations: { fr: 'Bé-deux' } }]);
    expect(provider.callsFor('terminology')).toHaveLength(1);
    expect(provider.callsFor('critique')).toHaveLength(1);
    expect(provider.callsFor('revise').map((call) => call.text).sort()).toEqual(['T(A1.)', 'T(B2.)', 'T(C3.)']);
    expect(stored.finalDocument).toBe('R(T(A1.))\n\nR(T(B2.))\n\nR(T(C3.))');
    expect(stored.chunks.every((chunk) => chunk.status === 'refined')).toBe(true);
    expect(stored.critique).toEqual({ hasCriticalError: false, issues: ['register too casual'] });

    const translateB2 = provider.callsFor('translate').find((call) => call.text === 'B2.');
    expect(translateB2?.messages[1].content).toContain('- B2 → Bé-deux');
  });

  it('translates with the user glossary in deep mode without extracting terms', async () => {
    const glossary = [{ sourceTerm: 'A1', translations: { fr: 'Alpha' } }];
    const { stored, provider } = await runJob(
      makeJob(THREE_PARAGRAPHS, { config: { translationMode: 'deep' }, userGlossary: glossary })
    );

    expect(provider.callsFor('terminology')).toHaveLength(0);
    expect(stored.jobGlossary).toEqual(glossary);
  });

  it('stops before assembly on a critical critique', async () => {
    const { result, stored, provider } = await runJob(makeJob(THREE_PARAGRAPHS, { config: { translationMode: 'deep' } }), {
      critique: () => JSON.stringify({ has_critical_error: true, issues: ['"B2" translated two different ways'] }),
    });

    expect(result).toBe('failed');
    expect(stored.finalDocument).toBeNull();
    expect(stored.errorInfo).toBe('Critical quality error: "B2" translated two different ways');
    expect(stored.critique?.hasCriticalError).toBe(true);
    expect(provider.callsFor('revise')).toHaveLength(0);
  });

  it('treats a critique that cannot be produced as critical', async () => {
    const { result, stored } = await runJob(makeJob(THREE_PARAGRAPHS, { config: { translationMode: 'deep' } }), {
      critique: () => {
        throw new GenerationFatalError('model not found', { status: 404 });
      },
    });

    expect(result).toBe('failed');
    expect(stored.finalDocument).toBeNull();
    expect(stored.critique?.hasCriticalError).toBe(true);
    expect(stored.errorInfo).toBe('Critique stage failed, treated as a critical error: Critique failed: model not found');
  });

  it('keeps the translation of a chunk whose revision fails', async () => {
    const { result, stored } = await runJob(makeJob(THREE_PARAGRAPHS, { config: { translationMode: 'deep' } }), {
      revise: ({ text }) => {
        if (text === 'T(B2.)') throw new GenerationFatalError('rejected', { status: 422 });
        return `R(${text})`;
      },
    });

    expect(result).toBe('completed');
    expect(stored.finalDocument).toBe('R(T(A1.))\n\nT(B2.)\n\nR(T(C3.))');
    expect(stored.chunks[1]).toMatchObject({ status: 'critiqued', error: 'Revision failed: rejected' });
  });

  it('fails an empty document with a chunking error', async () => {
    const { result, stored } = await runJob(makeJob('   \n\n  '));

    expect(result).toBe('failed');
    expect(stored.errorInfo).toBe('Document is empty');
    expect(stored.chunks).toEqual([]);
  });

  it('resumes from persisted chunks without retranslating finished ones', async () => {
    const chunks = splitDocument(THREE_PARAGRAPHS, 4);
    chunks[0] = { ...chunks[0], translatedText: 'X\n\n', status: 'translated', attempts: 1 };
    const job: Job = { ...makeJob(THREE_PARAGRAPHS), status: 'running', currentStep: 'translating', chunks };

    const { result, stored, provider } = await runJob(job);

    expect(result).toBe('completed');
    expect(provider.callsFor('translate').map((call) => call.text).sort()).toEqual(['B2.', 'C3.']);
    expect(stored.finalDocument).toBe('X\n\nT(B2.)\n\nT(C3.)');
  });

  it('stops quietly when cancelled mid-translation', async () => {
    const controller = new AbortController();
    const gate = new Gate();
    const started = new Gate();

    const running = runJob(
      makeJob(THREE_PARAGRAPHS),
      {
        translate: async ({ text }, signal) => {
          started.open();
          await gate.wait(signal);
          return `T(${text})`;
        },
      },
      controller.signal
    );

    await started.promise;
    controller.abort();
    const { result, stored } = await running;

    expect(result).toBe('cancelled');
    expect(stored.status).toBe('running');
    expect(stored.finalDocument).toBeNull();
    expect(received.some((event) => event.type === 'end')).toBe(false);
  });

  it('stops at the last durable state when the store rejects a save', async () => {
    const { database } = await createMemoryDatabase();
    store = new JobStoreLosingTranslations(database);
    const job = makeJob(THREE_PARAGRAPHS);
    const pipeline = new TranslationPipeline({ provider: new FakeProvider(), store, events, settings });
    events.subscribe(job.jobId, (event) => received.push(event));
    await store.createJob(job);

    await expect(pipeline.run(job)).rejects.toBeInstanceOf(PersistenceError);

    const stored = await store.getJob(job.jobId);
    expect(stored?.status).toBe('running');
    expect(stored?.currentStep).toBe('translating');
    expect(stored?.errorInfo).toBeNull();
    expect(stored?.finalDocument).toBeNull();
    expect(stored?.chunks.some((chunk) => chunk.status === 'translated')).toBe(false);
    expect(received.some((event) => event.type === 'end')).toBe(false);
  });

  it('returns a finished job untouched', async () => {
    const job: Job = { ...makeJob('done'), status: 'completed', currentStep: 'completed', finalDocument: 'fait' };

    const { result, provider } = await runJob(job);

    expect(result).toBe('completed');
    expect(provider.calls).toHaveLength(0);
    expect(received).toEqual([]);
  });
});
