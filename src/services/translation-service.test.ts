import { beforeEach, describe, expect, it } from 'vitest';
import { TranslationService } from './translation-service.js';
import { JobEventHub } from './job-events.js';
import { ConflictError, NotFoundError, ValidationError } from './errors.js';
import type { SubmitJobRequest } from './request-schemas.js';
import type { JobEvent, TranslationConfig } from '../engine/index.js';
import type { GlossaryStore, JobStore } from '../storage/database.js';
import { FakeProvider, Gate, type FakeHandler } from '../test/fake-provider.js';
import { createMemoryDatabase, makeJob, testAppConfig } from '../test/helpers.js';

function request(overrides: Partial<SubmitJobRequest> = {}): SubmitJobRequest {
  return {
    originalContent: 'The ship left at dawn.',
    config: { sourceLang: 'en', targetLang: 'fr' },
    glossary: 'none',
    ...overrides,
  };
}

describe('TranslationService', () => {
  let store: JobStore;
  let glossaries: GlossaryStore;
  let events: JobEventHub;
  let providerConfigs: TranslationConfig[];

  function createService(options: { maxConcurrentJobs?: number; translate?: FakeHandler } = {}) {
    const provider = new FakeProvider(options.translate ? { translate: options.translate } : {});
    providerConfigs = [];
    const service = new TranslationService({
      appConfig: testAppConfig({ maxConcurrentJobs: options.maxConcurrentJobs }),
      store,
      glossaries,
      events,
      providerFactory: (config) => {
        providerConfigs.push(config);
        return provider;
      },
    });
    return { service, provider };
  }

  beforeEach(async () => {
    ({ store, glossaries } = await createMemoryDatabase());
    events = new JobEventHub();
  });

  it('persists a pending job and runs it to completion', async () => {
    const { service } = createService();

    const { job, glossarySource } = await service.submit(request({ jobId: 'job-a' }));

    expect(job).toMatchObject({ jobId: 'job-a', status: 'pending', progressPercent: 0, mode: 'quick' });
    expect(glossarySource).toEqual({ type: 'none' });

    await service.waitForIdle();
    const finished = await service.getJob('job-a');
    expect(finished.status).toBe('completed');
    expect(finished.finalDocument).toBe('T(The ship left at dawn.)');
  });

  it('fills config defaults from the app config', async () => {
    const { service } = createService();

    const { job } = await service.submit(request());

    expect(job.config).toEqual({
      sourceLang: 'en',
      targetLang: 'fr',
      provider: 'openai',
      model: 'test-model',
      targetLanguageAccent: 'professional',
      translationMode: 'quick',
      contentType: 'text',
    });
    expect(job.jobId).toMatch(/^[0-9a-f-]{36}$/);
    await service.waitForIdle();
  });

  it('requires a model for a provider other than the default', async () => {
    const { service } = createService();

    await expect(
      service.submit(request({ config: { sourceLang: 'en', targetLang: 'fr', provider: 'ollama' } }))
    ).rejects.toThrow('config.model is required for provider "ollama"');
  });

  it('rejects a duplicate job id', async () => {
    const { service } = createService();
    await service.submit(request({ jobId: 'dup' }));

    await expect(service.submit(request({ jobId: 'dup' }))).rejects.toBeInstanceOf(ValidationError);
    await service.waitForIdle();
  });

  it('rejects one of two concurrent submissions with the same id', async () => {
    const { service } = createService();

    const results = await Promise.allSettled([
      service.submit(request({ jobId: 'race' })),
      service.submit(request({ jobId: 'race' })),
    ]);

    const rejected = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));
    expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(ValidationError);
    expect(rejected[0]).toMatchObject({ message: 'Job race already exists' });
    await service.waitForIdle();
    expect((await service.getJob('race')).status).toBe('completed');
  });

  describe('glossary selection', () => {
    const terms = [{ sourceTerm: 'ship', translations: { fr: 'navire' } }];

    it('resolves "default" to none when no default glossary exists', async () => {
      const { service } = createService();
      const { glossarySource, job } = await service.submit(request({ glossary: 'default' }));

      expect(glossarySource).toEqual({ type: 'none' });
      expect(job.userGlossary).toBeNull();
      await service.waitForIdle();
    });

    it('resolves "default" to the default glossary', async () => {
      const { service } = createService();
      const stored = await glossaries.create({ name: 'Sea stories', terms, isDefault: true });

      const { glossarySource, job } = await service.submit(request({ glossary: 'default' }));

      expect(glossarySource).toEqual({ type: 'default', id: stored.id, name: 'Sea stories', termCount: 1 });
      expect(job.userGlossary).toEqual(terms);
      await service.waitForIdle();
    });

    it('resolves a stored glossary by id', async () => {
      const { service } = createService();
      const stored = await glossaries.create({ name: 'Sea stories', terms });

      const { glossarySource } = await service.submit(request({ glossary: { id: stored.id } }));

      expect(glossarySource).toEqual({ type: 'stored', id: stored.id, name: 'Sea stories', termCount: 1 });
      await service.waitForIdle();
    });

    it('rejects an unknown glossary id', async () => {
      const { service } = createService();
      await expect(service.submit(request({ glossary: { id: 'missing' } }))).rejects.toBeInstanceOf(NotFoundError);
      expect(await service.listJobs()).toEqual([]);
    });

    it('deduplicates an inline glossary', async () => {
      const { service } = createService();

      const { glossarySource, job } = await service.submit(
        request({ glossary: { terms: [...terms, { sourceTerm: 'ship', translations: { fr: 'bateau' } }] } })
      );

      expect(glossarySource).toEqual({ type: 'inline', termCount: 1 });
      expect(job.userGlossary).toEqual([{ sourceTerm: 'ship', translations: { fr: 'bateau' } }]);
      await service.waitForIdle();
    });
  });

  it('runs at most maxConcurrentJobs at once and queues the rest in order', async () => {
    const gate = new Gate();
    const { service } = createService({
      maxConcurrentJobs: 1,
      translate: async ({ text }, signal) => {
        await gate.wait(signal);
        return `T(${text})`;
      },
    });

    await service.submit(request({ jobId: 'first' }));
    await service.submit(request({ jobId: 'second' }));

    expect(service.runningCount).toBe(1);
    expect(service.queuedCount).toBe(1);
    expect((await service.getJob('second')).status).toBe('pending');

    gate.open();
    await service.waitForIdle();

    expect((await service.getJob('first')).status).toBe('completed');
    expect((await service.getJob('second')).status).toBe('completed');
  });

  it('deletes a running job, stops it and tells observers', async () => {
    const gate = new Gate();
    const started = new Gate();
    const { service } = createService({
      translate: async ({ text }, signal) => {
        started.open();
        await gate.wait(signal);
        return `T(${text})`;
      },
    });
    const received: JobEvent[] = [];
    events.subscribe('doomed', (event) => received.push(event));

    await service.submit(request({ jobId: 'doomed' }));
    await started.promise;

    expect(await service.deleteJob('doomed')).toBe(true);
    await service.waitForIdle();

    expect(received[received.length - 1]).toMatchObject({ type: 'end', status: 'deleted' });
    expect(received.filter((event) => event.type === 'end')).toHaveLength(1);
    await expect(service.getJob('doomed')).rejects.toBeInstanceOf(NotFoundError);
    expect(await service.deleteJob('doomed')).toBe(false);
  });

  it('drops a queued job that is deleted before it starts', async () => {
    const gate = new Gate();
    const { service, provider } = createService({
      maxConcurrentJobs: 1,
      translate: async ({ text }, signal) => {
        await gate.wait(signal);
        return `T(${text})`;
      },
    });

    await service.submit(request({ jobId: 'running', originalContent: 'first' }));
    await service.submit(request({ jobId: 'queued', originalContent: 'second' }));
    await service.deleteJob('queued');
    gate.open();
    await service.waitForIdle();

    expect(provider.callsFor('translate').map((call) => call.text)).toEqual(['first']);
    expect(service.isActive('queued')).toBe(false);
  });

  it('serves the result only once the job completed', async () => {
    const gate = new Gate();
    const { service } = createService({
      translate: async ({ text }, signal) => {
        await gate.wait(signal);
        return `T(${text})`;
      },
    });

    await service.submit(request({ jobId: 'doc', originalFilename: 'uploads/chapter-1.md' }));
    await expect(service.getResult('doc')).rejects.toBeInstanceOf(ConflictError);

    gate.open();
    await service.waitForIdle();

    expect(await service.getResult('doc')).toEqual({
      document: 'T(The ship left at dawn.)',
      filename: 'translated_chapter-1.md',
    });
  });

  it('names the download after the job id when no file was uploaded', async () => {
    const { service } = createService();
    await service.submit(request({ jobId: 'pasted' }));
    await service.waitForIdle();

    expect((await service.getResult('pasted')).filename).toBe('pasted.md');
  });

  it('returns the job log', async () => {
    const { service } = createService();
    await service.submit(request({ jobId: 'logged' }));
    await service.waitForIdle();

    const logs = await service.getLogs('logged');
    expect(logs[0]).toMatchObject({ level: 'info', step: 'pending', message: 'Started in quick mode' });
    expect(logs[logs.length - 1]).toMatchObject({ step: 'completed', message: 'Entered completed' });
  });

  it('resumes jobs left unfinished by a previous process', async () => {
    await store.createJob(makeJob('Left behind.', { jobId: 'orphan' }));
    const { service } = createService();

    expect(await service.resumeUnfinishedJobs()).toBe(1);
    await service.waitForIdle();

    expect((await service.getJob('orphan')).finalDocument).toBe('T(Left behind.)');
    expect(providerConfigs.map((config) => config.model)).toEqual(['test-model']);
  });

  it('fails a resumed job whose provider is no longer available', async () => {
    await store.createJob(makeJob('Left behind.', { jobId: 'orphan' }));
    const service = new TranslationService({
      appConfig: testAppConfig(),
      store,
      glossaries,
      events,
      providerFactory: () => {
        throw new ValidationError('Provider "openai" is not configured');
      },
    });

    await service.resumeUnfinishedJobs();
    await service.waitForIdle();

    const job = await service.getJob('orphan');
    expect(job.status).toBe('failed');
    expect(job.errorInfo).toBe('Cannot resume job: Provider "openai" is not configured');
  });
});
