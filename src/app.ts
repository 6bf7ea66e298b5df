/**
 * HTTP API for translation jobs and stored glossaries
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import path from 'path';
import { serializeTerm, type JobEvent } from './engine/index.js';
import { hasAIProvider, listProviders, validateConfig, type AppConfig } from './config.js';
import type { GlossaryStore, StoredGlossary } from './storage/database.js';
import type { TranslationService } from './services/translation-service.js';
import type { JobEventHub } from './services/job-events.js';
import { NotFoundError, ServiceError, ValidationError } from './services/errors.js';
import {
  glossaryBodySchema,
  glossaryUpdateSchema,
  listJobsQuerySchema,
  parseRequest,
  submitJobSchema,
} from './services/request-schemas.js';
import {
  serializeDelta,
  serializeGlossarySource,
  serializeJob,
  serializeJobSummary,
  serializeLogEntry,
} from './services/job-snapshot.js';
import { createLogger } from './logger.js';

const log = createLogger('http');

export const APP_VERSION = '0.1.0';

const HEARTBEAT_MS = 30_000;
const ALLOWED_EXTENSIONS = ['.txt', '.md', '.markdown'];

export interface AppDeps {
  config: AppConfig;
  service: TranslationService;
  glossaries: GlossaryStore;
  events: JobEventHub;
  heartbeatMs?: number;
}

function serializeGlossary(glossary: StoredGlossary) {
  return {
    id: glossary.id,
    name: glossary.name,
    terms: glossary.terms.map(serializeTerm),
    is_default: glossary.isDefault,
    created_at: glossary.createdAt,
    updated_at: glossary.updatedAt,
  };
}

function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof ValidationError) {
    res.status(error.statusCode).json({ error: error.message, details: error.details });
    return;
  }
  if (error instanceof ServiceError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }
  log.error({ err: error }, fallback);
  res.status(500).json({ error: fallback });
}

/**
 * Form fields arrive as strings: `config` holds JSON, `glossary` holds
 * a selector or a JSON array of terms
 */
function parseUploadFields(body: Record<string, unknown>): { config: unknown; glossary: unknown } {
  const parseJsonField = (name: string, value: unknown): unknown => {
    if (typeof value !== 'string') return value;
    try {
      return JSON.parse(value);
    } catch {
      throw new ValidationError(`Field "${name}" must be valid JSON`);
    }
  };

  const glossary = body.glossary;
  return {
    config: parseJsonField('config', body.config),
    glossary:
      typeof glossary === 'string' && glossary.trim().startsWith('[')
        ? parseJsonField('glossary', glossary)
        : glossary,
  };
}

function writeEvent(res: Response, event: string, data: unknown, id?: number): void {
  if (id !== undefined) res.write(`id: ${id}\n`);
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

export function createApp(deps: AppDeps): express.Express {
  const { config, service, glossaries, events } = deps;
  const heartbeatMs = deps.heartbeatMs ?? HEARTBEAT_MS;
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.jobs.uploadMaxBytes },
    fileFilter: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (ALLOWED_EXTENSIONS.includes(ext) || file.mimetype === 'text/plain' || file.mimetype === 'text/markdown') {
        cb(null, true);
      } else {
        cb(new ValidationError('Only .txt and .md files are allowed'));
      }
    },
  });

  app.use(cors());
  app.use(express.json({ limit: config.jobs.uploadMaxBytes }));

  // ============ System ============

  app.get('/api/status', (_req, res) => {
    const validation = validateConfig(config);
    res.json({
      version: APP_VERSION,
      ready: hasAIProvider(config),
      providers: listProviders(config)
        .filter((provider) => provider.configured)
        .map((provider) => provider.name),
      config: {
        valid: validation.valid,
        errors: validation.errors,
      },
      jobs: {
        running: service.runningCount,
        queued: service.queuedCount,
      },
      storage: 'lowdb',
    });
  });

  app.get('/api/providers', (_req, res) => {
    res.json(
      listProviders(config).map((provider) => ({
        name: provider.name,
        configured: provider.configured,
        is_default: provider.isDefault,
        default_model: provider.isDefault ? config.defaults.model : null,
      }))
    );
  });

  // ============ Jobs ============

  app.post('/api/jobs', async (req, res) => {
    try {
      const request = parseRequest(submitJobSchema, req.body, 'job submission');
      const { job, glossarySource } = await service.submit(request);
      res.status(202).json({ job: serializeJob(job), glossary_source: serializeGlossarySource(glossarySource) });
    } catch (error) {
      sendError(res, error, 'Failed to submit job');
    }
  });

  app.post('/api/jobs/upload', upload.single('file'), async (req, res) => {
    try {
      if (!req.file) {
        return res.status(400).json({ error: 'No file uploaded' });
      }

      const body: Record<string, unknown> = typeof req.body === 'object' && req.body !== null ? req.body : {};
      const fields = parseUploadFields(body);
      const request = parseRequest(
        submitJobSchema,
        {
          job_id: body.job_id,
          original_content: req.file.buffer.toString('utf-8').replace(/^\uFEFF/, ''),
          original_filename: req.file.originalname,
          config: fields.config,
          glossary: fields.glossary,
        },
        'job submission'
      );

      const { job, glossarySource } = await service.submit(request);
      log.info({ jobId: job.jobId, filename: req.file.originalname, bytes: req.file.size }, 'File uploaded');
      res.status(202).json({ job: serializeJob(job), glossary_source: serializeGlossarySource(glossarySource) });
    } catch (error) {
      sendError(res, error, 'Failed to submit job');
    }
  });

  app.get('/api/jobs', async (req, res) => {
    try {
      const query = parseRequest(listJobsQuerySchema, req.query, 'query');
      const jobs = await service.listJobs(query);
      res.json(jobs.map(serializeJobSummary));
    } catch (error) {
      sendError(res, error, 'Failed to list jobs');
    }
  });

  app.get('/api/jobs/:id', async (req, res) => {
    try {
      const job = await service.getJob(req.params.id);
      res.json(serializeJob(job));
    } catch (error) {
      sendError(res, error, 'Failed to get job');
    }
  });

  app.get('/api/jobs/:id/logs', async (req, res) => {
    try {
      const logs = await service.getLogs(req.params.id);
      res.json(logs.map(serializeLogEntry));
    } catch (error) {
      sendError(res, error, 'Failed to get job logs');
    }
  });

  app.get('/api/jobs/:id/stream', async (req, res) => {
    const jobId = req.params.id;
    const pending: JobEvent[] = [];
    let ready = false;
    let closed = false;
    let heartbeat: NodeJS.Timeout | undefined;

    const close = () => {
      if (closed) return;
      closed = true;
      clearInterval(heartbeat);
      unsubscribe();
      res.end();
    };

    const forward = (event: JobEvent) => {
      if (closed) return;
      if (event.type === 'update') {
        writeEvent(res, 'update', { job_id: event.jobId, sequence: event.sequence, delta: serializeDelta(event.delta) }, event.sequence);
        return;
      }
      writeEvent(res, 'end', { job_id: event.jobId, sequence: event.sequence, status: event.status }, event.sequence);
      close();
    };

    // subscribe before reading the snapshot so nothing published in between is lost
    const unsubscribe = events.subscribe(jobId, (event) => {
      if (ready) forward(event);
      else pending.push(event);
    });
    res.on('close', close);

    try {
      const job = await service.getJob(jobId);
      // the client went away while the snapshot was loading
      if (closed) return;

      res.setHeader('Content-Type', 'text/event-stream; charset=utf-8');
      res.setHeader('Cache-Control', 'no-cache, no-transform');
      res.setHeader('Connection', 'keep-alive');
      res.flushHeaders();

      writeEvent(res, 'snapshot', serializeJob(job));

      if (job.status === 'completed' || job.status === 'failed') {
        writeEvent(res, 'end', { job_id: jobId, sequence: null, status: job.status });
        close();
        return;
      }

      ready = true;
      for (const event of pending.splice(0)) forward(event);
      if (closed) return;

      heartbeat = setInterval(() => res.write(': heartbeat\n\n'), heartbeatMs);
      heartbeat.unref();
    } catch (error) {
      if (closed) return;
      closed = true;
      unsubscribe();
      sendError(res, error, 'Failed to open job stream');
    }
  });

  app.get('/api/jobs/:id/download', async (req, res) => {
    try {
      const { document, filename } = await service.getResult(req.params.id);
      res.attachment(filename);
      res.type('text/markdown');
      res.send(document);
    } catch (error) {
      sendError(res, error, 'Failed to download job result');
    }
  });

  app.delete('/api/jobs/:id', async (req, res) => {
    try {
      const deleted = await service.deleteJob(req.params.id);
      res.json({ deleted });
    } catch (error) {
      sendError(res, error, 'Failed to delete job');
    }
  });

  // ============ Glossaries ============

  app.get('/api/glossaries', async (_req, res) => {
    try {
      const list = await glossaries.list();
      res.json(list.map(serializeGlossary));
    } catch (error) {
      sendError(res, error, 'Failed to list glossaries');
    }
  });

  app.post('/api/glossaries', async (req, res) => {
    try {
      const body = parseRequest(glossaryBodySchema, req.body, 'glossary');
      const glossary = await glossaries.create({ name: body.name, terms: body.terms, isDefault: body.is_default });
      res.status(201).json(serializeGlossary(glossary));
    } catch (error) {
      sendError(res, error, 'Failed to create glossary');
    }
  });

  app.get('/api/glossaries/:id', async (req, res) => {
    try {
      const glossary = await glossaries.get(req.params.id);
      if (!glossary) throw new NotFoundError('Glossary', req.params.id);
      res.json(serializeGlossary(glossary));
    } catch (error) {
      sendError(res, error, 'Failed to get glossary');
    }
  });

  app.put('/api/glossaries/:id', async (req, res) => {
    try {
      const updates = parseRequest(glossaryUpdateSchema, req.body, 'glossary');
      const glossary = await glossaries.update(req.params.id, updates);
      if (!glossary) throw new NotFoundError('Glossary', req.params.id);
      res.json(serializeGlossary(glossary));
    } catch (error) {
      sendError(res, error, 'Failed to update glossary');
    }
  });

  app.delete('/api/glossaries/:id', async (req, res) => {
    try {
      const deleted = await glossaries.delete(req.params.id);
      if (!deleted) throw new NotFoundError('Glossary', req.params.id);
      res.json({ deleted });
    } catch (error) {
      sendError(res, error, 'Failed to delete glossary');
    }
  });

  app.post('/api/glossaries/:id/default', async (req, res) => {
    try {
      const glossary = await glossaries.setDefault(req.params.id);
      if (!glossary) throw new NotFoundError('Glossary', req.params.id);
      res.json(serializeGlossary(glossary));
    } catch (error) {
      sendError(res, error, 'Failed to set default glossary');
    }
  });

  // Body parser and upload failures
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: error.message });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    sendError(res, error, 'Request failed');
  });

  return app;
}
