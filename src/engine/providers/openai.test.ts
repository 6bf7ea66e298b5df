import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import http from 'node:http';
import { OpenAIProvider } from './openai.js';
import { GenerationFatalError, GenerationTransientError, JobCancelledError } from '../errors.js';

interface ScriptedReply {
  status: number;
  body: unknown;
  delayMs?: number;
}

// In-process stand-in for an OpenAI-compatible chat completions endpoint
let reply: ScriptedReply;
let requests: { url: string | undefined; body: unknown }[] = [];
let server: http.Server;
let baseUrl: string;

function completion(content: string | null, finishReason = 'stop') {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: finishReason }],
    usage: { prompt_tokens: 12, completion_tokens: 4, total_tokens: 16 },
  };
}

beforeAll(async () => {
  server = http.createServer((req, res) => {
    let raw = '';
    req.on('data', (chunk: Buffer) => {
      raw += chunk.toString();
    });
    req.on('end', () => {
      requests.push({ url: req.url, body: raw ? JSON.parse(raw) : null });
      const send = () => {
        res.writeHead(reply.status, { 'content-type': 'application/json' });
        res.end(JSON.stringify(reply.body));
      };
      if (reply.delayMs) setTimeout(send, reply.delayMs);
      else send();
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server did not bind a port');
  baseUrl = `http://127.0.0.1:${address.port}/v1`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  requests = [];
  reply = { status: 200, body: completion('Bonjour') };
});

const createProvider = () =>
  new OpenAIProvider({ name: 'openai', apiKey: 'test-key', model: 'test-model', baseUrl, timeout: 5000 });

describe('OpenAIProvider', () => {
  it('returns content, usage and finish reason', async () => {
    const result = await createProvider().complete([{ role: 'user', content: 'Hello' }], { temperature: 0.1 });

    expect(result).toEqual({
      content: 'Bonjour',
      tokensUsed: { prompt: 12, completion: 4, total: 16 },
      finishReason: 'stop',
      model: 'test-model',
    });
    expect(requests[0].url).toBe('/v1/chat/completions');
    expect(requests[0].body).toMatchObject({
      model: 'test-model',
      temperature: 0.1,
      messages: [{ role: 'user', content: 'Hello' }],
    });
  });

  it('asks for a JSON object when requested', async () => {
    await createProvider().complete([{ role: 'user', content: 'terms?' }], { json: true });
    expect(requests[0].body).toMatchObject({ response_format: { type: 'json_object' } });
  });

  it('maps a truncated answer to finish reason "length"', async () => {
    reply = { status: 200, body: completion('Bonj', 'length') };
    const result = await createProvider().complete([{ role: 'user', content: 'Hello' }]);
    expect(result.finishReason).toBe('length');
  });

  it('treats an empty completion as transient', async () => {
    reply = { status: 200, body: completion('') };
    await expect(createProvider().complete([{ role: 'user', content: 'Hello' }])).rejects.toBeInstanceOf(
      GenerationTransientError
    );
  });

  it('treats authentication failures as fatal', async () => {
    reply = { status: 401, body: { error: { message: 'Incorrect API key provided', type: 'invalid_request_error' } } };

    const error = await createProvider()
      .complete([{ role: 'user', content: 'Hello' }])
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GenerationFatalError);
    expect(error).toMatchObject({ status: 401 });
  });

  it('treats rate limits and server errors as transient', async () => {
    for (const status of [429, 500, 503]) {
      reply = { status, body: { error: { message: 'try again later' } } };
      const error = await createProvider()
        .complete([{ role: 'user', content: 'Hello' }])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GenerationTransientError);
      expect(error).toMatchObject({ status });
    }
  });

  it('reports an aborted request as cancellation', async () => {
    reply = { status: 200, body: completion('late'), delayMs: 500 };
    const controller = new AbortController();

    const pending = createProvider().complete([{ role: 'user', content: 'Hello' }], { signal: controller.signal });
    setTimeout(() => controller.abort(), 20);

    await expect(pending).rejects.toBeInstanceOf(JobCancelledError);
  });
});
