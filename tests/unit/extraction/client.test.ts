/**
 * Unit tests for the Ollama vision model client
 *
 * fetch is stubbed; no Ollama server is contacted.
 *
 * @module tests/unit/extraction/client
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { VisionModelClient } from '../../../src/services/extraction/client.js';
import { ExtractionConfigSchema } from '../../../src/services/extraction/config.js';
import type { FileRef } from '../../../src/services/extraction/document-loader.js';
import { ExtractionAPIError, ExtractionError } from '../../../src/services/extraction/errors.js';

const CONFIG = ExtractionConfigSchema.parse({});

const FILE: FileRef = {
  mimeType: 'image/png',
  data: 'cG5nLWJ5dGVz',
  sizeBytes: 9,
  source: '/tmp/stub.png',
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('VisionModelClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the prompt and image to /api/chat', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse({
        model: 'llava',
        message: { role: 'assistant', content: '{"employee_name": "Maria Garcia"}' },
        done: true,
        prompt_eval_count: 10,
        eval_count: 5,
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const client = new VisionModelClient(CONFIG);
    const response = await client.analyzeImage('Read this pay stub', FILE);

    expect(response.text).toBe('{"employee_name": "Maria Garcia"}');
    expect(response.model).toBe('llava');
    expect(response.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llava',
      messages: [{ role: 'user', content: 'Read this pay stub', images: ['cG5nLWJ5dGVz'] }],
      stream: false,
      format: 'json',
      options: { temperature: 0.1, num_predict: 8192 },
    });
  });

  it('defaults missing model and usage', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ message: { content: '{}' }, done: true }))
    );
    const response = await new VisionModelClient(CONFIG).analyzeImage('prompt', FILE);
    expect(response.text).toBe('{}');
    expect(response.model).toBe('llava');
    expect(response.usage.totalTokens).toBe(0);
  });

  it.each([
    ['no message', { done: true }],
    ['blank content', { message: { content: '  \n ' }, done: true }],
  ])('raises a retryable error for a reply with %s', async (_label, body) => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(jsonResponse(body)));
    const error = await new VisionModelClient(CONFIG).analyzeImage('prompt', FILE).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({
      message: 'Vision model returned no content',
      category: 'EXTRACTION_FAILED',
      retryable: true,
    });
  });

  it('raises a retryable API error for 503', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn<typeof fetch>()
        .mockResolvedValue(new Response('loading model', { status: 503, statusText: 'Service Unavailable' }))
    );
    const error = await new VisionModelClient(CONFIG).analyzeImage('prompt', FILE).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionAPIError);
    expect(error).toHaveProperty('message', 'Ollama API error 503: Service Unavailable. loading model');
    expect(error).toHaveProperty('statusCode', 503);
    expect(error).toHaveProperty('retryable', true);
  });

  it('raises an auth error for 401', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>().mockResolvedValue(new Response('', { status: 401, statusText: 'Unauthorized' }))
    );
    const error = await new VisionModelClient(CONFIG).analyzeImage('prompt', FILE).catch((e: unknown) => e);
    expect(error).toHaveProperty('category', 'EXTRACTION_AUTH_ERROR');
    expect(error).toHaveProperty('retryable', false);
  });

  it('reports an unreachable server as retryable', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed')));
    const error = await new VisionModelClient(CONFIG).analyzeImage('prompt', FILE).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toHaveProperty('message', 'Vision model unreachable at http://localhost:11434: fetch failed');
    expect(error).toHaveProperty('retryable', true);
  });

  it('re-throws the abort reason when the caller cancels', async () => {
    const controller = new AbortController();
    const abortError = new Error('aborted by caller');
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockImplementation(async () => {
      controller.abort();
      throw abortError;
    }));
    await expect(
      new VisionModelClient(CONFIG).analyzeImage('prompt', FILE, controller.signal)
    ).rejects.toBe(abortError);
  });

  it('rejects responses of the wrong shape', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ message: 'nope' })));
    await expect(new VisionModelClient(CONFIG).analyzeImage('prompt', FILE)).rejects.toThrow(
      /^Unexpected Ollama response shape/
    );
  });

  it('reports its model and base URL', () => {
    expect(new VisionModelClient(CONFIG).getStatus()).toEqual({
      model: 'llava',
      baseUrl: 'http://localhost:11434',
    });
  });
});
