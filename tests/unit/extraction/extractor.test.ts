/**
 * Unit tests for the pay stub extractor
 *
 * @module tests/unit/extraction/extractor
 */

import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { VisionModelClient } from '../../../src/services/extraction/client.js';
import { ExtractionConfigSchema } from '../../../src/services/extraction/config.js';
import { DocumentLoader } from '../../../src/services/extraction/document-loader.js';
import { DocumentLoadError } from '../../../src/services/extraction/errors.js';
import { PaystubExtractor } from '../../../src/services/extraction/extractor.js';
import { PAYSTUB_EXTRACTION_PROMPT } from '../../../src/services/extraction/prompts.js';

let tempDir: string;

beforeAll(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'income-verify-loader-'));
  fs.writeFileSync(path.join(tempDir, 'stub.jpg'), Buffer.from('jpeg-bytes'));
});

afterAll(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe('PaystubExtractor', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  function createExtractor(): PaystubExtractor {
    const config = ExtractionConfigSchema.parse({});
    return new PaystubExtractor(
      new DocumentLoader({ downloadTimeoutMs: config.documentTimeoutMs }),
      new VisionModelClient(config)
    );
  }

  it('returns the model text for a loaded document', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response(JSON.stringify({ model: 'llava', message: { content: '{"ssn": "7777"}' } }), { status: 200 })
    );
    vi.stubGlobal('fetch', fetchMock);

    const text = await createExtractor().extract(path.join(tempDir, 'stub.jpg'));

    expect(text).toBe('{"ssn": "7777"}');
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toMatchObject({
      messages: [{ role: 'user', content: PAYSTUB_EXTRACTION_PROMPT, images: [Buffer.from('jpeg-bytes').toString('base64')] }],
    });
  });

  it('does not call the model when the document cannot be loaded', async () => {
    const fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);

    await expect(createExtractor().extract(path.join(tempDir, 'statement.pdf'))).rejects.toThrow(DocumentLoadError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
