/**
 * Pay Stub Extractor
 *
 * The OCR collaborator: loads a document and asks the vision model for the
 * raw field mapping. Returns the model's text untouched; parsing and
 * normalization happen in the verification layer.
 *
 * @module services/extraction/extractor
 */

import type { VisionModelClient } from './client.js';
import type { DocumentLoader } from './document-loader.js';
import { PAYSTUB_EXTRACTION_PROMPT } from './prompts.js';

/**
 * Anything that can turn a document reference into raw model text
 */
export interface ExtractionSource {
  extract(documentRef: string, signal?: AbortSignal): Promise<string>;
}

export class PaystubExtractor implements ExtractionSource {
  constructor(
    private readonly loader: DocumentLoader,
    private readonly client: VisionModelClient,
    private readonly prompt: string = PAYSTUB_EXTRACTION_PROMPT
  ) {}

  async extract(documentRef: string, signal?: AbortSignal): Promise<string> {
    const file = await this.loader.load(documentRef, signal);
    console.error(
      `[PaystubExtractor] Loaded ${file.sizeBytes} bytes (${file.mimeType}) from ${documentRef}`
    );

    const response = await this.client.analyzeImage(this.prompt, file, signal);
    console.error(
      `[PaystubExtractor] ${response.model} answered in ${response.processingTimeMs}ms ` +
        `(${response.usage.totalTokens} tokens)`
    );
    return response.text;
  }
}
