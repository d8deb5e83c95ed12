/**
 * Ollama Vision Model Client
 *
 * Sends a prompt plus one base64 image to a locally running Ollama
 * instance through /api/chat. No API key required.
 *
 * Start Ollama and pull a vision model before use:
 *   ollama serve
 *   ollama pull llava          # or: llava-llama3, minicpm-v
 *
 * Retries and per-attempt timeouts belong to the caller's RetryPolicy; the
 * client makes exactly one request per call and honours the signal it is
 * given.
 */

import { z } from 'zod';

import type { ExtractionConfig } from './config.js';
import type { FileRef } from './document-loader.js';
import { ExtractionAPIError, ExtractionError } from './errors.js';

/**
 * Token usage from a response
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface VisionResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  processingTimeMs: number;
}

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z
    .object({
      role: z.string().optional(),
      content: z.string().default(''),
    })
    .optional(),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

export class VisionModelClient {
  constructor(private readonly config: ExtractionConfig) {}

  /**
   * Analyze an image with a prompt
   */
  async analyzeImage(prompt: string, file: FileRef, signal?: AbortSignal): Promise<VisionResponse> {
    const startTime = Date.now();
    const url = `${this.config.baseUrl}/api/chat`;

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.config.model,
          messages: [
            {
              role: 'user',
              content: prompt,
              images: [file.data],
            },
          ],
          stream: false,
          format: 'json',
          options: {
            temperature: this.config.temperature,
            num_predict: this.config.maxOutputTokens,
          },
        }),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionError(
        `Vision model unreachable at ${this.config.baseUrl}: ${message}`,
        'EXTRACTION_FAILED',
        true
      );
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch(() => '');
      throw new ExtractionAPIError(
        `Ollama API error ${rawResponse.status}: ${rawResponse.statusText}. ${body.slice(0, 200)}`,
        rawResponse.status
      );
    }

    const parsed = OllamaChatResponseSchema.safeParse(await rawResponse.json());
    if (!parsed.success) {
      throw new ExtractionError(`Unexpected Ollama response shape: ${parsed.error.message}`);
    }

    const data = parsed.data;
    const text = data.message?.content ?? '';
    if (text.trim() === '') {
      throw new ExtractionError('Vision model returned no content', 'EXTRACTION_FAILED', true);
    }
    const inputTokens = data.prompt_eval_count ?? 0;
    const outputTokens = data.eval_count ?? 0;

    return {
      text,
      model: data.model ?? this.config.model,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
      processingTimeMs: Date.now() - startTime,
    };
  }

  getStatus(): { model: string; baseUrl: string } {
    return {
      model: this.config.model,
      baseUrl: this.config.baseUrl,
    };
  }
}
