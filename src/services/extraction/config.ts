/**
 * Vision Model Configuration
 *
 * The OCR collaborator is a locally running Ollama server with a vision
 * model. No API key required.
 */

import { z } from 'zod';
import { parseFloatEnv, parseIntEnv, stringEnv } from '../../utils/env.js';

export const OLLAMA_MODELS = {
  LLAVA: 'llava',
  LLAVA_LLAMA3: 'llava-llama3',
  MINICPM_V: 'minicpm-v',
} as const;

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

// Ollama vision accepts raster images only
export const ALLOWED_MIME_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'image/gif'] as const;

export type AllowedMimeType = (typeof ALLOWED_MIME_TYPES)[number];

// Max file size: 20MB
export const MAX_FILE_SIZE = 20 * 1024 * 1024;

export const ExtractionConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_OLLAMA_BASE_URL),
  // Needs vision support (e.g. llava, llava-llama3, minicpm-v)
  model: z.string().min(1).default(OLLAMA_MODELS.LLAVA),
  maxOutputTokens: z.number().int().positive().default(8192),
  temperature: z.number().min(0).max(2).default(0.1),
  // Download timeout for http(s) documents
  documentTimeoutMs: z.number().int().positive().default(30_000),
  maxFileSize: z.number().int().positive().default(MAX_FILE_SIZE),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

/**
 * Load vision model configuration from environment variables.
 *
 * Environment variables:
 *   OLLAMA_BASE_URL            - Ollama server URL (default: http://localhost:11434)
 *   OLLAMA_VLM_MODEL           - Vision model (default: llava)
 *   OLLAMA_TEMPERATURE         - Generation temperature (default: 0.1)
 *   OLLAMA_MAX_OUTPUT_TOKENS   - Max tokens generated (default: 8192)
 *   VERIFY_DOCUMENT_TIMEOUT_MS - Document download timeout (default: 30000)
 */
export function loadExtractionConfig(overrides?: Partial<ExtractionConfig>): ExtractionConfig {
  const envConfig = {
    baseUrl: stringEnv('OLLAMA_BASE_URL') ?? DEFAULT_OLLAMA_BASE_URL,
    model: stringEnv('OLLAMA_VLM_MODEL') ?? OLLAMA_MODELS.LLAVA,
    maxOutputTokens: parseIntEnv('OLLAMA_MAX_OUTPUT_TOKENS', 8192),
    temperature: parseFloatEnv('OLLAMA_TEMPERATURE', 0.1),
    documentTimeoutMs: parseIntEnv('VERIFY_DOCUMENT_TIMEOUT_MS', 30_000),
  };

  return ExtractionConfigSchema.parse({ ...envConfig, ...overrides });
}
