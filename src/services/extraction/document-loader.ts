/**
 * Document Loader
 *
 * Resolves a document reference (local path or http(s) URL) to a base64
 * FileRef the vision model accepts.
 *
 * @module services/extraction/document-loader
 */

import * as fs from 'fs';
import * as path from 'path';

import { ALLOWED_MIME_TYPES, MAX_FILE_SIZE, type AllowedMimeType } from './config.js';
import { DocumentLoadError } from './errors.js';

/**
 * File reference for multimodal requests
 */
export interface FileRef {
  mimeType: AllowedMimeType;
  data: string; // Base64 encoded
  sizeBytes: number;
  source: string;
}

export interface DocumentLoaderOptions {
  downloadTimeoutMs: number;
  maxFileSize?: number;
}

const EXTENSION_MIME_TYPES: Record<string, AllowedMimeType> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
};

// Unrecognized extensions are sent as JPEG
const DEFAULT_MIME_TYPE: AllowedMimeType = 'image/jpeg';

export function isRemoteReference(documentRef: string): boolean {
  return /^https?:\/\//i.test(documentRef);
}

/**
 * MIME type from the reference's extension (query string and fragment ignored)
 */
export function mimeTypeFor(documentRef: string): AllowedMimeType {
  const pathname = isRemoteReference(documentRef) ? new URL(documentRef).pathname : documentRef;
  const ext = path.extname(pathname).toLowerCase().slice(1);

  if (ext === 'pdf') {
    throw new DocumentLoadError(
      `Unsupported document format: '${ext}' (${path.basename(pathname)}). ` +
        `The vision model accepts: ${ALLOWED_MIME_TYPES.join(', ')}. Convert PDF pages to images first.`,
      documentRef
    );
  }
  return EXTENSION_MIME_TYPES[ext] ?? DEFAULT_MIME_TYPE;
}

export function fileRefFromBuffer(buffer: Buffer, mimeType: AllowedMimeType, source: string, maxFileSize: number = MAX_FILE_SIZE): FileRef {
  if (buffer.length === 0) {
    throw new DocumentLoadError(`Document is empty: ${source}`, source);
  }
  if (buffer.length > maxFileSize) {
    throw new DocumentLoadError(`File too large: ${buffer.length} bytes. Max: ${maxFileSize}`, source);
  }
  return { mimeType, data: buffer.toString('base64'), sizeBytes: buffer.length, source };
}

export class DocumentLoader {
  private readonly downloadTimeoutMs: number;
  private readonly maxFileSize: number;

  constructor(options: DocumentLoaderOptions) {
    this.downloadTimeoutMs = options.downloadTimeoutMs;
    this.maxFileSize = options.maxFileSize ?? MAX_FILE_SIZE;
  }

  async load(documentRef: string, signal?: AbortSignal): Promise<FileRef> {
    const mimeType = mimeTypeFor(documentRef);
    const buffer = isRemoteReference(documentRef)
      ? await this.download(documentRef, signal)
      : await this.readLocal(documentRef);
    return fileRefFromBuffer(buffer, mimeType, documentRef, this.maxFileSize);
  }

  private async readLocal(filePath: string): Promise<Buffer> {
    try {
      return await fs.promises.readFile(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DocumentLoadError(`Failed to read document ${filePath}: ${message}`, filePath);
    }
  }

  private async download(url: string, signal?: AbortSignal): Promise<Buffer> {
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    const timeoutId = setTimeout(() => controller.abort(), this.downloadTimeoutMs);
    signal?.addEventListener('abort', onAbort, { once: true });

    let response: Response;
    try {
      response = await fetch(url, { signal: controller.signal });
    } catch (error) {
      if (signal?.aborted) throw error;
      const message = controller.signal.aborted
        ? `timed out after ${this.downloadTimeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new DocumentLoadError(`Failed to download document: ${message}`, url, true);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!response.ok) {
      throw new DocumentLoadError(
        `Failed to download document: HTTP ${response.status} ${response.statusText}`,
        url,
        response.status >= 500 || response.status === 429
      );
    }
    return Buffer.from(await response.arrayBuffer());
  }
}
