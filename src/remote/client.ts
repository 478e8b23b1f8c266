/**
 * docmirror - Document Service Client
 *
 * RemoteStorage over the document service's public upload API. Requests
 * are made once; a non-2xx response or a transport failure becomes the
 * matching UploadError / DeleteError / ListError.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import type { RemoteFile } from '../core/types.js';
import { DeleteError, ListError, UploadError, describeError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { RemoteStorage } from './types.js';

// ============================================================================
// File Types
// ============================================================================

export type ParseEngine = 'ultraparse' | 'tika';

const MEDIA_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.pptx': 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  '.txt': 'text/plain',
};

// Layout-heavy formats go through the richer parser
const ULTRAPARSE_EXTENSIONS = new Set(['.pdf', '.docx', '.pptx']);

export function getMediaType(filePath: string): string {
  return MEDIA_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

export function getParseEngine(filePath: string): ParseEngine {
  return ULTRAPARSE_EXTENSIONS.has(path.extname(filePath).toLowerCase()) ? 'ultraparse' : 'tika';
}

// ============================================================================
// Response Schemas
// ============================================================================

const IdentifiedSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  file_id: z.union([z.string(), z.number()]).optional(),
}).passthrough();

const UploadResponseSchema = IdentifiedSchema.extend({
  data: IdentifiedSchema.optional(),
});

const ListedFileSchema = IdentifiedSchema.extend({
  name: z.string().optional(),
  file_name: z.string().optional(),
});

const ListResponseSchema = z.union([
  z.array(ListedFileSchema),
  z.object({ files: z.array(ListedFileSchema) }),
  z.object({ data: z.array(ListedFileSchema) }),
]);

type Identified = z.infer<typeof IdentifiedSchema>;

function pickId(value: Identified | undefined): string | null {
  const id = value?.id ?? value?.file_id;
  return id === undefined ? null : String(id);
}

// ============================================================================
// Client
// ============================================================================

export interface DocumentServiceOptions {
  baseUrl: string;
  apiKey: string;
  logger: Logger;
  fetch?: typeof fetch;
}

const API_PREFIX = '/localmind/public-upload';

export class DocumentServiceClient implements RemoteStorage {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: DocumentServiceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private url(pathname: string, params: Record<string, string> = {}): string {
    const query = new URLSearchParams(params).toString();
    return `${this.baseUrl}${API_PREFIX}${pathname}${query ? `?${query}` : ''}`;
  }

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  async upload(localPath: string, folderId: string): Promise<string> {
    const parseEngine = getParseEngine(localPath);
    this.logger.debug(`[remote] Uploading ${localPath} with parser ${parseEngine}`);

    let body: FormData;
    try {
      const content = await readFile(localPath);
      body = new FormData();
      body.append('file', new Blob([content], { type: getMediaType(localPath) }), path.basename(localPath));
    } catch (error) {
      throw new UploadError(localPath, `cannot read file: ${describeError(error)}`, undefined, error);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.url('/file', { folder_id: folderId, parse_engine: parseEngine }), {
        method: 'POST',
        headers: this.headers(),
        body,
      });
    } catch (error) {
      throw new UploadError(localPath, describeError(error), undefined, error);
    }

    if (!response.ok) {
      throw new UploadError(localPath, await describeResponse(response), response.status);
    }

    const parsed = UploadResponseSchema.safeParse(await readJson(response));
    const remoteId = parsed.success ? pickId(parsed.data) ?? pickId(parsed.data.data) : null;
    if (!remoteId) {
      throw new UploadError(localPath, 'response did not include a file id', response.status);
    }
    return remoteId;
  }

  async delete(remoteId: string): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url(`/file/${encodeURIComponent(remoteId)}`), {
        method: 'DELETE',
        headers: this.headers(),
      });
    } catch (error) {
      throw new DeleteError(remoteId, describeError(error), undefined, error);
    }

    if (response.status === 404) {
      this.logger.debug(`[remote] ${remoteId} already absent`);
      return;
    }
    if (!response.ok) {
      throw new DeleteError(remoteId, await describeResponse(response), response.status);
    }
  }

  async listFiles(folderId: string): Promise<RemoteFile[]> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url('/files', { folder_id: folderId }), {
        method: 'GET',
        headers: this.headers(),
      });
    } catch (error) {
      throw new ListError(folderId, describeError(error), undefined, error);
    }

    if (!response.ok) {
      throw new ListError(folderId, await describeResponse(response), response.status);
    }

    const parsed = ListResponseSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      throw new ListError(folderId, 'unexpected listing format', response.status);
    }

    const items = Array.isArray(parsed.data)
      ? parsed.data
      : 'files' in parsed.data ? parsed.data.files : parsed.data.data;

    const files: RemoteFile[] = [];
    for (const item of items) {
      const remoteId = pickId(item);
      if (!remoteId) continue;
      files.push({ remoteId, name: item.name ?? item.file_name ?? '' });
    }
    return files;
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch {
    return null;
  }
}

async function describeResponse(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  const trimmed = text.trim().slice(0, 300);
  return trimmed ? `HTTP ${response.status}: ${trimmed}` : `HTTP ${response.status}`;
}
