/**
 * Client of the chunk service, which serves the indexed chunks of a document
 * addressed by its content checksum.
 *
 * Request:  GET {baseUrl}/documents/{checksum}/chunks[?cursor=...]
 * Response: { chunks: [{ id, content, positions: [{ type, ... }] }], nextCursor: string | null }
 */
import { z } from 'zod';
import type { JobContext } from '@flowqa/shared';
import type { Env } from '../../config/index.js';
import { fetchJson, HttpCallError } from '../../lib/http-client.js';
import { ProcessorError } from '../../types/index.js';

export const boundingBoxPositionSchema = z.object({
  type: z.literal('bbox'),
  page: z.number().int().min(0),
  x0: z.number(),
  y0: z.number(),
  x1: z.number(),
  y1: z.number(),
});

const documentChunkSchema = z.object({
  id: z.string().min(1),
  content: z.string(),
  // Position kinds vary; enrichment keeps the bounding boxes and drops the rest.
  positions: z.array(z.unknown()).default([]),
});

const chunkPageSchema = z.object({
  chunks: z.array(documentChunkSchema),
  nextCursor: z.string().min(1).nullish(),
});

export type DocumentChunk = z.infer<typeof documentChunkSchema>;

export interface ListChunksOptions {
  signal?: AbortSignal;
}

/** Source of a document's chunks, in document order. */
export interface ChunkSource {
  listChunks(checksum: string, options?: ListChunksOptions): Promise<DocumentChunk[]>;
}

export interface ChunkServiceClientConfig {
  baseUrl: string;
  timeoutMs: number;
  /** Caller auth headers forwarded on every request. */
  headers?: Record<string, string>;
}

export class ChunkServiceClient implements ChunkSource {
  private readonly baseUrl: string;

  constructor(private readonly config: ChunkServiceClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  /**
   * Fetches every page of a document's chunks.
   * Any failure is DEPENDENCY_UNAVAILABLE; retrying is left to the job system.
   */
  async listChunks(checksum: string, options: ListChunksOptions = {}): Promise<DocumentChunk[]> {
    const chunks: DocumentChunk[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;

    do {
      const query = cursor ? `?cursor=${encodeURIComponent(cursor)}` : '';
      const url = `${this.baseUrl}/documents/${encodeURIComponent(checksum)}/chunks${query}`;

      let body: unknown;
      try {
        body = await fetchJson(url, {
          headers: this.config.headers ?? {},
          timeoutMs: this.config.timeoutMs,
          ...(options.signal ? { signal: options.signal } : {}),
        });
      } catch (err) {
        if (err instanceof HttpCallError) {
          throw ProcessorError.dependencyUnavailable(`Chunk service unavailable: ${err.message}`);
        }
        throw err;
      }

      const page = chunkPageSchema.safeParse(body);
      if (!page.success) {
        throw ProcessorError.dependencyUnavailable(
          `Chunk service returned an invalid page for document ${checksum}: ${page.error.errors[0]?.message ?? 'unknown error'}`,
        );
      }

      chunks.push(...page.data.chunks);
      cursor = page.data.nextCursor ?? undefined;
      if (cursor !== undefined) {
        if (seenCursors.has(cursor)) {
          throw ProcessorError.dependencyUnavailable(`Chunk service repeated cursor '${cursor}' for document ${checksum}`);
        }
        seenCursors.add(cursor);
      }
    } while (cursor !== undefined);

    return chunks;
  }
}

/**
 * Per-job chunk source forwarding the job's auth headers; undefined when
 * FLOWQA_CHUNK_SERVICE_URL is unset.
 */
export function createChunkSourceFactory(
  env: Pick<Env, 'FLOWQA_CHUNK_SERVICE_URL' | 'FLOWQA_CHUNK_SERVICE_TIMEOUT_MS'>,
): (ctx: JobContext) => ChunkSource | undefined {
  const baseUrl = env.FLOWQA_CHUNK_SERVICE_URL;
  if (!baseUrl) return () => undefined;
  return (ctx) =>
    new ChunkServiceClient({ baseUrl, timeoutMs: env.FLOWQA_CHUNK_SERVICE_TIMEOUT_MS, headers: { ...ctx.headers } });
}
