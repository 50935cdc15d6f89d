/**
 * Citation enrichment.
 *
 * Resolves the content ids cited by a flow's answers into annotations by
 * recomputing the id of every chunk of every source document and matching
 * exactly. Results are written back into the outputs as `annotations` and
 * `citation_annotation_ids` so the output resolver can enforce the citation
 * linkage. Any cited id left unresolved fails the whole enrichment.
 */
import type { Annotation, Position, SourceFile } from '@flowqa/shared';
import type { Logger } from '../../lib/logger.js';
import { isRecord, uniqueInOrder } from '../../lib/records.js';
import { ProcessorError } from '../../types/index.js';
import {
  ANNOTATIONS_KEY,
  CITATION_IDS_KEY,
  JUSTIFYING_IDS_KEY,
  MULTI_RESULT_KEY,
  SINGLE_RESULT_KEY,
} from '../io/output-schemas.js';
import { boundingBoxPositionSchema, type ChunkSource, type DocumentChunk } from './chunk-client.js';
import { contentId } from './content-id.js';
import { documentIdEncodings } from './document-id.js';

export interface EnrichOptions {
  logger?: Logger;
  signal?: AbortSignal;
}

type FlowOutputs = Record<string, unknown>;

function stringIds(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * The records that carry citations, in the same precedence the output
 * resolver decodes them: `final_result` first, then `answers`.
 */
function citingRecords(outputs: FlowOutputs): Record<string, unknown>[] {
  if (SINGLE_RESULT_KEY in outputs) {
    const finalResult = outputs[SINGLE_RESULT_KEY];
    return isRecord(finalResult) ? [finalResult] : [];
  }
  const answers = outputs[MULTI_RESULT_KEY];
  return Array.isArray(answers) ? answers.filter(isRecord) : [];
}

/** Distinct cited content ids across all answers, in first-seen order. */
export function collectContentIds(outputs: FlowOutputs): string[] {
  return uniqueInOrder(citingRecords(outputs).flatMap((record) => stringIds(record[JUSTIFYING_IDS_KEY])));
}

/** Bounding-box positions only; other position kinds are dropped. */
export function extractPositions(chunk: DocumentChunk): Position[] {
  const positions: Position[] = [];
  for (const raw of chunk.positions) {
    const parsed = boundingBoxPositionSchema.safeParse(raw);
    if (!parsed.success) continue;
    const { page, x0, y0, x1, y1 } = parsed.data;
    positions.push({ page, boundingBox: { x0, y0, x1, y1 } });
  }
  return positions;
}

function toAnnotation(id: string, file: SourceFile, chunk: DocumentChunk): Annotation {
  return {
    id,
    documentId: file.id,
    documentName: file.name,
    content: chunk.content,
    positions: extractPositions(chunk),
  };
}

/**
 * Matches chunks of one document against the outstanding ids, under every
 * encoding of the document id. Stops once nothing is outstanding.
 */
function scanDocument(
  file: SourceFile,
  chunks: DocumentChunk[],
  outstanding: Set<string>,
  resolved: Map<string, Annotation>,
): void {
  const encodings = documentIdEncodings(file.id);
  for (const chunk of chunks) {
    if (outstanding.size === 0) return;
    for (const encoding of encodings) {
      const id = contentId(encoding, chunk.id);
      if (outstanding.delete(id)) {
        resolved.set(id, toAnnotation(id, file, chunk));
      }
    }
  }
}

/**
 * Resolves every id or throws UNRESOLVED_CITATIONS.
 * Documents are fetched one at a time, and only while ids remain outstanding.
 */
export async function resolveContentIds(
  ids: string[],
  sourceFiles: SourceFile[],
  chunkSource: ChunkSource,
  options: EnrichOptions = {},
): Promise<Map<string, Annotation>> {
  const { logger, signal } = options;
  const outstanding = new Set(ids);
  const resolved = new Map<string, Annotation>();
  const visited = new Set<string>();

  for (const file of sourceFiles) {
    if (outstanding.size === 0) break;

    if (!file.id || !file.checksum) {
      logger?.warn({ fileId: file.id, fileName: file.name }, 'Skipping source file without id or checksum');
      continue;
    }

    const key = `${file.id}\u0000${file.checksum}`;
    if (visited.has(key)) continue;
    visited.add(key);

    const chunks = await chunkSource.listChunks(file.checksum, signal ? { signal } : {});
    scanDocument(file, chunks, outstanding, resolved);
    logger?.debug(
      { fileId: file.id, chunks: chunks.length, resolved: resolved.size, outstanding: outstanding.size },
      'Scanned source document for citations',
    );
  }

  if (outstanding.size > 0) {
    throw ProcessorError.unresolvedCitations(ids.filter((id) => outstanding.has(id)));
  }

  return resolved;
}

function annotateRecord(record: Record<string, unknown>, resolved: Map<string, Annotation>): Record<string, unknown> {
  const annotations = uniqueInOrder(stringIds(record[JUSTIFYING_IDS_KEY])).flatMap((id) => {
    const annotation = resolved.get(id);
    return annotation ? [annotation] : [];
  });
  return {
    ...record,
    [ANNOTATIONS_KEY]: annotations,
    [CITATION_IDS_KEY]: annotations.map((a) => a.id),
  };
}

function writeAnnotations(outputs: FlowOutputs, resolved: Map<string, Annotation>): FlowOutputs {
  if (SINGLE_RESULT_KEY in outputs) {
    const finalResult = outputs[SINGLE_RESULT_KEY];
    return isRecord(finalResult)
      ? { ...outputs, [SINGLE_RESULT_KEY]: annotateRecord(finalResult, resolved) }
      : outputs;
  }

  const answers = outputs[MULTI_RESULT_KEY];
  if (!Array.isArray(answers)) return outputs;
  return {
    ...outputs,
    [MULTI_RESULT_KEY]: answers.map((item: unknown) => (isRecord(item) ? annotateRecord(item, resolved) : item)),
  };
}

/**
 * Returns a copy of `outputs` with citations resolved, or `outputs` itself
 * when nothing is cited (no chunk service call is made then).
 */
export async function enrichCitations(
  outputs: FlowOutputs,
  sourceFiles: SourceFile[],
  chunkSource: ChunkSource | undefined,
  options: EnrichOptions = {},
): Promise<FlowOutputs> {
  const ids = collectContentIds(outputs);
  if (ids.length === 0) {
    options.logger?.debug('No cited content ids; skipping citation enrichment');
    return outputs;
  }

  if (!chunkSource) {
    throw ProcessorError.dependencyUnavailable(
      'Citation enrichment needs the chunk service, but FLOWQA_CHUNK_SERVICE_URL is not configured',
    );
  }

  const resolved = await resolveContentIds(ids, sourceFiles, chunkSource, options);
  options.logger?.info({ cited: ids.length, files: sourceFiles.length }, 'Resolved cited content ids');
  return writeAnnotations(outputs, resolved);
}
