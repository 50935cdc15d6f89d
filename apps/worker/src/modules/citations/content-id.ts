import { v5 as uuidv5 } from 'uuid';

/**
 * Namespace seed of content ids. Must equal the one used by the indexing
 * pipeline that produced the ids flows cite (the RFC 4122 URL namespace).
 */
export const CONTENT_ID_NAMESPACE = '6ba7b811-9dad-11d1-80b4-00c04fd430c8';

/**
 * Deterministic id of one chunk of one document:
 * UUIDv5 over `"<documentId>:<chunkId>"`.
 */
export function contentId(documentId: string, chunkId: string): string {
  return uuidv5(`${documentId}:${chunkId}`, CONTENT_ID_NAMESPACE);
}
