/**
 * Document identifier encodings.
 *
 * Upstream producers derived content ids from a document identifier written
 * either as a bare UUID or as an entity descriptor embedding it, e.g.
 * `EntityId(id='75de269e-a343-408d-b21a-ec297365a964', type='FILE')`.
 * Each supplied id is decoded to its bare UUID by an ordered list of
 * decoders, then re-encoded in every known form.
 *
 * The set of encodings is what has been observed so far, not a guarantee.
 */

const UUID_SOURCE = '[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}';

const BARE_UUID = new RegExp(`^${UUID_SOURCE}$`, 'i');
const DESCRIPTOR_ID = new RegExp(`\\bid\\s*=\\s*['"]?(${UUID_SOURCE})['"]?`, 'i');

export type DocumentIdDecoder = (raw: string) => string | undefined;

export const DOCUMENT_ID_DECODERS: readonly DocumentIdDecoder[] = [
  // bare UUID
  (raw) => (BARE_UUID.test(raw.trim()) ? raw.trim().toLowerCase() : undefined),
  // entity descriptor: ...id='<uuid>'...
  (raw) => DESCRIPTOR_ID.exec(raw)?.[1]?.toLowerCase(),
];

export function entityDescriptor(uuid: string): string {
  return `EntityId(id='${uuid}', type='FILE')`;
}

/** First successful decoder wins. */
export function decodeDocumentId(raw: string): string | undefined {
  for (const decode of DOCUMENT_ID_DECODERS) {
    const uuid = decode(raw);
    if (uuid) return uuid;
  }
  return undefined;
}

/**
 * Every textual form a document id may have been hashed under:
 * the id as supplied, its bare UUID and its entity descriptor.
 */
export function documentIdEncodings(raw: string): string[] {
  const encodings = [raw];
  const uuid = decodeDocumentId(raw);
  if (uuid) {
    encodings.push(uuid, entityDescriptor(uuid));
  }
  return [...new Set(encodings)];
}
