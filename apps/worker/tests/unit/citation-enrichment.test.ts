/**
 * Unit tests for citation enrichment against an in-process chunk source.
 */
import { describe, it, expect } from 'vitest';
import type { SourceFile } from '@flowqa/shared';
import { contentId } from '../../src/modules/citations/content-id.js';
import { entityDescriptor } from '../../src/modules/citations/document-id.js';
import { collectContentIds, enrichCitations, extractPositions } from '../../src/modules/citations/enrichment.js';
import { ProcessorError } from '../../src/types/index.js';
import { chunk, FakeChunkSource } from '../helpers/fakes.js';

const UUID = '0f8fad5b-d9cb-469f-a165-70867728950e';

const d1: SourceFile = { id: 'd1', checksum: 'c1', name: 'lease.pdf' };
const d2: SourceFile = { id: 'd2', checksum: 'c2', name: 'annex.pdf' };

const chunks = new FakeChunkSource({
  c1: [
    chunk('ch1', 'Rent is 1200.', [
      { type: 'bbox', page: 1, x0: 10, y0: 20, x1: 110, y1: 40 },
      { type: 'span', start: 0, end: 13 },
    ]),
    chunk('ch2', 'Term ends 2030.'),
  ],
  c2: [chunk('ch1', 'Landlord: ACME.')],
});

function fresh(): FakeChunkSource {
  return new FakeChunkSource({ c1: [chunk('ch1', 'Rent is 1200.'), chunk('ch2', 'Term ends 2030.')] });
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('expected a rejection');
    },
    (err: unknown) => err,
  );
}

describe('enrichCitations', () => {
  it('makes no service call when nothing is cited', async () => {
    const source = fresh();
    const outputs = {
      answers: [
        { id: 'q1', question: 'A?', answer: 'a', answer_explanation: 'e', justifying_contents_ids: [] },
        { id: 'q2', question: 'B?', answer: 'b', answer_explanation: 'e', justifying_contents_ids: [] },
      ],
    };

    expect(await enrichCitations(outputs, [d1], source)).toBe(outputs);
    expect(source.calls).toEqual([]);
    expect(await enrichCitations(outputs, [d1], undefined)).toBe(outputs);
  });

  it('fails closed when a cited id matches no chunk', async () => {
    const outputs = { final_result: { answer: 'X', answer_explanation: 'E', justifying_contents_ids: ['x'] } };

    const err = await rejection(enrichCitations(outputs, [d1], fresh()));
    expect(err).toBeInstanceOf(ProcessorError);
    expect(err).toMatchObject({
      code: 'UNRESOLVED_CITATIONS',
      message: '1 cited content id(s) could not be resolved: [x]',
      details: { count: 1, sample: ['x'] },
    });
  });

  it('samples at most five unresolved ids', async () => {
    const ids = ['a', 'b', 'c', 'd', 'e', 'f', 'g'];
    const outputs = { final_result: { answer: 'X', answer_explanation: 'E', justifying_contents_ids: ids } };

    const err = await rejection(enrichCitations(outputs, [d1], fresh()));
    expect(err).toMatchObject({
      message: '7 cited content id(s) could not be resolved: [a, b, c, d, e, ...]',
      details: { count: 7, sample: ['a', 'b', 'c', 'd', 'e'] },
    });
  });

  it('writes annotations and citation ids in citation order without duplicates', async () => {
    const id1 = contentId('d1', 'ch1');
    const id2 = contentId('d1', 'ch2');
    const outputs = { final_result: { answer: 'X', answer_explanation: 'E', justifying_contents_ids: [id2, id1, id2] } };

    const enriched = await enrichCitations(outputs, [d1], chunks);

    expect(enriched).toEqual({
      final_result: {
        answer: 'X',
        answer_explanation: 'E',
        justifying_contents_ids: [id2, id1, id2],
        citation_annotation_ids: [id2, id1],
        annotations: [
          { id: id2, documentId: 'd1', documentName: 'lease.pdf', content: 'Term ends 2030.', positions: [] },
          {
            id: id1,
            documentId: 'd1',
            documentName: 'lease.pdf',
            content: 'Rent is 1200.',
            positions: [{ page: 1, boundingBox: { x0: 10, y0: 20, x1: 110, y1: 40 } }],
          },
        ],
      },
    });
    expect(outputs.final_result).not.toHaveProperty('annotations');
  });

  it('annotates each answer of a multi-question output', async () => {
    const rent = contentId('d1', 'ch1');
    const landlord = contentId('d2', 'ch1');
    const outputs = {
      answers: [
        { id: 'q1', question: 'A?', answer: 'a', answer_explanation: 'e', justifying_contents_ids: [rent] },
        { id: 'q2', question: 'B?', answer: 'b', answer_explanation: 'e', justifying_contents_ids: [landlord] },
        { id: 'q3', question: 'C?', answer: 'c', answer_explanation: 'e', justifying_contents_ids: [] },
      ],
    };

    const enriched = await enrichCitations(outputs, [d1, d2], chunks);
    const answers = enriched['answers'];

    expect(Array.isArray(answers)).toBe(true);
    expect(answers).toMatchObject([
      { citation_annotation_ids: [rent], annotations: [{ documentName: 'lease.pdf', content: 'Rent is 1200.' }] },
      { citation_annotation_ids: [landlord], annotations: [{ documentName: 'annex.pdf', content: 'Landlord: ACME.' }] },
      { citation_annotation_ids: [], annotations: [] },
    ]);
  });

  it('resolves ids derived from the entity descriptor of a bare UUID document', async () => {
    const source = new FakeChunkSource({ c9: [chunk('ch1', 'Signed by both parties.')] });
    const cited = contentId(entityDescriptor(UUID), 'ch1');
    const outputs = { final_result: { answer: 'yes', answer_explanation: 'e', justifying_contents_ids: [cited] } };

    const enriched = await enrichCitations(outputs, [{ id: UUID, checksum: 'c9', name: 'contract.pdf' }], source);

    expect(enriched['final_result']).toMatchObject({ citation_annotation_ids: [cited] });
  });

  it('resolves ids derived from the bare UUID of a descriptor document', async () => {
    const source = new FakeChunkSource({ c9: [chunk('ch1', 'Signed by both parties.')] });
    const cited = contentId(UUID, 'ch1');
    const outputs = { final_result: { answer: 'yes', answer_explanation: 'e', justifying_contents_ids: [cited] } };

    const enriched = await enrichCitations(
      outputs,
      [{ id: entityDescriptor(UUID), checksum: 'c9', name: 'contract.pdf' }],
      source,
    );

    expect(enriched['final_result']).toMatchObject({
      citation_annotation_ids: [cited],
      annotations: [{ id: cited, documentId: entityDescriptor(UUID), content: 'Signed by both parties.' }],
    });
  });

  it('stops fetching once every id is resolved', async () => {
    const source = new FakeChunkSource({
      c1: [chunk('ch1', 'Rent is 1200.')],
      c2: [chunk('ch1', 'Landlord: ACME.')],
    });
    const outputs = {
      final_result: { answer: 'X', answer_explanation: 'E', justifying_contents_ids: [contentId('d1', 'ch1')] },
    };

    await enrichCitations(outputs, [d1, d2], source);
    expect(source.calls).toEqual(['c1']);
  });

  it('skips documents without checksum and fetches each document once', async () => {
    const source = fresh();
    const outputs = { final_result: { answer: 'X', answer_explanation: 'E', justifying_contents_ids: ['x'] } };

    await rejection(enrichCitations(outputs, [{ id: 'd0', checksum: '', name: 'n' }, d1, { ...d1 }], source));
    expect(source.calls).toEqual(['c1']);
  });

  it('needs a chunk source once something is cited', async () => {
    const outputs = { final_result: { answer: 'X', answer_explanation: 'E', justifying_contents_ids: ['x'] } };
    expect(await rejection(enrichCitations(outputs, [d1], undefined))).toMatchObject({ code: 'DEPENDENCY_UNAVAILABLE' });
  });
});

describe('collectContentIds', () => {
  it('collects distinct ids in first-seen order', () => {
    expect(
      collectContentIds({
        answers: [
          { justifying_contents_ids: ['b', 'a'] },
          { justifying_contents_ids: ['a', 'c', 7] },
          'not a record',
        ],
      }),
    ).toEqual(['b', 'a', 'c']);
  });

  it('reads final_result ahead of answers', () => {
    expect(
      collectContentIds({
        final_result: { justifying_contents_ids: ['f'] },
        answers: [{ justifying_contents_ids: ['a'] }],
      }),
    ).toEqual(['f']);
  });
});

describe('extractPositions', () => {
  it('keeps bounding boxes only', () => {
    expect(
      extractPositions(
        chunk('c', 'text', [
          { type: 'bbox', page: 3, x0: 0, y0: 0, x1: 1, y1: 1 },
          { type: 'bbox', page: 'three' },
          { type: 'polygon', points: [] },
        ]),
      ),
    ).toEqual([{ page: 3, boundingBox: { x0: 0, y0: 0, x1: 1, y1: 1 } }]);
  });
});
