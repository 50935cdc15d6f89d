/**
 * Flow output contract: zod schemas for the two accepted output shapes.
 *
 * Single-question: `{ final_result: FinalResult, ... }`
 * Multi-question:  `{ answers: AnswerRecord[], ... }`
 *
 * `citation_annotation_ids` and `annotations` are written by citation
 * enrichment before resolution, never by the flow itself.
 */
import { z } from 'zod';

const VALIDITY = 'a number in [0, 1]';
const PAGE = 'a non-negative integer';

export const positionSchema = z.object({
  page: z.number().int(PAGE).min(0, PAGE),
  boundingBox: z.object({
    x0: z.number(),
    y0: z.number(),
    x1: z.number(),
    y1: z.number(),
  }),
});

export const annotationSchema = z.object({
  id: z.string(),
  documentId: z.string(),
  documentName: z.string(),
  content: z.string(),
  positions: z.array(positionSchema).default([]),
});

// Key order matters: missing fields are reported in this order.
const answerFields = {
  answer: z.string(),
  answer_explanation: z.string(),
  justifying_contents_ids: z.array(z.string()),
  answer_validity: z.number().min(0, VALIDITY).max(1, VALIDITY).optional(),
  validity_explanation: z.string().optional(),
  citation_annotation_ids: z.array(z.string()).optional(),
  annotations: z.array(annotationSchema).optional(),
};

export const finalResultSchema = z.object(answerFields).passthrough();

export const answerRecordSchema = z
  .object({
    id: z.string(),
    question: z.string(),
    ...answerFields,
  })
  .passthrough();

export type FinalResult = z.infer<typeof finalResultSchema>;
export type AnswerRecord = z.infer<typeof answerRecordSchema>;

export type FlowOutput =
  | { kind: 'single'; finalResult: FinalResult }
  | { kind: 'multi'; answers: AnswerRecord[] };

/** Top-level output key of each shape. */
export const SINGLE_RESULT_KEY = 'final_result';
export const MULTI_RESULT_KEY = 'answers';

/** Keys written back by citation enrichment. */
export const CITATION_IDS_KEY = 'citation_annotation_ids';
export const ANNOTATIONS_KEY = 'annotations';
export const JUSTIFYING_IDS_KEY = 'justifying_contents_ids';
