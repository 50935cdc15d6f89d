/**
 * Output resolver.
 * Decodes a flow's outputs into one of the two accepted shapes, validates it
 * strictly, and maps it onto ordered Answer records.
 */
import type { z } from 'zod';
import type { Annotation, Answer, Question } from '@flowqa/shared';
import { isRecord, uniqueInOrder } from '../../lib/records.js';
import { ProcessorError } from '../../types/index.js';
import {
  answerRecordSchema,
  finalResultSchema,
  MULTI_RESULT_KEY,
  SINGLE_RESULT_KEY,
  type AnswerRecord,
  type FinalResult,
  type FlowOutput,
} from './output-schemas.js';

/**
 * `annotated`: claimed citations must have been resolved by enrichment.
 * `legacy`: flows configured as predating annotation support; nothing is required.
 */
export type CitationMode = 'annotated' | 'legacy';

export interface ResolveOptions {
  citationMode?: CitationMode;
}

/** Sort position of answers whose question text matches no original question. */
const NOT_FOUND_POSITION = Number.MAX_SAFE_INTEGER;

const SINGLE_DEFAULT_VALIDITY = 1.0;
const MULTI_DEFAULT_VALIDITY = 0.0;

function formatPath(path: (string | number)[]): string {
  return path
    .map((part, i) => (typeof part === 'number' ? `[${part}]` : i === 0 ? part : `.${part}`))
    .join('');
}

/** Expectation of a failed field: the expected type, or the schema's own wording for range checks. */
function expectedOf(issue: z.ZodIssue): string {
  return issue.code === 'invalid_type' ? issue.expected : issue.message;
}

/**
 * Validates one record. Missing required fields are all reported together;
 * otherwise the first type mismatch is reported.
 */
function validateRecord<S extends z.ZodTypeAny>(schema: S, value: unknown, where: string): z.output<S> {
  if (!isRecord(value)) {
    throw ProcessorError.typeViolation(where, 'an object');
  }

  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const { issues } = result.error;
  const missing = issues
    .filter((i) => i.code === 'invalid_type' && i.received === 'undefined' && i.path.length === 1)
    .map((i) => String(i.path[0]));
  if (missing.length > 0) {
    throw ProcessorError.schemaViolation(missing, where);
  }

  const first = issues[0];
  if (!first) {
    throw ProcessorError.typeViolation(where, 'a valid record');
  }
  throw ProcessorError.typeViolation(`${where}.${formatPath(first.path)}`, expectedOf(first));
}

/**
 * Decodes outputs into the single- or multi-question shape.
 * `final_result` is checked before `answers`.
 */
export function decodeFlowOutput(outputs: Record<string, unknown>): FlowOutput {
  if (SINGLE_RESULT_KEY in outputs) {
    const finalResult: FinalResult = validateRecord(finalResultSchema, outputs[SINGLE_RESULT_KEY], SINGLE_RESULT_KEY);
    return { kind: 'single', finalResult };
  }

  if (MULTI_RESULT_KEY in outputs) {
    const raw = outputs[MULTI_RESULT_KEY];
    if (!Array.isArray(raw)) {
      throw ProcessorError.typeViolation(MULTI_RESULT_KEY, 'an array');
    }
    const answers: AnswerRecord[] = raw.map((item, i) =>
      validateRecord(answerRecordSchema, item, `${MULTI_RESULT_KEY}[${i}]`),
    );
    return { kind: 'multi', answers };
  }

  throw ProcessorError.unrecognizedOutputFormat(Object.keys(outputs).sort());
}

interface Citations {
  citationIds: string[];
  annotations: Annotation[];
}

/**
 * Citation ids and annotations of a record. In annotated mode every claimed
 * id must have been resolved, and both fields may only hold what
 * enrichment wrote for the record's own claims.
 */
function citationsOf(record: FinalResult, where: string, mode: CitationMode): Citations {
  const claimed = record.justifying_contents_ids;
  const citationIds = record.citation_annotation_ids ?? [];
  const annotations = record.annotations ?? [];
  if (mode === 'legacy') return { citationIds, annotations };

  if (claimed.length > 0 && citationIds.length === 0) {
    throw ProcessorError.unresolvedCitations(uniqueInOrder(claimed), where);
  }

  const claimedIds = new Set(claimed);
  const unclaimed = citationIds.filter((id) => !claimedIds.has(id));
  if (unclaimed.length > 0) {
    throw ProcessorError.unresolvedCitations(uniqueInOrder(unclaimed), where);
  }

  const citedIds = new Set(citationIds);
  const unlinked = annotations.filter((a) => !citedIds.has(a.id)).map((a) => a.id);
  if (unlinked.length > 0) {
    throw ProcessorError.unresolvedCitations(uniqueInOrder(unlinked), where);
  }

  return { citationIds, annotations };
}

export function formatSourcedContent(answer: string, citationIds: string[]): string {
  return citationIds.length > 0 ? `[${answer}](cite:${citationIds.join(',')})` : answer;
}

interface AnswerTarget {
  id: string;
  question: string;
  expectedAnswer: string;
  inputQuestionIds: string[];
}

function toAnswer(
  record: FinalResult,
  target: AnswerTarget,
  where: string,
  mode: CitationMode,
  defaultValidity: number,
): Answer {
  const { citationIds, annotations } = citationsOf(record, where, mode);
  return {
    id: target.id,
    question: target.question,
    answer: record.answer,
    expectedAnswer: target.expectedAnswer,
    sourcedContent: formatSourcedContent(record.answer, citationIds),
    explanation: record.answer_explanation,
    answerValidity: record.answer_validity ?? defaultValidity,
    validityExplanation: record.validity_explanation ?? '',
    justifyingContentIds: [...record.justifying_contents_ids],
    citationIds,
    annotations,
    inputQuestionIds: [...target.inputQuestionIds],
  };
}

export function questionIndex(question: string, questions: Question[]): number {
  return questions.findIndex((q) => q.question === question);
}

/**
 * Stable sort by position of each answer's question in `questions`;
 * unmatched answers go last in their original relative order.
 */
export function sortByQuestionOrder(answers: Answer[], questions: Question[]): Answer[] {
  return answers
    .map((answer, arrival) => {
      const index = questionIndex(answer.question, questions);
      return { answer, arrival, position: index === -1 ? NOT_FOUND_POSITION : index };
    })
    .sort((a, b) => a.position - b.position || a.arrival - b.arrival)
    .map((entry) => entry.answer);
}

function findOriginal(record: AnswerRecord, questions: Question[]): Question | undefined {
  return questions.find((q) => q.id === record.id) ?? questions.find((q) => q.question === record.question);
}

/**
 * Converts flow outputs into answers ordered like `originalQuestions`.
 * Fails rather than guesses.
 */
export function resolveAnswers(
  outputs: Record<string, unknown>,
  originalQuestions: Question[],
  options: ResolveOptions = {},
): Answer[] {
  const mode = options.citationMode ?? 'annotated';
  const decoded = decodeFlowOutput(outputs);

  if (decoded.kind === 'single') {
    const question = originalQuestions[0];
    if (!question) throw ProcessorError.unboundResult();
    return [
      toAnswer(
        decoded.finalResult,
        {
          id: question.id,
          question: question.question,
          expectedAnswer: question.expectedAnswer ?? '',
          inputQuestionIds: question.inputQuestionIds,
        },
        SINGLE_RESULT_KEY,
        mode,
        SINGLE_DEFAULT_VALIDITY,
      ),
    ];
  }

  const answers = decoded.answers.map((record, i) => {
    const original = findOriginal(record, originalQuestions);
    return toAnswer(
      record,
      {
        id: record.id,
        question: record.question,
        expectedAnswer: original?.expectedAnswer ?? '',
        inputQuestionIds: original?.inputQuestionIds ?? [],
      },
      `${MULTI_RESULT_KEY}[${i}]`,
      mode,
      MULTI_DEFAULT_VALIDITY,
    );
  });

  return sortByQuestionOrder(answers, originalQuestions);
}
