/**
 * Maps job documents and questions onto the named inputs a flow declares.
 *
 * Two conventions exist:
 * - single-source: `file_ids`, `query`, `previous_answers` (+ `files`, `questions`)
 * - dual-source:   `first_source_file_ids`, `second_source_file_ids`, `query`,
 *                  `questions`, `previous_answers`
 *
 * Extra params are merged last and override computed keys.
 */
import type { FlowDefinition, Question, SourceFile } from '@flowqa/shared';
import type { Logger } from '../../lib/logger.js';

export type InputConvention = 'single-source' | 'dual-source';

export type FlowInputs = Record<string, unknown>;

export interface QuestionRecord {
  id: string;
  question: string;
  answerType: Question['answerType'] | null;
  guidelines: string;
  expectedAnswer: string;
  inputQuestionIds: string[];
}

export interface FileRecord {
  id: string;
  name: string;
  checksum: string;
  path: string;
  extension: string;
  providerId: string;
}

export function filesToRecords(files: SourceFile[]): FileRecord[] {
  return files.map((f) => ({
    id: f.id,
    name: f.name,
    checksum: f.checksum,
    path: f.path ?? '',
    extension: f.extension ?? '',
    providerId: f.providerId ?? '',
  }));
}

export function questionsToRecords(questions: Question[]): QuestionRecord[] {
  return questions.map((q) => ({
    id: q.id,
    question: q.question,
    answerType: q.answerType ?? null,
    guidelines: q.guidelines ?? '',
    expectedAnswer: q.expectedAnswer ?? '',
    inputQuestionIds: [...q.inputQuestionIds],
  }));
}

/**
 * Answers of the questions the first question depends on.
 * Dependency chains are not resolved yet: always empty.
 */
function previousAnswers(questions: Question[], logger?: Logger): unknown[] {
  const first = questions[0];
  if (first && first.inputQuestionIds.length > 0) {
    logger?.debug(
      { questionId: first.id, inputQuestionIds: first.inputQuestionIds },
      'Question dependencies are not resolved; previous_answers left empty',
    );
  }
  return [];
}

/**
 * Single-source convention, used by flows declaring `file_ids`.
 */
export function buildSingleSourceInputs(
  files: SourceFile[],
  questions: Question[],
  extraParams: FlowInputs = {},
  logger?: Logger,
): FlowInputs {
  return {
    file_ids: files.map((f) => f.id),
    query: questions[0]?.question ?? '',
    previous_answers: previousAnswers(questions, logger),
    files: filesToRecords(files),
    questions: questionsToRecords(questions),
    ...extraParams,
  };
}

/**
 * Dual-source convention. Flows must use these standard input names.
 */
export function buildCustomWorkflowInputs(
  firstSourceFiles: SourceFile[],
  secondSourceFiles: SourceFile[],
  questions: Question[],
  extraParams: FlowInputs = {},
  logger?: Logger,
): FlowInputs {
  if (Object.keys(extraParams).length > 0) {
    logger?.info({ keys: Object.keys(extraParams) }, 'Merging additional params into flow inputs');
  }

  return {
    first_source_file_ids: firstSourceFiles.map((f) => f.id),
    second_source_file_ids: secondSourceFiles.map((f) => f.id),
    query: questions[0]?.question ?? '',
    questions: questionsToRecords(questions),
    previous_answers: previousAnswers(questions, logger),
    ...extraParams,
  };
}

/**
 * Single-source only for flows that declare `file_ids` and not
 * `first_source_file_ids`; dual-source otherwise.
 */
export function selectInputConvention(flow: FlowDefinition): InputConvention {
  const declared = flow.inputs.parameters;
  if ('file_ids' in declared && !('first_source_file_ids' in declared)) {
    return 'single-source';
  }
  return 'dual-source';
}
