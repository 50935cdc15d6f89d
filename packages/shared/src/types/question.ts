/**
 * Question / answer contract exchanged with callers.
 */

export type AnswerDataType = 'STRING' | 'NUMBER' | 'BOOLEAN' | 'DATE' | 'ENUM';

export interface ExpectedAnswerType {
  type: AnswerDataType;
  multivalued: boolean;
}

export interface Question {
  id: string;
  question: string;
  answerType?: ExpectedAnswerType;
  guidelines?: string;
  /** Caller-supplied ground truth, copied verbatim onto the answer. */
  expectedAnswer?: string;
  /** Ids of questions whose answers this one depends on. */
  inputQuestionIds: string[];
}

export interface BoundingBox {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface Position {
  page: number;
  boundingBox: BoundingBox;
}

/** A resolved citation: an excerpt of a source document. */
export interface Annotation {
  /** Content id of the cited chunk. */
  id: string;
  documentId: string;
  documentName: string;
  content: string;
  positions: Position[];
}

export interface Answer {
  id: string;
  question: string;
  answer: string;
  expectedAnswer: string;
  /** `[answer](cite:id1,id2)` when citations resolved, otherwise the bare answer. */
  sourcedContent: string;
  explanation: string;
  /** Score in [0, 1]. */
  answerValidity: number;
  validityExplanation: string;
  justifyingContentIds: string[];
  citationIds: string[];
  annotations: Annotation[];
  inputQuestionIds: string[];
}
