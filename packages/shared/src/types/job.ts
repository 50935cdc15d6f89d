/**
 * Job payload and result of the custom-workflow processor.
 */
import type { ProcessorErrorCode } from './api.js';
import type { Answer, Question } from './question.js';

export interface SourceFile {
  id: string;
  /** Content checksum; addresses the document in the chunk service. */
  checksum: string;
  name: string;
  path?: string;
  extension?: string;
  providerId?: string;
}

/** Per-job context supplied by the job system. */
export interface JobContext {
  id: string;
  /** Caller auth headers, forwarded to the runtime and chunk service. */
  headers: Record<string, string>;
}

export interface CustomWorkflowConfig {
  firstSourceFiles: SourceFile[];
  secondSourceFiles: SourceFile[];
  questions: Question[];
  /** Named flow to run; the default flow when absent. */
  workflowId?: string;
  /** JSON text: either a complete inline flow or extra flow parameters. */
  additionalInputs?: string;
  collectionId?: string;
}

export interface CustomWorkflowJobData {
  context: JobContext;
  config: CustomWorkflowConfig;
}

export interface CustomWorkflowOutput {
  answers: Answer[];
  collectionId?: string;
}

export type CustomWorkflowResult =
  | ({ status: 'succeeded' } & CustomWorkflowOutput)
  | { status: 'failed'; error: { code: ProcessorErrorCode | 'VALIDATION_ERROR' | 'INTERNAL_ERROR'; message: string } };
