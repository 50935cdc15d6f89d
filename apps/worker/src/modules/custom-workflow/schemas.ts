import { z } from 'zod';
import type { CustomWorkflowJobData } from '@flowqa/shared';

const sourceFileSchema = z.object({
  id: z.string(),
  checksum: z.string(),
  name: z.string(),
  path: z.string().optional(),
  extension: z.string().optional(),
  providerId: z.string().optional(),
});

const questionSchema = z.object({
  id: z.string().min(1),
  question: z.string(),
  answerType: z
    .object({
      type: z.enum(['STRING', 'NUMBER', 'BOOLEAN', 'DATE', 'ENUM']),
      multivalued: z.boolean().default(false),
    })
    .optional(),
  guidelines: z.string().optional(),
  expectedAnswer: z.string().optional(),
  inputQuestionIds: z.array(z.string()).default([]),
});

export const customWorkflowConfigSchema = z.object({
  firstSourceFiles: z.array(sourceFileSchema).default([]),
  secondSourceFiles: z.array(sourceFileSchema).default([]),
  questions: z.array(questionSchema),
  workflowId: z.string().optional(),
  additionalInputs: z.string().optional(),
  collectionId: z.string().optional(),
});

export const customWorkflowJobDataSchema = z.object({
  context: z.object({
    id: z.string().min(1),
    headers: z.record(z.string()).default({}),
  }),
  config: customWorkflowConfigSchema,
});

export type CustomWorkflowJobInput = z.input<typeof customWorkflowJobDataSchema>;

export type JobDataParseResult =
  | { success: true; data: CustomWorkflowJobData }
  | { success: false; message: string };

/** Validates a job payload as received from the queue. */
export function parseJobData(value: unknown): JobDataParseResult {
  const result = customWorkflowJobDataSchema.safeParse(value);
  if (!result.success) {
    const message = result.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    return { success: false, message };
  }
  return { success: true, data: result.data };
}
