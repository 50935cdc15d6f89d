/**
 * Flow definition schema: zod validation of loaded and inline flows.
 * Unknown keys are kept so definitions dumped by other tooling pass through intact.
 */
import { z } from 'zod';
import type { FlowDefinition } from '@flowqa/shared';

const referenceConditionSchema = z
  .object({
    ref: z.string().startsWith('$'),
    op: z.enum(['==', '!=', '>', '>=', '<', '<=']),
    value: z.unknown(),
  })
  .passthrough()
  // zod infers unknown-typed keys as optional; keep `value` a required key
  .transform(({ value, ...rest }) => ({ ...rest, value }));

const taskSchema = z
  .object({
    task_id: z.string().min(1),
    function: z.string().min(1),
    inputs: z.record(z.unknown()).default({}),
    export_to_flow: z.boolean().default(false),
    when: referenceConditionSchema.nullish().transform((v) => v ?? undefined),
  })
  .passthrough();

const stepSchema = z
  .object({
    step_id: z.string().min(1),
    tasks: z.array(taskSchema).min(1),
    when: referenceConditionSchema.nullish().transform((v) => v ?? undefined),
  })
  .passthrough();

export const flowDefinitionSchema = z
  .object({
    flow_id: z.string().min(1),
    version: z.string().min(1),
    name: z.string().default(''),
    inputs: z
      .object({
        parameters: z.record(z.string()).default({}),
        defaults: z.record(z.unknown()).default({}),
      })
      .passthrough()
      .default({}),
    steps: z.array(stepSchema).min(1),
  })
  .passthrough();

export type FlowDefinitionParseResult =
  | { success: true; flow: FlowDefinition }
  | { success: false; issues: string[] };

/**
 * Validates an already-parsed value against the flow definition shape.
 */
export function parseFlowDefinition(value: unknown): FlowDefinitionParseResult {
  const result = flowDefinitionSchema.safeParse(value);
  if (!result.success) {
    return { success: false, issues: formatIssues(result.error) };
  }
  return { success: true, flow: result.data };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
}
