/**
 * Default question-answering flow.
 *
 * 1. Check whether the first-source documents fit in a single model call.
 * 2. Route to a strategy:
 *    - small documents → answer from full content
 *    - large documents → answer with search
 *
 * Uses the dual-source input convention (`first_source_file_ids`,
 * `second_source_file_ids`, `query`, `questions`, `previous_answers`).
 */
import type { FlowDefinition } from '@flowqa/shared';

export function buildFlow(): FlowDefinition {
  return {
    version: '1.0',
    flow_id: 'qa_default',
    name: 'Processor QA Default Flow',
    inputs: {
      parameters: {
        first_source_file_ids: 'list',
        second_source_file_ids: 'list',
        query: 'str',
        previous_answers: 'list',
      },
      defaults: {
        second_source_file_ids: [],
        previous_answers: [],
      },
    },
    steps: [
      {
        step_id: 'fits_in_context',
        tasks: [
          {
            task_id: 'fits_in_context',
            function: 'fits_in_single_call_flow',
            inputs: { file_ids: '$flow.first_source_file_ids' },
            export_to_flow: false,
          },
        ],
      },
      {
        step_id: 'qa_agent',
        tasks: [
          {
            task_id: 'qa_agent',
            function: 'qa_agent_flow',
            inputs: {
              file_ids: '$flow.first_source_file_ids',
              query: '$flow.query',
              previous_answers: '$flow.previous_answers',
            },
            export_to_flow: true,
            when: { ref: '$fits_in_context.fits_in_context', op: '==', value: false },
          },
        ],
      },
      {
        step_id: 'qa_agent_with_full_content',
        tasks: [
          {
            task_id: 'qa_agent_with_full_content',
            function: 'qa_agent_flow_with_full_content',
            inputs: {
              file_ids: '$flow.first_source_file_ids',
              query: '$flow.query',
              previous_answers: '$flow.previous_answers',
            },
            export_to_flow: true,
          },
        ],
        when: { ref: '$fits_in_context.fits_in_context', op: '==', value: true },
      },
    ],
  };
}
