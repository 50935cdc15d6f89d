/**
 * Template for a hand-written flow: copy, rename the file and edit buildFlow().
 * The file name is the flow name passed as `workflowId`.
 */
import type { FlowDefinition } from '@flowqa/shared';

export const DEFAULT_THRESHOLD = 10;

export function buildFlow(): FlowDefinition {
  return {
    version: '1.0',
    flow_id: 'example_custom',
    name: 'Example Custom Flow',
    inputs: {
      parameters: {
        first_source_file_ids: 'list',
        query: 'str',
        threshold: 'int',
      },
      defaults: { threshold: DEFAULT_THRESHOLD },
    },
    steps: [
      {
        step_id: 'preprocess',
        tasks: [
          {
            task_id: 'analyze_files',
            function: 'search_task',
            inputs: {
              file_ids: '$flow.first_source_file_ids',
              questions: [{ question: '$flow.query' }],
            },
            export_to_flow: false,
          },
        ],
      },
      {
        step_id: 'path_a',
        tasks: [
          {
            task_id: 'handle_path_a',
            function: 'answer_task',
            inputs: {
              questions: [{ question: '$flow.query' }],
              search_results: '$analyze_files.search_results',
            },
            export_to_flow: true,
          },
        ],
        when: { ref: '$flow.threshold', op: '>=', value: DEFAULT_THRESHOLD },
      },
      {
        step_id: 'path_b',
        tasks: [
          {
            task_id: 'handle_path_b',
            function: 'answer_task',
            inputs: {
              questions: [{ question: '$flow.query' }],
              search_results: [],
            },
            export_to_flow: true,
          },
        ],
        when: { ref: '$flow.threshold', op: '<', value: DEFAULT_THRESHOLD },
      },
    ],
  };
}
