import type { FlowDefinition } from '@flowqa/shared';

export function buildFlow(): FlowDefinition {
  return {
    flow_id: 'single_module',
    version: '2.0',
    name: 'Single module fixture',
    inputs: {
      parameters: { file_ids: 'list', query: 'str' },
      defaults: {},
    },
    steps: [
      {
        step_id: 'answer',
        tasks: [
          {
            task_id: 'answer',
            function: 'qa_agent_flow',
            inputs: { file_ids: '$flow.file_ids', query: '$flow.query' },
            export_to_flow: true,
          },
        ],
      },
    ],
  };
}
