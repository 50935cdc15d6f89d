/**
 * Flow definition types.
 * A flow is a named, versioned sequence of conditional steps whose tasks call
 * functions registered in the external flow runtime.
 */

export type ConditionOperator = '==' | '!=' | '>' | '>=' | '<' | '<=';

/**
 * Guard comparing a reference (`$flow.<input>` or `$<taskId>.<output>`)
 * against a literal value.
 */
export interface ReferenceCondition {
  ref: string;
  op: ConditionOperator;
  value: unknown;
}

export interface FlowTask {
  task_id: string;
  /** Name of a function registered in the flow runtime. */
  function: string;
  /** Literal values or `$`-prefixed references. */
  inputs: Record<string, unknown>;
  /** Whether the task's outputs become visible at flow scope. */
  export_to_flow: boolean;
  when?: ReferenceCondition;
}

export interface FlowStep {
  step_id: string;
  tasks: FlowTask[];
  when?: ReferenceCondition;
}

export interface FlowInputs {
  /** Declared parameter name → type name (e.g. "list", "str", "int"). */
  parameters: Record<string, string>;
  defaults: Record<string, unknown>;
}

export interface FlowDefinition {
  flow_id: string;
  version: string;
  name: string;
  inputs: FlowInputs;
  steps: FlowStep[];
}

export type FlowRunStatus = 'succeeded' | 'failed';

/** Result reported by the flow runtime for one execution. */
export interface FlowResult {
  status: FlowRunStatus;
  outputs: Record<string, unknown>;
  error?: string;
}

/** Entry of the available-flows listing, e.g. `{ name: 'qa_default', format: 'ts' }`. */
export interface AvailableFlow {
  name: string;
  format: string;
}
