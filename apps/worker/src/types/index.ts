import type { AvailableFlow, ProcessorErrorCode } from '@flowqa/shared';

/** How many unresolved content ids an UNRESOLVED_CITATIONS message samples. */
export const UNRESOLVED_SAMPLE_SIZE = 5;

/**
 * Error raised by every stage of the processor.
 * The job layer and the HTTP error handler map these to failure envelopes.
 */
export class ProcessorError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: ProcessorErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ProcessorError';
  }

  static notFound(flowName: string, flowsDir: string, available: AvailableFlow[]): ProcessorError {
    const listing = available.map((f) => `${f.name} (${f.format})`);
    return new ProcessorError(
      404,
      'NOT_FOUND',
      `Flow '${flowName}' not found in ${flowsDir}. Available flows: [${listing.join(', ')}]`,
      { flowName, flowsDir, available: listing },
    );
  }

  static malformed(message: string, details?: Record<string, unknown>): ProcessorError {
    return new ProcessorError(422, 'MALFORMED', message, details);
  }

  static invalidDefinition(parserMessage: string): ProcessorError {
    return new ProcessorError(400, 'INVALID_DEFINITION', `Invalid flow definition: ${parserMessage}`);
  }

  static schemaViolation(missing: string[], where = 'final_result'): ProcessorError {
    return new ProcessorError(
      422,
      'SCHEMA_VIOLATION',
      `Flow output ${where} is missing required field(s): ${missing.join(', ')}`,
      { where, missing },
    );
  }

  static unboundResult(): ProcessorError {
    return new ProcessorError(
      422,
      'SCHEMA_VIOLATION',
      'Flow output final_result cannot be bound: the job supplied no question',
      { where: 'final_result', missing: ['question'] },
    );
  }

  /** @param field Full path of the offending field, e.g. `answers[1].answer`. */
  static typeViolation(field: string, expected: string): ProcessorError {
    return new ProcessorError(
      422,
      'TYPE_VIOLATION',
      `Flow output field '${field}' must be ${expected}`,
      { field, expected },
    );
  }

  static unrecognizedOutputFormat(keys: string[]): ProcessorError {
    return new ProcessorError(
      422,
      'UNRECOGNIZED_OUTPUT_FORMAT',
      `Flow output has neither 'final_result' nor 'answers'; top-level keys: [${keys.join(', ')}]`,
      { keys },
    );
  }

  static unresolvedCitations(unresolved: string[], where?: string): ProcessorError {
    const sample = unresolved.slice(0, UNRESOLVED_SAMPLE_SIZE);
    const suffix = unresolved.length > sample.length ? ', ...' : '';
    const scope = where ? ` in ${where}` : '';
    return new ProcessorError(
      422,
      'UNRESOLVED_CITATIONS',
      `${unresolved.length} cited content id(s)${scope} could not be resolved: [${sample.join(', ')}${suffix}]`,
      { count: unresolved.length, sample },
    );
  }

  static runnerFailure(message: string): ProcessorError {
    return new ProcessorError(502, 'RUNNER_FAILURE', message);
  }

  static dependencyUnavailable(message: string): ProcessorError {
    return new ProcessorError(503, 'DEPENDENCY_UNAVAILABLE', message);
  }
}
