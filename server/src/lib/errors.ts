/**
 * Failure taxonomy for the generation pipeline.
 *
 * Components hand these back as values (or, for programmer errors, throw
 * them); only the orchestrator turns them into the caller-visible
 * `{ kind, message, retryable }` shape.
 */

export type FailureKind =
  | 'invalid_input'
  | 'model_transient'
  | 'model_permanent'
  | 'deadline_exceeded'
  | 'cancelled'
  | 'parse_error'
  | 'render_error';

export type FailingComponent =
  | 'orchestrator'
  | 'prompt_builder'
  | 'model_gateway'
  | 'response_parser'
  | 'render_engine';

export abstract class PipelineError extends Error {
  abstract readonly kind: FailureKind;
  abstract readonly retryable: boolean;
}

export class InvalidInputError extends PipelineError {
  readonly kind = 'invalid_input' as const;
  readonly retryable = false;

  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class ModelTransientError extends PipelineError {
  readonly kind = 'model_transient' as const;
  readonly retryable = true;

  constructor(message: string, readonly attempts: number) {
    super(message);
    this.name = 'ModelTransientError';
  }
}

export class ModelPermanentError extends PipelineError {
  readonly kind = 'model_permanent' as const;
  readonly retryable = false;

  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'ModelPermanentError';
  }
}

export class DeadlineExceededError extends PipelineError {
  readonly kind = 'deadline_exceeded' as const;
  readonly retryable = true;

  constructor(message = 'Request deadline exceeded') {
    super(message);
    this.name = 'DeadlineExceededError';
  }
}

export class CancelledError extends PipelineError {
  readonly kind = 'cancelled' as const;
  readonly retryable = true;

  constructor(message = 'Request cancelled by caller') {
    super(message);
    this.name = 'CancelledError';
  }
}

export type ParseFailureReason =
  | 'truncated'
  | 'invalid_json'
  | 'schema_mismatch'
  | 'missing_sections'
  | 'unexpected_sections'
  | 'duplicate_sections'
  | 'empty_section'
  | 'empty_entry'
  | 'missing_field'
  | 'body_too_short'
  | 'answer_count_mismatch'
  | 'empty_answer';

const RAW_SNIPPET_LENGTH = 300;

export class ParseError extends PipelineError {
  readonly kind = 'parse_error' as const;
  readonly retryable = true;
  readonly rawSnippet: string;

  constructor(readonly reason: ParseFailureReason, detail: string, raw: string) {
    super(`${reason}: ${detail}`);
    this.name = 'ParseError';
    this.rawSnippet = raw.substring(0, RAW_SNIPPET_LENGTH);
  }
}

/** A defect in the service itself, never a caller mistake. */
export class RenderError extends PipelineError {
  readonly kind = 'render_error' as const;
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'RenderError';
  }
}
