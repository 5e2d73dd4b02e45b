/**
 * Pipeline Orchestrator.
 *
 * Drives one generation through RECEIVED → PROMPTED → MODEL_CALLED → PARSED →
 * RENDERED → DONE, with FAILED reachable from every non-terminal state. A
 * parse failure goes back to PROMPTED once with a correction note.
 *
 * Requests with the same fingerprint share one execution. Each caller keeps
 * its own deadline and abort signal and can leave without disturbing the
 * others.
 */

import { createDeadlineSignal } from '../lib/abort.js';
import type { AppConfig } from '../lib/config.js';
import {
  CancelledError,
  DeadlineExceededError,
  InvalidInputError,
  ModelPermanentError,
  ModelTransientError,
  PipelineError,
  type FailingComponent,
  type FailureKind,
} from '../lib/errors.js';
import { deepFreeze } from '../lib/freeze.js';
import baseLogger, { type Logger } from '../lib/logger.js';
import { SingleFlight } from '../lib/single-flight.js';
import { computeFingerprint } from './fingerprint.js';
import { analyzeJobDescription } from './job-analysis.js';
import type { ModelGateway } from './model-gateway.js';
import { buildModelRequest, type PromptCorrection } from './prompt-builder.js';
import { parseModelResponse, type ParseExpectation } from './response-parser.js';
import { renderResult } from './render/index.js';
import { parseResumeText } from './resume-text.js';
import {
  GenerationRequestSchema,
  MAX_DEADLINE_MS,
  type GenerationRequest,
  type GenerationRequestBody,
} from './schemas.js';
import type { GenerationInput, ModelFailure, ModelRequest, RenderedOutput, TaskKind } from './types.js';

// ─── State machine ───────────────────────────────────────────────────

export type PipelineState = 'RECEIVED' | 'PROMPTED' | 'MODEL_CALLED' | 'PARSED' | 'RENDERED' | 'DONE' | 'FAILED';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  RECEIVED: ['PROMPTED', 'FAILED'],
  PROMPTED: ['MODEL_CALLED', 'FAILED'],
  MODEL_CALLED: ['PARSED', 'PROMPTED', 'FAILED'],
  PARSED: ['RENDERED', 'FAILED'],
  RENDERED: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export class IllegalTransitionError extends Error {
  constructor(readonly from: PipelineState, readonly to: PipelineState) {
    super(`Illegal pipeline transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class PipelineStateMachine {
  private current: PipelineState = 'RECEIVED';
  private readonly visited: PipelineState[] = ['RECEIVED'];

  constructor(private readonly log?: Logger) {}

  get state(): PipelineState {
    return this.current;
  }

  get history(): PipelineState[] {
    return [...this.visited];
  }

  transition(next: PipelineState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.log?.debug({ from: this.current, to: next }, 'Pipeline state transition');
    this.current = next;
    this.visited.push(next);
  }
}

// ─── Outcomes ────────────────────────────────────────────────────────

export interface PipelineFailure {
  kind: FailureKind;
  message: string;
  retryable: boolean;
  component: FailingComponent;
  /** State the execution was in when it failed. */
  state: PipelineState;
}

export type PipelineOutcome =
  | {
      ok: true;
      output: RenderedOutput;
      fingerprint: string;
      states: PipelineState[];
      /** True when this caller joined an execution another caller started. */
      shared: boolean;
    }
  | {
      ok: false;
      error: PipelineFailure;
      fingerprint?: string;
      states: PipelineState[];
    };

/** Where the execution stood when a caller detached from it. */
interface Departure {
  state: PipelineState;
  history: PipelineState[];
}

type ExecutionResult =
  | { ok: true; output: RenderedOutput; states: PipelineState[] }
  | { ok: false; error: PipelineFailure; states: PipelineState[] };

export interface RunOptions {
  signal?: AbortSignal;
  /** Overrides the request's `deadline_ms` and the configured default. */
  deadlineMs?: number;
  requestId?: string;
}

export type TaskRequestBody = Omit<GenerationRequestBody, 'task'>;

export interface Pipeline {
  run(request: unknown, options?: RunOptions): Promise<PipelineOutcome>;
  tailorResume(request: TaskRequestBody, options?: RunOptions): Promise<PipelineOutcome>;
  generateCoverLetter(request: TaskRequestBody, options?: RunOptions): Promise<PipelineOutcome>;
  answerQuestions(request: TaskRequestBody, options?: RunOptions): Promise<PipelineOutcome>;
  /** Number of executions currently in flight. */
  readonly inFlight: number;
}

export interface PipelineDeps {
  config: AppConfig;
  gateway: ModelGateway;
  logger?: Logger;
}

// ─── Helpers ─────────────────────────────────────────────────────────

function report(error: PipelineError, component: FailingComponent, state: PipelineState): PipelineFailure {
  return { kind: error.kind, message: error.message, retryable: error.retryable, component, state };
}

function modelFailureError(failure: ModelFailure): PipelineError {
  switch (failure.kind) {
    case 'transient':
      return new ModelTransientError(
        `Model unavailable after ${failure.attempts} attempt(s): ${failure.reason}`,
        failure.attempts,
      );
    case 'permanent':
      return new ModelPermanentError(`Model rejected the request: ${failure.reason}`, failure.status);
    case 'deadline_exceeded':
      return new DeadlineExceededError();
    case 'cancelled':
      return new CancelledError();
  }
}

function receivedStates(): PipelineState[] {
  return ['RECEIVED', 'FAILED'];
}

function normalize(request: GenerationRequest): GenerationInput {
  const resume = typeof request.resume === 'string' ? parseResumeText(request.resume) : request.resume;
  const job = typeof request.job_description === 'string'
    ? analyzeJobDescription(request.job_description)
    : analyzeJobDescription(request.job_description.text, request.job_description);

  return deepFreeze({
    taskKind: request.task,
    format: request.format,
    resume,
    jobDescription: job,
    questions: request.task === 'ANSWER_QUESTIONS' ? request.questions : [],
    options: {
      maxTokens: request.options.max_tokens,
      temperature: request.options.temperature,
    },
  });
}

function expectationFor(input: GenerationInput): ParseExpectation {
  switch (input.taskKind) {
    case 'TAILOR_RESUME':
      return { taskKind: 'TAILOR_RESUME', resume: input.resume };
    case 'COVER_LETTER':
      return { taskKind: 'COVER_LETTER' };
    case 'ANSWER_QUESTIONS':
      return { taskKind: 'ANSWER_QUESTIONS', questions: input.questions };
  }
}

// ─── Orchestrator ────────────────────────────────────────────────────

export function createPipeline(deps: PipelineDeps): Pipeline {
  const { config, gateway } = deps;
  const rootLogger = deps.logger ?? baseLogger;
  const flights = new SingleFlight<ExecutionResult>();
  const machines = new Map<string, PipelineStateMachine>();

  const requestFor = (input: GenerationInput, correction?: PromptCorrection): ModelRequest =>
    buildModelRequest(input.resume, input.jobDescription, input.taskKind, {
      questions: input.questions,
      generation: input.options,
      defaults: { maxTokens: config.model.maxTokens, temperature: config.model.temperature },
      correction,
    });

  async function execute(
    input: GenerationInput,
    fingerprint: string,
    deadline: number,
    signal: AbortSignal,
    log: Logger,
  ): Promise<ExecutionResult> {
    const machine = new PipelineStateMachine(log);
    machines.set(fingerprint, machine);

    const fail = (error: PipelineError, component: FailingComponent): ExecutionResult => {
      const failure = report(error, component, machine.state);
      machine.transition('FAILED');
      return { ok: false, error: failure, states: machine.history };
    };

    try {
      const expectation = expectationFor(input);
      let correction: PromptCorrection | undefined;

      for (let pass = 1; ; pass += 1) {
        machine.transition('PROMPTED');
        const request = requestFor(input, correction);

        machine.transition('MODEL_CALLED');
        const response = await gateway.invoke(request, deadline, signal);
        if (!response.ok) return fail(modelFailureError(response.failure), 'model_gateway');

        const parsed = parseModelResponse(response, expectation, config.parser);
        if (!parsed.ok) {
          log.warn(
            { pass, reason: parsed.error.reason, detail: parsed.error.message, rawSnippet: parsed.error.rawSnippet },
            'Model output rejected by parser',
          );
          if (pass === 1) {
            correction = { reason: parsed.error.reason };
            continue;
          }
          return fail(parsed.error, 'response_parser');
        }
        machine.transition('PARSED');

        let output: RenderedOutput;
        try {
          output = renderResult(parsed.result, input.format, { document: config.document });
        } catch (err) {
          if (err instanceof PipelineError) return fail(err, 'render_engine');
          throw err;
        }
        machine.transition('RENDERED');
        machine.transition('DONE');
        return { ok: true, output, states: machine.history };
      }
    } finally {
      if (machines.get(fingerprint) === machine) machines.delete(fingerprint);
    }
  }

  async function run(raw: unknown, options: RunOptions = {}): Promise<PipelineOutcome> {
    const parsed = GenerationRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
      const error = new InvalidInputError(`Invalid request: ${issues.join('; ')}`, issues);
      return { ok: false, error: report(error, 'orchestrator', 'RECEIVED'), states: receivedStates() };
    }

    let input: GenerationInput;
    let component: FailingComponent = 'orchestrator';
    try {
      input = normalize(parsed.data);
      // Validate up front so bad input never joins or starts an execution
      component = 'prompt_builder';
      requestFor(input);
    } catch (err) {
      if (err instanceof InvalidInputError) {
        return { ok: false, error: report(err, component, 'RECEIVED'), states: receivedStates() };
      }
      throw err;
    }

    const fingerprint = computeFingerprint(input);
    const log = rootLogger.child({
      requestId: options.requestId,
      fingerprint: fingerprint.slice(0, 16),
      task: input.taskKind,
      format: input.format,
    });

    const budgetMs = options.deadlineMs ?? parsed.data.options.deadline_ms ?? config.defaultDeadlineMs;
    const caller = createDeadlineSignal(options.signal, budgetMs);
    // The execution may outlive this caller when others join it, so it runs
    // to the longest deadline any caller can ask for. Each caller still
    // leaves at its own deadline, and the last one out aborts the execution.
    const executionDeadline = Date.now() + Math.max(budgetMs, MAX_DEADLINE_MS);

    // Registered before the flight's own listener, so it sees the execution
    // as it was when this caller left
    let leftAt: Departure | undefined;
    const recordDeparture = () => {
      const machine = machines.get(fingerprint);
      leftAt = { state: machine?.state ?? 'RECEIVED', history: machine?.history ?? ['RECEIVED'] };
    };
    caller.signal.addEventListener('abort', recordDeparture, { once: true });

    try {
      const flight = await flights.run(
        fingerprint,
        (signal) => execute(input, fingerprint, executionDeadline, signal, log),
        caller.signal,
      );

      if (flight.status === 'detached') {
        const error = caller.expired() ? new DeadlineExceededError() : new CancelledError();
        const departure: Departure = leftAt ?? { state: 'RECEIVED', history: ['RECEIVED'] };
        const { state, history } = departure;
        log.warn({ kind: error.kind, state, shared: flight.shared }, 'Caller left before the execution finished');
        return {
          ok: false,
          error: report(error, 'orchestrator', state),
          fingerprint,
          states: [...history, 'FAILED'],
        };
      }

      const result = flight.value;
      if (!result.ok) {
        log.warn({ ...result.error, shared: flight.shared }, 'Generation failed');
        return { ok: false, error: result.error, fingerprint, states: result.states };
      }
      log.info(
        { shared: flight.shared, bytes: result.output.body.byteLength, contentType: result.output.contentType },
        'Generation completed',
      );
      return { ok: true, output: result.output, fingerprint, states: result.states, shared: flight.shared };
    } finally {
      caller.signal.removeEventListener('abort', recordDeparture);
      caller.cleanup();
    }
  }

  const forTask = (task: TaskKind) =>
    (request: TaskRequestBody, options?: RunOptions) => run({ ...request, task }, options);

  return {
    run,
    tailorResume: forTask('TAILOR_RESUME'),
    generateCoverLetter: forTask('COVER_LETTER'),
    answerQuestions: forTask('ANSWER_QUESTIONS'),
    get inFlight() {
      return flights.size;
    },
  };
}
