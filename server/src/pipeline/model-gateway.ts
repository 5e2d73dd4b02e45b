import { createDeadlineSignal } from '../lib/abort.js';
import type { RetryPolicy } from '../lib/config.js';
import type { GenerativeModel } from '../lib/llm-provider.js';
import type { Logger } from '../lib/logger.js';
import { modelAttemptMetrics } from '../lib/metrics.js';
import { classifyError, getStatusCode, withRetry } from '../lib/retry.js';
import type { ModelFailure, ModelRequest, ModelResponse } from './types.js';

export type AttemptOutcome = 'success' | 'transient' | 'permanent' | 'aborted';

export interface AttemptTelemetry {
  taskKind: ModelRequest['taskKind'];
  attempt: number;
  latencyMs: number;
  outcome: AttemptOutcome;
}

/** Receives one report per model attempt. */
export type TelemetrySink = (report: AttemptTelemetry) => void;

export const metricsTelemetry: TelemetrySink = (report) => {
  modelAttemptMetrics.record(
    [`outcome_${report.outcome}`, `task_${report.taskKind.toLowerCase()}`],
    report.latencyMs,
  );
};

export interface ModelGateway {
  /**
   * Call the model for `request`, retrying transient failures until
   * `deadline` (epoch ms). Resolves with a failure value instead of throwing.
   */
  invoke(request: ModelRequest, deadline: number, signal?: AbortSignal): Promise<ModelResponse>;
}

export interface ModelGatewayOptions {
  model: GenerativeModel;
  retry: RetryPolicy;
  logger: Logger;
  telemetry?: TelemetrySink;
}

export function createModelGateway(options: ModelGatewayOptions): ModelGateway {
  const { model, retry, logger } = options;
  const telemetry = options.telemetry ?? metricsTelemetry;

  return {
    async invoke(request, deadline, signal) {
      const fail = (failure: ModelFailure): ModelResponse => {
        logger.warn({ taskKind: request.taskKind, ...failure }, 'Model call failed');
        return { ok: false, failure };
      };

      if (signal?.aborted) {
        return fail({ kind: 'cancelled', reason: 'Cancelled before the model was called', attempts: 0 });
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return fail({ kind: 'deadline_exceeded', reason: 'Deadline passed before the model was called', attempts: 0 });
      }

      const scope = createDeadlineSignal(signal, remaining);
      let attempts = 0;

      try {
        const output = await withRetry(
          (attempt) => {
            attempts = attempt;
            return model.generate(
              { system: request.system, prompt: request.prompt, params: request.params },
              scope.signal,
            );
          },
          {
            maxAttempts: retry.maxAttempts,
            baseDelay: retry.baseDelayMs,
            factor: retry.factor,
            maxDelay: retry.maxDelayMs,
            signal: scope.signal,
            onAttempt: (report) => {
              const outcome: AttemptOutcome = report.outcome !== 'success' && scope.signal.aborted
                ? 'aborted'
                : report.outcome;
              telemetry({ taskKind: request.taskKind, attempt: report.attempt, latencyMs: report.latencyMs, outcome });
              logger.debug(
                { taskKind: request.taskKind, attempt: report.attempt, latencyMs: report.latencyMs, outcome },
                'Model attempt finished',
              );
            },
            onRetry: (attempt, error, delayMs) => {
              logger.warn(
                { taskKind: request.taskKind, attempt, delayMs: Math.round(delayMs), reason: error.message },
                'Transient model failure, retrying',
              );
            },
          },
        );

        logger.info(
          { taskKind: request.taskKind, attempts, truncated: output.truncated, usage: output.usage, provider: model.name },
          'Model call succeeded',
        );
        return { ok: true, text: output.text, truncated: output.truncated, attempts };
      } catch (err) {
        if (scope.expired()) {
          return fail({ kind: 'deadline_exceeded', reason: 'Deadline exceeded during the model call', attempts });
        }
        if (signal?.aborted) {
          return fail({ kind: 'cancelled', reason: 'Cancelled during the model call', attempts });
        }
        const reason = err instanceof Error ? err.message : String(err);
        const status = getStatusCode(err) ?? undefined;
        return fail({ kind: classifyError(err), reason, attempts, ...(status !== undefined ? { status } : {}) });
      } finally {
        scope.cleanup();
      }
    },
  };
}
