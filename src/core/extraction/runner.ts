/**
 * Extraction Runner
 *
 * Drives one entry through context assembly, provider calls and output
 * validation, applying the configured timeout, retry and fallback policy.
 *
 * Policy:
 * - Each call is bounded by `timeoutMs`; TIMEOUT, NETWORK_ERROR and
 *   RATE_LIMITED are retried up to `maxRetries` times with exponential backoff
 * - Invalid output is not retried; it fails the provider like any other error
 * - A failed provider falls back to the local heuristic only when
 *   `allowFallback` is set, and the result is marked degraded
 * - Cancellation always fails the run with kind CANCELLED
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ProviderConfig } from '@/config/schema';
import { assembleContext } from './context';
import { ExtractionError, type ExtractionFailureKind, ProviderError } from './errors';
import { ObserverRegistry } from './observers';
import { LocalHeuristicProvider } from './providers/local';
import { CandidateSet } from './schemas';
import { RunnerStateMachine } from './state';
import type { ExtractionProvider, ExtractionRequest, ExtractionResult } from './types';

export interface ExtractionRunnerOptions {
  config: Readonly<ProviderConfig>;
  provider: ExtractionProvider;
  /** Defaults to the local heuristic */
  fallback?: ExtractionProvider;
  observers?: ObserverRegistry;
}

export interface ExtractionInput {
  entryId: string;
  text: string;
}

interface Failure {
  kind: ExtractionFailureKind;
  message: string;
  cause?: Error;
}

/** Per-run bookkeeping shared by the call loops. */
interface RunContext {
  entryId: string;
  signal: AbortSignal;
  machine: RunnerStateMachine;
  attempts: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

function cancelled(cause?: unknown): ExtractionError {
  return new ExtractionError(
    'Extraction cancelled',
    'CANCELLED',
    cause instanceof Error ? cause : undefined
  );
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 * Providers that ignore their signal cannot hold a run past its deadline.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
    if (signal.aborted) onAbort();
  });
}

function toFailure(error: unknown, signal: AbortSignal): Failure {
  if (error instanceof ExtractionError || error instanceof ProviderError) {
    return { kind: error.kind, message: error.message, cause: error };
  }
  if (signal.aborted) {
    return { kind: 'CANCELLED', message: 'Extraction cancelled' };
  }
  return {
    kind: 'NETWORK_ERROR',
    message: error instanceof Error ? error.message : String(error),
    cause: error instanceof Error ? error : undefined
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Runner
// ═══════════════════════════════════════════════════════════════════════════════

export class ExtractionRunner {
  private readonly config: Readonly<ProviderConfig>;
  private readonly provider: ExtractionProvider;
  private readonly fallback: ExtractionProvider;
  private readonly observers: ObserverRegistry;

  constructor(options: ExtractionRunnerOptions) {
    this.config = options.config;
    this.provider = options.provider;
    this.fallback = options.fallback ?? new LocalHeuristicProvider();
    this.observers = options.observers ?? new ObserverRegistry();
  }

  /**
   * Extract candidates for one entry.
   * Throws ExtractionError when the provider fails and no fallback applies.
   */
  async run(
    input: ExtractionInput,
    signal: AbortSignal = new AbortController().signal
  ): Promise<ExtractionResult> {
    const started = performance.now();
    const run: RunContext = {
      entryId: input.entryId,
      signal,
      machine: new RunnerStateMachine(),
      attempts: 0
    };

    this.observers.notify({ type: 'started', entryId: input.entryId, provider: this.provider.name });

    run.machine.transition('Assembling');
    const context = assembleContext(input.text, this.config);
    const requests: ExtractionRequest[] = context.segments.map((text) => ({
      entryId: input.entryId,
      text,
      truncated: context.truncated,
      contextWindowTokens: this.config.contextWindowTokens
    }));

    let provider = this.provider;
    let candidates = new CandidateSet(input.entryId);
    let degraded = false;

    try {
      for (const [index, request] of requests.entries()) {
        run.machine.transition('Calling');
        const raw = await this.callWithRetry(provider, request, index, run);
        run.machine.transition('Validating');
        candidates.addRaw(raw);
      }
    } catch (error) {
      const failure = toFailure(error, signal);
      if (!this.canFallBack(failure)) {
        this.fail(run, failure);
      }

      run.machine.transition('FallingBack');
      this.observers.notify({
        type: 'fell_back',
        entryId: input.entryId,
        from: this.provider.name,
        reason: failure.kind,
        message: failure.message
      });

      provider = this.fallback;
      candidates = new CandidateSet(input.entryId);
      degraded = true;
      try {
        for (const [index, request] of requests.entries()) {
          candidates.addRaw(await this.callOnce(provider, request, index, run));
        }
      } catch (fallbackError) {
        this.fail(run, toFailure(fallbackError, signal));
      }
    }

    run.machine.transition('Succeeded');
    const { entities, relations } = candidates.finalize();
    const latencyMs = Math.round(performance.now() - started);

    this.observers.notify({
      type: 'succeeded',
      entryId: input.entryId,
      provider: provider.name,
      degraded,
      latencyMs,
      entities: entities.length,
      relations: relations.length
    });

    return {
      entryId: input.entryId,
      entities,
      relations,
      metadata: {
        provider: provider.name,
        latencyMs,
        truncated: context.truncated,
        degraded,
        attempts: run.attempts,
        segments: requests.length
      }
    };
  }

  private canFallBack(failure: Failure): boolean {
    return (
      failure.kind !== 'CANCELLED' &&
      this.config.allowFallback &&
      this.provider.name !== this.fallback.name
    );
  }

  private fail(run: RunContext, failure: Failure): never {
    run.machine.transition('Failed');
    this.observers.notify({
      type: 'failed',
      entryId: run.entryId,
      kind: failure.kind,
      message: failure.message,
      stage: 'extraction'
    });
    throw new ExtractionError(failure.message, failure.kind, failure.cause);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Provider Calls
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Call the provider for one segment, retrying retryable failures.
   * At most `maxRetries + 1` calls are made.
   */
  private async callWithRetry(
    provider: ExtractionProvider,
    request: ExtractionRequest,
    segment: number,
    run: RunContext
  ): Promise<unknown> {
    for (let attempt = 0; ; attempt++) {
      if (attempt > 0) run.machine.transition('Calling');
      try {
        return await this.callOnce(provider, request, segment, run, attempt + 1);
      } catch (error) {
        if (!(error instanceof ProviderError) || !error.retryable || attempt >= this.config.maxRetries) {
          throw error;
        }
        try {
          await sleep(this.config.retryBaseDelayMs * 2 ** attempt, undefined, { signal: run.signal });
        } catch (sleepError) {
          throw cancelled(sleepError);
        }
      }
    }
  }

  /**
   * One provider call under its own timeout.
   * Failures come out as ProviderError, or ExtractionError(CANCELLED).
   */
  private async callOnce(
    provider: ExtractionProvider,
    request: ExtractionRequest,
    segment: number,
    run: RunContext,
    attempt = 1
  ): Promise<unknown> {
    if (run.signal.aborted) throw cancelled(run.signal.reason);

    run.attempts++;
    this.observers.notify({
      type: 'provider_called',
      entryId: run.entryId,
      provider: provider.name,
      attempt,
      segment
    });

    const timeout = AbortSignal.timeout(this.config.timeoutMs);
    const attemptSignal = AbortSignal.any([run.signal, timeout]);
    try {
      return await raceAbort(provider.extract(request, attemptSignal), attemptSignal);
    } catch (error) {
      if (run.signal.aborted) throw cancelled(error);
      if (timeout.aborted) {
        throw new ProviderError(
          `${provider.name} did not answer within ${this.config.timeoutMs}ms`,
          'TIMEOUT',
          error instanceof Error ? error : undefined
        );
      }
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(
        error instanceof Error ? error.message : String(error),
        'NETWORK_ERROR',
        error instanceof Error ? error : undefined
      );
    }
  }
}
