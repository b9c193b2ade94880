/**
 * Retry Controller
 *
 * Each attempt is one round trip: send -> coerce -> match. The controller is a
 * small state machine:
 *
 *   attempting(k) --ok--------------------> succeeded(k)
 *   attempting(k) --failed, k < numTries--> attempting(k + 1)
 *   attempting(k) --failed, k = numTries--> exhausted(k)
 */

import { AttemptErrorKind, AttemptLog } from "./audit";
import { coerce } from "./coercion";
import {
  AttemptError,
  InputContractError,
  ParseError,
  ProviderError,
  ProviderTimeoutError,
  RetriesExhaustedError,
  TypeMismatchError,
} from "./errors";
import { DiagnosticSink, LogContext, noopSink } from "./logger";
import { explainMismatch, matches } from "./matcher";
import { Descriptor, RETRY_MODES, RetryConfig, RetryMode } from "./types";
import { describeValue, sleep } from "./utils";

export const DEFAULT_RETRY_CONFIG: RetryConfig = Object.freeze({
  numTries: 1,
  mode: "chill",
  backoffBaseMs: 0,
  backoffMaxMs: 8000,
});

export type RetryState<T> =
  | { readonly status: "attempting"; readonly attempt: number; readonly lastError?: AttemptError }
  | { readonly status: "succeeded"; readonly attempt: number; readonly value: T }
  | { readonly status: "exhausted"; readonly attempt: number; readonly lastError: AttemptError };

export type AttemptResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: AttemptError };

/**
 * Next state after one attempt. Only an `attempting` state has successors.
 */
export function transition<T>(
  state: Extract<RetryState<T>, { status: "attempting" }>,
  result: AttemptResult<T>,
  numTries: number
): RetryState<T> {
  if (result.ok) {
    return { status: "succeeded", attempt: state.attempt, value: result.value };
  }
  if (state.attempt < numTries) {
    return { status: "attempting", attempt: state.attempt + 1, lastError: result.error };
  }
  return { status: "exhausted", attempt: state.attempt, lastError: result.error };
}

/**
 * Delay before the attempt following failed attempt `failedAttempt`
 */
export function backoffDelay(config: RetryConfig, failedAttempt: number): number {
  if (config.backoffBaseMs <= 0) {
    return 0;
  }
  return Math.min(config.backoffBaseMs * 2 ** (failedAttempt - 1), config.backoffMaxMs);
}

export function isRetryMode(value: unknown): value is RetryMode {
  return RETRY_MODES.some((mode) => mode === value);
}

function isNonNegative(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Fill defaults and validate. The result is frozen.
 */
export function resolveRetryConfig(partial: Partial<RetryConfig> = {}): RetryConfig {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...stripUndefined(partial) };

  if (!Number.isInteger(config.numTries) || config.numTries < 1) {
    throw new InputContractError(`numTries must be an integer >= 1, got ${String(config.numTries)}`);
  }
  if (!isRetryMode(config.mode)) {
    throw new InputContractError(`mode must be one of ${RETRY_MODES.join(", ")}, got ${String(config.mode)}`);
  }
  if (!isNonNegative(config.backoffBaseMs) || !isNonNegative(config.backoffMaxMs)) {
    throw new InputContractError("backoff delays must be finite and non-negative");
  }
  return Object.freeze(config);
}

function stripUndefined(partial: Partial<RetryConfig>): Partial<RetryConfig> {
  const result: { -readonly [K in keyof RetryConfig]?: RetryConfig[K] } = {};
  if (partial.numTries !== undefined) result.numTries = partial.numTries;
  if (partial.mode !== undefined) result.mode = partial.mode;
  if (partial.backoffBaseMs !== undefined) result.backoffBaseMs = partial.backoffBaseMs;
  if (partial.backoffMaxMs !== undefined) result.backoffMaxMs = partial.backoffMaxMs;
  return result;
}

export function errorKind(error: AttemptError): AttemptErrorKind {
  if (error instanceof ProviderTimeoutError) return "timeout";
  if (error instanceof ProviderError) return "provider";
  if (error instanceof ParseError) return "parse";
  return "type_mismatch";
}

export interface RetryControllerOptions {
  /** Name used in log context and attempt records */
  provider?: string;
  logger?: DiagnosticSink;
  auditLog?: AttemptLog;
  sleep?: (ms: number) => Promise<void>;
}

type Observed<T> = AttemptResult<T> & { rawText?: string };

let timerCount = 0;

export class RetryController {
  readonly config: RetryConfig;
  private readonly provider: string;
  private readonly logger: DiagnosticSink;
  private readonly auditLog?: AttemptLog;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(config: RetryConfig, options: RetryControllerOptions = {}) {
    this.config = config;
    this.provider = options.provider ?? "provider";
    this.logger = options.logger ?? noopSink;
    this.auditLog = options.auditLog;
    this.wait = options.sleep ?? sleep;
  }

  /**
   * Run attempts until one yields a value matching `descriptor` or the budget
   * runs out. Errors outside the attempt taxonomy propagate immediately.
   */
  run<T>(label: string, send: () => Promise<string>, descriptor: Descriptor<T>): Promise<T> {
    return this.loop(label, (context) => this.attempt(send, descriptor, context));
  }

  /**
   * Same budget and bookkeeping as run(), but any non-empty response is
   * accepted as it arrived
   */
  runText(label: string, send: () => Promise<string>): Promise<string> {
    return this.loop(label, async (context) => {
      const received = await this.receive(send, context);
      return received.ok ? { ok: true, value: received.rawText, rawText: received.rawText } : received;
    });
  }

  private async loop<T>(label: string, step: (context: LogContext) => Promise<Observed<T>>): Promise<T> {
    let state: RetryState<T> = { status: "attempting", attempt: 1 };

    while (state.status === "attempting") {
      const attempt = state.attempt;
      const context: LogContext = { request: label, attempt, phase: "retry", component: this.provider };

      if (attempt > 1) {
        const delay = backoffDelay(this.config, attempt - 1);
        if (delay > 0) {
          this.logger.debug("Backing off", { delay }, context);
          await this.wait(delay);
        }
      }

      timerCount += 1;
      const timer = `${label}#${timerCount}`;
      const started = Date.now();
      this.logger.startTimer(timer);
      let result: Observed<T>;
      try {
        result = await step(context);
      } finally {
        this.logger.endTimer(timer, "Attempt finished", context);
      }
      const durationMs = Date.now() - started;

      if (result.ok) {
        this.auditLog?.recordAttempt(label, attempt, true, {
          provider: this.provider,
          durationMs,
          rawText: result.rawText,
        });
      } else {
        this.logger.warn(
          "Attempt failed",
          { kind: errorKind(result.error), reason: result.error.message, remaining: this.config.numTries - attempt },
          context
        );
        this.auditLog?.recordAttempt(label, attempt, false, {
          provider: this.provider,
          durationMs,
          errorKind: errorKind(result.error),
          message: result.error.message,
          rawText: result.rawText,
        });
      }

      state = transition(state, result, this.config.numTries);
    }

    if (state.status === "succeeded") {
      this.logger.info("Accepted response", { attempts: state.attempt }, { request: label, phase: "retry" });
      return state.value;
    }

    const exhausted = new RetriesExhaustedError(label, state.attempt, state.lastError);
    this.logger.error(exhausted.message, { attempts: state.attempt }, { request: label, phase: "retry" });
    this.auditLog?.recordExhausted(label, state.attempt, state.lastError.message);
    throw exhausted;
  }

  private async receive(
    send: () => Promise<string>,
    context: LogContext
  ): Promise<{ ok: true; rawText: string } | { ok: false; error: ProviderError }> {
    let rawText: string;
    try {
      rawText = await send();
    } catch (error) {
      if (error instanceof ProviderError) {
        return { ok: false, error };
      }
      throw error;
    }

    this.logger.debug("Raw response", { rawText }, context);
    return { ok: true, rawText };
  }

  private async attempt<T>(send: () => Promise<string>, descriptor: Descriptor<T>, context: LogContext): Promise<Observed<T>> {
    const received = await this.receive(send, context);
    if (!received.ok) {
      return received;
    }
    const rawText = received.rawText;

    const outcome = coerce(rawText, descriptor, this.config.mode);
    if (outcome.status === "failed") {
      return { ok: false, error: outcome.error, rawText };
    }

    const value = outcome.value;
    if (matches(value, descriptor)) {
      this.logger.debug("Coerced value", { shape: describeValue(value) }, context);
      return { ok: true, value, rawText };
    }

    const mismatch = explainMismatch(value, descriptor);
    const error = mismatch.ok
      ? new TypeMismatchError("$", "matching value", value)
      : new TypeMismatchError(mismatch.path, mismatch.expected, value, "failed validation");
    return { ok: false, error, rawText };
  }
}
