/**
 * Reckoner: the single entry point
 *
 * const reckon = new Reckoner(new OpenAI(), "gpt-4.1-mini", { numTries: 3, mode: "eager" });
 * await reckon.evaluate("Paris is the capital of France");   // true
 *
 * const add = reckon.evaluate((a: number, b: number): number => 0, {
 *   docstring: "Add two numbers",
 *   returns: "number",
 * });
 * await add(2, 3);   // 5
 *
 * await reckon.prompt("Name a prime above 90", t.integer());   // 97
 */

import { AttemptLog } from "./lib/audit";
import { DEFAULT_TIMEOUT_MS } from "./lib/config";
import { t } from "./lib/descriptors";
import { InputContractError } from "./lib/errors";
import { createSink, DiagnosticSink, Verbosity } from "./lib/logger";
import { buildFreeformPrompt, buildFunctionPrompt, buildStatementPrompt } from "./lib/prompts";
import { createDefaultRegistry, ProviderRegistry } from "./lib/providers/registry";
import { ProviderAdapter } from "./lib/providers/types";
import { defaultRecords, RecordRegistry, TypeResolver } from "./lib/resolver";
import { resolveRetryConfig, RetryController } from "./lib/retry";
import { bindArguments, ResolvedSignature, resolveSignature, SignatureInput } from "./lib/signature";
import { Descriptor, FunctionRequest, RetryConfig, StatementRequest, TypeLike } from "./lib/types";
import { normalize } from "./lib/utils";

const LABEL_LENGTH = 60;

export interface ReckonerConfig extends Partial<RetryConfig> {
  /** Per-request transport timeout */
  timeoutMs?: number;
  /** System instruction sent with every prompt */
  systemInstruction?: string;
}

export interface ReckonerOptions {
  /** Diagnostic sink; overrides logLevel */
  logger?: DiagnosticSink;
  logLevel?: Verbosity;
  auditLog?: AttemptLog;
  registry?: ProviderRegistry;
  records?: RecordRegistry;
  /** Delay used between attempts when backoff is configured */
  sleep?: (ms: number) => Promise<void>;
}

export class Reckoner {
  readonly config: RetryConfig;
  readonly adapter: ProviderAdapter;
  private readonly controller: RetryController;
  private readonly resolver: TypeResolver;
  private readonly logger: DiagnosticSink;

  constructor(client: unknown, model: string, config: ReckonerConfig = {}, options: ReckonerOptions = {}) {
    if (typeof model !== "string" || model.trim() === "") {
      throw new InputContractError("model must be a non-empty string");
    }
    const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new InputContractError(`timeoutMs must be a positive number, got ${String(timeoutMs)}`);
    }

    this.config = resolveRetryConfig(config);
    this.logger = options.logger ?? createSink(options.logLevel ?? "silent");

    const registry = options.registry ?? createDefaultRegistry();
    this.adapter = registry.select(client, model, {
      timeoutMs,
      systemInstruction: config.systemInstruction,
      logger: this.logger,
    });

    this.controller = new RetryController(this.config, {
      provider: this.adapter.name,
      logger: this.logger,
      auditLog: options.auditLog,
      sleep: options.sleep,
    });
    this.resolver = new TypeResolver(options.records ?? defaultRecords);
  }

  /**
   * Evaluate a statement to a boolean
   */
  evaluate(statement: string): Promise<boolean>;
  /**
   * Wrap `fn` so that each call is answered by the model. The signature
   * supplies the return type unless one was registered with describeFunction().
   */
  evaluate<A extends unknown[], R>(fn: (...args: A) => R, signature?: SignatureInput): (...args: A) => Promise<Awaited<R>>;
  evaluate<A extends unknown[], R>(
    input: string | ((...args: A) => R),
    signature?: SignatureInput
  ): Promise<boolean> | ((...args: A) => Promise<unknown>) {
    if (typeof input === "string") {
      return this.evaluateStatement(input);
    }
    if (typeof input === "function") {
      return this.wrap(input, signature);
    }
    throw new InputContractError(`evaluate() takes a statement or a function, got ${typeof input}`);
  }

  /**
   * Send a free-form prompt. Without `returns` the model's text comes back
   * unchanged; with it the answer is coerced and validated like a function result.
   */
  prompt(text: string): Promise<string>;
  prompt<T>(text: string, returns: Descriptor<T>): Promise<T>;
  prompt(text: string, returns: TypeLike): Promise<unknown>;
  async prompt(text: string, returns?: TypeLike): Promise<unknown> {
    if (typeof text !== "string" || text.trim() === "") {
      throw new InputContractError("prompt must be a non-empty string");
    }
    const label = statementLabel(text);
    this.logger.info("Evaluating prompt", { model: this.adapter.model }, { request: label, phase: "evaluate" });

    if (returns === undefined) {
      const raw = buildFreeformPrompt(text);
      return this.controller.runText(label, () => this.adapter.sendFreeformPrompt(raw));
    }

    const descriptor = this.resolver.resolve(returns);
    const typed = buildFreeformPrompt(text, descriptor);
    return this.controller.run(label, () => this.adapter.sendFreeformPrompt(typed), descriptor);
  }

  private async evaluateStatement(text: string): Promise<boolean> {
    if (text.trim() === "") {
      throw new InputContractError("statement must not be empty");
    }
    const request: StatementRequest = Object.freeze({ kind: "statement", text });
    const prompt = buildStatementPrompt(request.text);
    const label = statementLabel(text);

    this.logger.info("Evaluating statement", { model: this.adapter.model }, { request: label, phase: "evaluate" });
    return this.controller.run(label, () => this.adapter.sendStatementPrompt(prompt), t.boolean());
  }

  private wrap<A extends unknown[], R>(fn: (...args: A) => R, explicit?: SignatureInput): (...args: A) => Promise<unknown> {
    let signature: ResolvedSignature | undefined;

    return async (...args: A): Promise<unknown> => {
      if (!signature) {
        signature = resolveSignature(fn, explicit, this.resolver);
      }

      const request: FunctionRequest = Object.freeze({
        kind: "function",
        name: signature.name,
        signature: signature.params,
        docstring: signature.docstring,
        arguments: Object.freeze(bindArguments(signature.params, args)),
        returns: signature.returns,
      });
      const prompt = buildFunctionPrompt(request);

      this.logger.info("Evaluating function", { model: this.adapter.model }, { request: request.name, phase: "evaluate" });
      return this.controller.run(request.name, () => this.adapter.sendFunctionPrompt(prompt), request.returns);
    };
  }
}

function statementLabel(text: string): string {
  const flat = normalize(text);
  return flat.length > LABEL_LENGTH ? `${flat.slice(0, LABEL_LENGTH - 3)}...` : flat;
}
