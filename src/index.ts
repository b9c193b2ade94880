/**
 * reckon: Main entry point
 * Exports the Reckoner facade and the pieces it is built from
 */

export { Reckoner, ReckonerConfig, ReckonerOptions } from "./reckoner";

export { t, OptionalField } from "./lib/descriptors";
export { descriptorFor, registerRecord, resolve, RecordRegistry, TypeResolver } from "./lib/resolver";
export { coerce, CoercionOutcome } from "./lib/coercion";
export { matches, explainMismatch, MatchResult } from "./lib/matcher";
export { buildStatementPrompt, buildFunctionPrompt, buildFreeformPrompt, describeShape } from "./lib/prompts";
export { RetryController, resolveRetryConfig, transition, DEFAULT_RETRY_CONFIG } from "./lib/retry";
export {
  describeFunction,
  signatureFromSource,
  signatureFromSourceText,
  SignatureInput,
  ParameterInput,
} from "./lib/signature";
export { ConfigManager } from "./lib/config";
export { AttemptLog } from "./lib/audit";
export { Logger, DiagnosticSink, LogLevel, Verbosity, noopSink } from "./lib/logger";
export { ProviderAdapter, ProviderSettings } from "./lib/providers/types";
export { ProviderRegistry, ProviderEntry, defineProvider, createDefaultRegistry } from "./lib/providers/registry";
export { OpenAIAdapter } from "./lib/providers/openai";
export { GeminiAdapter } from "./lib/providers/gemini";

export {
  ReckonError,
  UnsupportedTypeError,
  UnsupportedClientError,
  InputContractError,
  ProviderError,
  ProviderTimeoutError,
  ParseError,
  TypeMismatchError,
  RetriesExhaustedError,
} from "./lib/errors";

export {
  Descriptor,
  Describable,
  DescribableClass,
  Infer,
  RecordFieldSpec,
  RetryConfig,
  RetryMode,
  TypeDescriptor,
  TypeLike,
} from "./lib/types";
