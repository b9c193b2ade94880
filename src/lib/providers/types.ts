/**
 * Provider adapter contract
 */

import { DiagnosticSink } from "../logger";

export interface ProviderSettings {
  /** Per-request transport timeout */
  timeoutMs: number;
  systemInstruction?: string;
  logger: DiagnosticSink;
}

/**
 * Transport to one backend. Adapters return raw text; every failure surfaces
 * as a ProviderError.
 */
export interface ProviderAdapter {
  readonly name: string;
  readonly model: string;
  sendStatementPrompt(prompt: string): Promise<string>;
  sendFunctionPrompt(prompt: string): Promise<string>;
  /** A caller-written prompt, sent as given */
  sendFreeformPrompt(prompt: string): Promise<string>;
}
